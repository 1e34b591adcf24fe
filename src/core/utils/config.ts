/**
 * Centralized configuration management for docs-keeper.
 * All environment variables and configuration settings should be accessed through this module.
 */

import { z } from 'zod';
import path from 'node:path';
import { loadConfig as loadZodConfig } from 'zod-config';
import { envAdapter } from 'zod-config/env-adapter';
import { dotEnvAdapter } from 'zod-config/dotenv-adapter';
import { ConfigurationError } from './errors.js';
import { isRuleId } from '../entities/Issue.js';
import logger from './logger.js';

// ============================================================================
// Schema Definitions
// ============================================================================

const commaList = z
  .string()
  .default('')
  .transform(val =>
    val
      .split(',')
      .map(s => s.trim())
      .filter(Boolean)
  );

/**
 * Corpus configuration schema
 */
const corpusSchema = z.object({
  DOCS_ROOT: z.string().default('.').describe('Root directory of the documentation corpus'),
  DOCS_IGNORE: commaList.describe('Comma-separated globs excluded from the corpus'),
  DOCS_REQUIRED_FIELDS: z
    .string()
    .default('title,description')
    .transform(val =>
      val
        .split(',')
        .map(s => s.trim())
        .filter(Boolean)
    )
    .describe('Front matter fields every page must carry'),
  DOCS_DISABLED_RULES: commaList.describe('Comma-separated rule ids to skip'),
});

/**
 * Scaffolding configuration schema
 */
const scaffoldSchema = z.object({
  DOCS_AUTHOR: z.string().optional().describe('Author written into scaffolded pages'),
  DOCS_TOPIC: z.string().default('article').describe('ms.topic written into scaffolded pages'),
});

/**
 * Application configuration schema
 */
const appSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  DOCS_DEBOUNCE_MS: z.coerce.number().int().min(0).default(300).describe('Watch debounce in milliseconds'),
  DOCS_CLI_COLOR: z
    .string()
    .optional()
    .transform(val => val !== 'false' && val !== '0'),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  ...corpusSchema.shape,
  ...scaffoldSchema.shape,
  ...appSchema.shape,
});

export type RawConfig = z.infer<typeof configSchema>;

/** Globs that are never part of a corpus */
export const DEFAULT_IGNORE = ['**/node_modules/**', '**/.git/**', '**/_site/**', '**/obj/**'];

// ============================================================================
// Configuration Building
// ============================================================================

/**
 * Shape the validated environment into the config object the services use
 */
export function buildConfig(raw: RawConfig, cwd: string = process.cwd()) {
  return {
    ...raw,

    isDevelopment: raw.NODE_ENV === 'development',
    isProduction: raw.NODE_ENV === 'production',
    isTest: raw.NODE_ENV === 'test',

    corpus: {
      root: path.resolve(cwd, raw.DOCS_ROOT),
      ignore: [...DEFAULT_IGNORE, ...raw.DOCS_IGNORE],
      requiredFields: raw.DOCS_REQUIRED_FIELDS,
      disabledRules: raw.DOCS_DISABLED_RULES.filter(isRuleId),
    },

    scaffold: {
      author: raw.DOCS_AUTHOR,
      topic: raw.DOCS_TOPIC,
    },

    watch: {
      debounceMs: raw.DOCS_DEBOUNCE_MS,
    },

    cli: {
      color: raw.DOCS_CLI_COLOR,
    },
  };
}

export type DocsConfig = ReturnType<typeof buildConfig>;
export type ScaffoldConfig = DocsConfig['scaffold'];

// ============================================================================
// Configuration Loading
// ============================================================================

export interface LoadConfigOptions {
  /** Directory that relative paths and .env files resolve against */
  cwd?: string;
  /** Use this environment instead of .env files and process.env */
  env?: Record<string, string | undefined>;
}

function definedEntries(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/**
 * Load and validate configuration from .env files and the environment
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<DocsConfig> {
  const cwd = options.cwd ?? process.cwd();

  const adapters = options.env
    ? [envAdapter({ customEnv: definedEntries(options.env) })]
    : [
        // Load from .env files in order of precedence
        dotEnvAdapter({ path: path.join(cwd, '.env.local'), silent: true }),
        dotEnvAdapter({ path: path.join(cwd, '.env'), silent: true }),
        // Actual environment variables win
        envAdapter({ silent: true }),
      ];

  let raw: RawConfig;
  try {
    raw = await loadZodConfig({ schema: configSchema, adapters });
  } catch (error) {
    throw new ConfigurationError('Configuration validation failed', { cause: error });
  }

  return buildConfig(raw, cwd);
}

// ============================================================================
// Configuration Validation
// ============================================================================

/**
 * Report configuration values that load but make no sense
 */
export function validateConfig(raw: RawConfig): string[] {
  const warnings: string[] = [];

  for (const rule of raw.DOCS_DISABLED_RULES) {
    if (!isRuleId(rule)) {
      warnings.push(`Unknown rule in DOCS_DISABLED_RULES: ${rule}`);
    }
  }

  if (raw.DOCS_REQUIRED_FIELDS.length === 0) {
    warnings.push('DOCS_REQUIRED_FIELDS is empty; front matter fields will not be checked');
  }

  warnings.forEach(warning => logger.warn(warning));
  return warnings;
}
