import { Command, Option } from 'commander';
import { isRuleId, type LintSummary, type RuleId } from '../../core/entities/Issue.js';
import { LintService } from '../../core/services/LintService.js';
import type { DocsConfig } from '../../core/utils/config.js';
import { ValidationError } from '../../core/utils/errors.js';
import logger from '../../core/utils/logger.js';
import { run } from '../utils/command-runner.js';
import { createContext, type GlobalOptions } from '../utils/context.js';
import { formatJson, formatReport, type OutputFormat } from '../utils/report-formatter.js';

export interface LintCommandOptions extends GlobalOptions {
  format?: OutputFormat;
  strict?: boolean;
  rule?: string[];
  color?: boolean;
}

export interface CommandIO {
  config?: DocsConfig;
  write?: (text: string) => void;
}

export function parseRuleIds(values: string[] = []): RuleId[] {
  const unknown = values.filter(value => !isRuleId(value));
  if (unknown.length > 0) {
    throw new ValidationError(`Unknown rule: ${unknown.join(', ')}`, { context: { rules: unknown } });
  }
  return values.filter(isRuleId);
}

/** 1 when errors were found, or warnings under --strict */
export function lintExitCode(summary: LintSummary, strict = false): number {
  return summary.errors > 0 || (strict && summary.warnings > 0) ? 1 : 0;
}

export function useColor(options: { color?: boolean }, config: DocsConfig): boolean {
  return options.color !== false && config.cli.color && Boolean(process.stdout.isTTY);
}

export async function handleLint(options: LintCommandOptions, io: CommandIO = {}): Promise<number> {
  const write = io.write ?? console.log;
  const onlyRules = parseRuleIds(options.rule);
  const { config, documents } = await createContext(options, io.config);

  const corpus = await documents.loadCorpus();
  const report = new LintService().lint(corpus, {
    requiredFields: config.corpus.requiredFields,
    disabledRules: config.corpus.disabledRules,
    onlyRules,
  });
  logger.debug({ summary: report.summary }, 'Lint finished');

  write(
    options.format === 'json'
      ? formatJson(report)
      : formatReport(report, { color: useColor(options, config) })
  );

  return lintExitCode(report.summary, options.strict);
}

export function createLintCommand(): Command {
  const command = new Command('lint');

  command
    .description('check pages, links, code blocks and tocs')
    .addOption(new Option('-f, --format <format>', 'output format').choices(['text', 'json']).default('text'))
    .option('--strict', 'exit non-zero on warnings as well as errors', false)
    .option('-r, --rule <ids...>', 'only run these rules')
    .action((_options: unknown, cmd: Command) =>
      run(() => handleLint(cmd.optsWithGlobals<LintCommandOptions>()))
    );

  return command;
}
