import fs from 'node:fs/promises';
import path from 'node:path';
import { DocumentService } from '../../core/services/DocumentService.js';
import { loadConfig, validateConfig, type DocsConfig } from '../../core/utils/config.js';
import { NotFoundError } from '../../core/utils/errors.js';

export interface GlobalOptions {
  root?: string;
}

export interface CliContext {
  config: DocsConfig;
  root: string;
  documents: DocumentService;
}

/**
 * Load configuration and open the documentation root; `--root` wins over DOCS_ROOT
 */
export async function createContext(options: GlobalOptions, config?: DocsConfig): Promise<CliContext> {
  const resolved = config ?? (await loadConfig());
  validateConfig(resolved);

  const root = options.root ? path.resolve(options.root) : resolved.corpus.root;
  const stat = await fs.stat(root).catch(() => null);
  if (!stat?.isDirectory()) {
    throw new NotFoundError(`Documentation root is not a directory: ${root}`, { context: { root } });
  }

  return {
    config: resolved,
    root,
    documents: new DocumentService({ root, ignore: resolved.corpus.ignore }),
  };
}
