export * from './core/entities/Document.js';
export * from './core/entities/Issue.js';
export { DocumentService, type DocumentServiceOptions } from './core/services/DocumentService.js';
export { FrontmatterService, frontmatterService } from './core/services/FrontmatterService.js';
export { LintService, type LintOptions } from './core/services/LintService.js';
export { FixService, type FixOptions, type FixResult, type FixSummary } from './core/services/FixService.js';
export {
  ScaffoldService,
  type ScaffoldTarget,
  type ScaffoldResult,
  type ScaffoldOptions,
} from './core/services/ScaffoldService.js';
export { BackupService, type CleanResult } from './core/services/BackupService.js';
export { FileSystemDocumentStore, StoreType, type DocumentStore } from './core/store/DocumentStore.js';
export { RULES, type Rule, type RuleContext } from './core/rules/index.js';
export { slugify, Slugger } from './core/markdown/slug.js';
export { scanMarkdown, splitTarget } from './core/markdown/scanner.js';
export { parseToc, renderToc } from './core/markdown/toc.js';
export { loadConfig, type DocsConfig } from './core/utils/config.js';
export * from './core/utils/errors.js';
export { WatcherService, type WatcherServiceOptions } from './watcher/index.js';
