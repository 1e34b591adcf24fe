import logger from '../core/utils/logger.js';
import { logError } from '../core/utils/errors.js';
import type { LintReport } from '../core/entities/Issue.js';
import type { DocumentService } from '../core/services/DocumentService.js';
import { LintService, type LintOptions } from '../core/services/LintService.js';
import { FileWatcher } from './FileWatcher.js';
import { FileEventType, type FileEvent } from './types.js';

export interface WatcherServiceOptions {
  documents: DocumentService;
  lint?: LintOptions;
  debounceMs?: number;
  ignored?: string[];
  /** Called with the issues of the files a change touched */
  onReport: (report: LintReport, event: FileEvent) => void;
  watcher?: FileWatcher;
}

/**
 * Re-lints the corpus whenever a page or toc changes and reports the issues
 * of the changed file. Runs never overlap; events that arrive during a run
 * are handled after it.
 */
export class WatcherService {
  private readonly watcher: FileWatcher;
  private readonly lintService = new LintService();
  private readonly pending = new Map<string, FileEvent>();
  private running: Promise<void> | null = null;

  constructor(private readonly options: WatcherServiceOptions) {
    this.watcher =
      options.watcher ??
      new FileWatcher({
        root: options.documents.root,
        ignored: options.ignored,
        debounceMs: options.debounceMs,
      });
    this.watcher.on('file', (event: FileEvent) => this.enqueue(event));
  }

  async start(): Promise<void> {
    logger.info('Starting watch mode');
    await this.watcher.start();
  }

  async stop(): Promise<void> {
    await this.watcher.stop();
    await this.onIdle();
    logger.info('Watch mode stopped');
  }

  enqueue(event: FileEvent): void {
    this.pending.set(event.relativePath, event);
    if (!this.running) {
      this.running = this.drain().finally(() => {
        this.running = null;
      });
    }
  }

  onIdle(): Promise<void> {
    return this.running ?? Promise.resolve();
  }

  /**
   * Lint once for the given event; deleted pages only trigger a check of the
   * pages that may have linked to them
   */
  async processEvent(event: FileEvent): Promise<LintReport> {
    const corpus = await this.options.documents.loadCorpus();
    const isPage = event.relativePath.endsWith('.md');
    const documents = isPage && event.type !== FileEventType.Deleted ? [event.relativePath] : undefined;
    return this.lintService.lint(corpus, { ...this.options.lint, documents });
  }

  private async drain(): Promise<void> {
    while (this.pending.size > 0) {
      const next = this.pending.values().next();
      if (next.done) break;
      const event = next.value;
      this.pending.delete(event.relativePath);

      try {
        const report = await this.processEvent(event);
        this.options.onReport(report, event);
      } catch (error) {
        logError(error, 'watch', { path: event.relativePath });
      }
    }
  }
}
