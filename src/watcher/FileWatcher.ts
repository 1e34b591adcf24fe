import { watch, type FSWatcher } from 'chokidar';
import { EventEmitter } from 'node:events';
import logger from '../core/utils/logger.js';
import { toRel } from '../core/utils/path-utils.js';
import { FileEventType, type FileEvent } from './types.js';

export { FileEventType, type FileEvent } from './types.js';

export interface WatcherOptions {
  root: string;
  ignored?: string[];
  debounceMs?: number;
  awaitWriteFinish?: boolean;
  ignoreInitial?: boolean;
  depth?: number;
}

/** Files whose changes can alter a lint result */
export function isWatchedFile(filePath: string): boolean {
  return filePath.endsWith('.md') || filePath.endsWith('toc.yml');
}

export class FileWatcher extends EventEmitter {
  private watcher?: FSWatcher;
  private readonly root: string;
  private readonly ignored: string[];
  private readonly debounceMs: number;
  private readonly awaitWriteFinish: boolean;
  private readonly debounceTimers = new Map<string, NodeJS.Timeout>();
  private readonly ignoreInitial: boolean;
  private readonly depth: number;

  constructor(options: WatcherOptions) {
    super();
    this.root = options.root;
    this.debounceMs = options.debounceMs ?? 300;
    this.awaitWriteFinish = options.awaitWriteFinish ?? true;
    this.ignoreInitial = options.ignoreInitial ?? true;
    this.depth = options.depth ?? 20;
    this.ignored = ['**/.git/**', '**/node_modules/**', '**/_site/**', '**/.DS_Store', ...(options.ignored ?? [])];
  }

  async start(): Promise<void> {
    if (this.watcher) {
      logger.warn('Watcher already running');
      return;
    }

    logger.info(`Starting file watcher on ${this.root}`);
    logger.debug(`Ignoring patterns: ${this.ignored.join(', ')}`);

    this.watcher = watch(this.root, {
      ignored: this.ignored,
      persistent: true,
      ignoreInitial: this.ignoreInitial,
      awaitWriteFinish: this.awaitWriteFinish ? { stabilityThreshold: 300, pollInterval: 100 } : false,
      depth: this.depth,
      followSymlinks: false,
    });

    this.watcher
      .on('add', p => this.handleRaw(p, FileEventType.Added))
      .on('change', p => this.handleRaw(p, FileEventType.Changed))
      .on('unlink', p => this.handleRaw(p, FileEventType.Deleted))
      .on('error', err => logger.error(`Watcher error: ${String(err)}`))
      .on('ready', () => {
        logger.info('File watcher ready');
        this.emit('ready');
      });
  }

  async stop(): Promise<void> {
    if (!this.watcher) return;

    logger.info('Stopping file watcher');

    // Clear pending debounce timers
    for (const t of this.debounceTimers.values()) clearTimeout(t);
    this.debounceTimers.clear();

    await this.watcher.close();
    this.watcher = undefined;
  }

  /** Debounce raw chokidar events per path */
  handleRaw(filePath: string, type: FileEventType): void {
    if (!isWatchedFile(filePath)) return;

    const existing = this.debounceTimers.get(filePath);
    if (existing) clearTimeout(existing);

    const timer = setTimeout(() => {
      this.debounceTimers.delete(filePath);
      const event: FileEvent = { type, path: filePath, relativePath: toRel(this.root, filePath) };
      this.emit('file', event);
      logger.debug(`File ${type}: ${event.relativePath}`);
    }, this.debounceMs);

    this.debounceTimers.set(filePath, timer);
  }

  isWatching(): boolean {
    return this.watcher !== undefined;
  }
}
