export { WatcherService, type WatcherServiceOptions } from './WatcherService.js';
export { FileWatcher, isWatchedFile, type WatcherOptions } from './FileWatcher.js';
export { FileEventType, type FileEvent } from './types.js';
