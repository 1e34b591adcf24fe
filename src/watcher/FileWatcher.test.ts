import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { FileWatcher, isWatchedFile } from './FileWatcher.js';
import { FileEventType } from './types.js';

describe('isWatchedFile', () => {
  it.each([
    ['/docs/guide.md', true],
    ['/docs/guides/toc.yml', true],
    ['/docs/img/logo.png', false],
    ['/docs/guide.md.bak', false],
  ])('%s → %s', (file, expected) => {
    expect(isWatchedFile(file)).toBe(expected);
  });
});

describe('FileWatcher', () => {
  let watcher: FileWatcher;

  beforeEach(() => {
    vi.useFakeTimers();
    watcher = new FileWatcher({ root: '/docs', debounceMs: 100 });
  });

  afterEach(async () => {
    await watcher.stop();
    vi.useRealTimers();
  });

  it('should debounce events per path and keep the last type', () => {
    const listener = vi.fn();
    watcher.on('file', listener);

    watcher.handleRaw('/docs/guides/setup.md', FileEventType.Changed);
    watcher.handleRaw('/docs/guides/setup.md', FileEventType.Changed);
    vi.advanceTimersByTime(50);
    watcher.handleRaw('/docs/guides/setup.md', FileEventType.Deleted);
    vi.advanceTimersByTime(100);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({
      type: FileEventType.Deleted,
      path: '/docs/guides/setup.md',
      relativePath: 'guides/setup.md',
    });
  });

  it('should emit separate events for separate paths', () => {
    const listener = vi.fn();
    watcher.on('file', listener);

    watcher.handleRaw('/docs/a.md', FileEventType.Added);
    watcher.handleRaw('/docs/toc.yml', FileEventType.Changed);
    vi.advanceTimersByTime(100);

    expect(listener.mock.calls.map(([event]) => event.relativePath)).toEqual(['a.md', 'toc.yml']);
  });

  it('should ignore files that cannot affect linting', () => {
    const listener = vi.fn();
    watcher.on('file', listener);

    watcher.handleRaw('/docs/img/logo.png', FileEventType.Added);
    vi.advanceTimersByTime(100);

    expect(listener).not.toHaveBeenCalled();
  });

  it('should not be watching before start', () => {
    expect(watcher.isWatching()).toBe(false);
  });
});
