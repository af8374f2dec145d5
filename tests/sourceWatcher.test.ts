import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SourceEnumerator } from '../src/core/kb/sourceEnumerator.js';
import { SourceWatcher } from '../src/core/kb/sourceWatcher.js';
import type { UpdateScope } from '../src/core/kb/types.js';

const root = path.resolve('/srv/kb/sources');

function createWatcher(
  trigger: (scope: UpdateScope) => Promise<unknown>,
  cachePath = '/srv/kb/index/kb-cache.json'
) {
  const enumerator = new SourceEnumerator({
    sourcesDir: root,
    linksFilePath: '/srv/kb/links.txt',
    cachePath,
    indexPath: '/srv/kb/index/index.txt',
  });
  return new SourceWatcher(
    enumerator,
    '/srv/kb/links.txt',
    {
      refreshIntervalMs: 60_000,
      watchFiles: true,
      watchLinks: true,
      fileDebounceMs: 100,
      linksDebounceMs: 200,
    },
    trigger
  );
}

describe('SourceWatcher event handling', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('coalesces a burst of events on one file into a single-file pass', async () => {
    const trigger = vi.fn((_scope: UpdateScope) => Promise.resolve());
    const watcher = createWatcher(trigger);

    watcher.onFileEvent(path.join(root, 'guides', 'intro.md'));
    await vi.advanceTimersByTimeAsync(60);
    watcher.onFileEvent(path.join(root, 'guides', 'intro.md'));
    watcher.onFileEvent(path.join(root, 'faq.md'));
    await vi.advanceTimersByTimeAsync(99);
    expect(trigger).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(trigger.mock.calls).toEqual([
      [{ kind: 'file', relPath: 'guides/intro.md' }],
      [{ kind: 'file', relPath: 'faq.md' }],
    ]);
  });

  it('ignores events outside the source root', async () => {
    const trigger = vi.fn((_scope: UpdateScope) => Promise.resolve());
    const watcher = createWatcher(trigger);

    watcher.onFileEvent('/srv/kb/other/notes.md');
    await vi.advanceTimersByTimeAsync(500);

    expect(trigger).not.toHaveBeenCalled();
  });

  it('turns directory changes into a pass over all files', async () => {
    const trigger = vi.fn((_scope: UpdateScope) => Promise.resolve());
    const watcher = createWatcher(trigger);

    watcher.onTreeEvent(path.join(root, 'guides'));
    watcher.onTreeEvent(path.join(root, 'guides', 'old'));
    await vi.advanceTimersByTimeAsync(100);

    expect(trigger.mock.calls).toEqual([[{ kind: 'files' }]]);
  });

  it('ignores the artifacts and lock directory of a cache kept inside the root', async () => {
    const trigger = vi.fn((_scope: UpdateScope) => Promise.resolve());
    const cachePath = path.join(root, 'kb-cache.json');
    const watcher = createWatcher(trigger, cachePath);

    watcher.onTreeEvent(`${cachePath}.lock`);
    watcher.onFileEvent(cachePath);
    watcher.onFileEvent(path.join(root, '.kb-cache.json.1234.abcd.tmp'));
    await vi.advanceTimersByTimeAsync(500);

    expect(trigger).not.toHaveBeenCalled();
  });

  it('debounces link-list edits into one link pass and logs its failure', async () => {
    const trigger = vi.fn((_scope: UpdateScope) => Promise.reject(new Error('lock busy')));
    const watcher = createWatcher(trigger);

    watcher.onLinksEvent();
    await vi.advanceTimersByTimeAsync(150);
    watcher.onLinksEvent();
    await vi.advanceTimersByTimeAsync(200);

    expect(trigger.mock.calls).toEqual([[{ kind: 'links' }]]);
    expect(console.error).toHaveBeenCalledWith(
      'Watcher-triggered update (links) failed: lock busy'
    );
  });

  it('drops pending passes when stopped', async () => {
    const trigger = vi.fn((_scope: UpdateScope) => Promise.resolve());
    const watcher = createWatcher(trigger);

    watcher.onFileEvent(path.join(root, 'faq.md'));
    watcher.onLinksEvent();
    await watcher.stop();
    await vi.advanceTimersByTimeAsync(500);

    expect(trigger).not.toHaveBeenCalled();
    expect(watcher.isWatching()).toBe(false);
  });
});
