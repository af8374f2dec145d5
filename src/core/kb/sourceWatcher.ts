import chokidar, { type FSWatcher, type WatchOptions } from 'chokidar';
import { Debouncer } from './debouncer.js';
import { errorMessage } from './errors.js';
import type { SourceEnumerator } from './sourceEnumerator.js';
import type { UpdateScope, WatchSettings } from './types.js';

export type UpdateTrigger = (scope: UpdateScope) => Promise<unknown>;

/** Debounce key for passes that rescan the whole source tree. */
const TREE_KEY = '\0tree';

const STABILITY_THRESHOLD = 300;
const POLL_INTERVAL = 100;

const WATCHER_OPTIONS: WatchOptions = {
  persistent: true,
  ignoreInitial: true, // startup sync already covers the initial state
  awaitWriteFinish: {
    stabilityThreshold: STABILITY_THRESHOLD,
    pollInterval: POLL_INTERVAL,
  },
  followSymlinks: false,
  ignorePermissionErrors: true,
};

/**
 * Watches the source root and the link list and turns bursts of filesystem
 * events into debounced update passes: one per changed file, one for the
 * link list.
 */
export class SourceWatcher {
  private filesWatcher: FSWatcher | null = null;
  private linksWatcher: FSWatcher | null = null;
  private readonly fileDebouncer: Debouncer<string>;
  private readonly linksDebouncer: Debouncer<'links'>;

  constructor(
    private readonly enumerator: SourceEnumerator,
    private readonly linksFilePath: string,
    private readonly settings: WatchSettings,
    private readonly trigger: UpdateTrigger
  ) {
    this.fileDebouncer = new Debouncer(settings.fileDebounceMs);
    this.linksDebouncer = new Debouncer(settings.linksDebounceMs);
  }

  public async start(): Promise<void> {
    const ready: Promise<void>[] = [];

    if (this.settings.watchFiles && !this.filesWatcher) {
      const watcher = chokidar.watch(this.enumerator.root, {
        ...WATCHER_OPTIONS,
        // Same skip rules as the enumerator, so the artifacts and the lock
        // directory written by each pass do not trigger another one.
        ignored: (watchedPath: string) => this.enumerator.isIgnoredPath(watchedPath),
      });
      watcher.on('add', (p) => this.onFileEvent(p));
      watcher.on('change', (p) => this.onFileEvent(p));
      watcher.on('unlink', (p) => this.onFileEvent(p));
      watcher.on('addDir', (p) => this.onTreeEvent(p));
      watcher.on('unlinkDir', (p) => this.onTreeEvent(p));
      watcher.on('error', (error) => this.onError('sources', error));
      this.filesWatcher = watcher;
      ready.push(waitReady(watcher));
      console.error(`Watching sources directory: ${this.enumerator.root}`);
    }

    if (this.settings.watchLinks && !this.linksWatcher) {
      const watcher = chokidar.watch(this.linksFilePath, WATCHER_OPTIONS);
      watcher.on('all', () => this.onLinksEvent());
      watcher.on('error', (error) => this.onError('links', error));
      this.linksWatcher = watcher;
      ready.push(waitReady(watcher));
      console.error(`Watching link list: ${this.linksFilePath}`);
    }

    await Promise.all(ready);
  }

  public async stop(): Promise<void> {
    this.fileDebouncer.cancelAll();
    this.linksDebouncer.cancelAll();
    const closing: Promise<void>[] = [];
    if (this.filesWatcher) closing.push(this.filesWatcher.close());
    if (this.linksWatcher) closing.push(this.linksWatcher.close());
    this.filesWatcher = null;
    this.linksWatcher = null;
    await Promise.all(closing);
  }

  public isWatching(): boolean {
    return this.filesWatcher !== null || this.linksWatcher !== null;
  }

  /** Entry point for raw file events; exposed for callers with their own watcher. */
  public onFileEvent(absolutePath: string): void {
    const relPath = this.enumerator.toSourceId(absolutePath);
    if (!relPath || this.enumerator.isIgnoredPath(absolutePath)) return;
    this.fileDebouncer.schedule(relPath, () =>
      this.fire({ kind: 'file', relPath })
    );
  }

  public onTreeEvent(absolutePath: string): void {
    if (this.enumerator.isIgnoredPath(absolutePath)) return;
    this.fileDebouncer.schedule(TREE_KEY, () => this.fire({ kind: 'files' }));
  }

  public onLinksEvent(): void {
    this.linksDebouncer.schedule('links', () => this.fire({ kind: 'links' }));
  }

  private fire(scope: UpdateScope): void {
    this.trigger(scope).catch((error: unknown) => {
      console.error(
        `Watcher-triggered update (${scope.kind}) failed: ${errorMessage(error)}`
      );
    });
  }

  private onError(which: string, error: unknown): void {
    console.error(`File watcher error (${which}): ${errorMessage(error)}`);
  }
}

function waitReady(watcher: FSWatcher): Promise<void> {
  return new Promise<void>((resolve) => {
    watcher.once('ready', () => resolve());
  });
}
