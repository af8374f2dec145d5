import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import { errorCode } from '../../utils/fileUtils.js';
import { decodeUtf8, isHttpUrl, toPosixPath } from '../../utils/helpers.js';
import { CacheStore } from './cacheStore.js';
import { KnowledgeBaseError } from './errors.js';
import { parseIndexEntries } from './indexGenerator.js';
import { RefreshTicker } from './refreshTicker.js';
import { SourceEnumerator } from './sourceEnumerator.js';
import { SourceWatcher } from './sourceWatcher.js';
import { UpdateLock } from './updateLock.js';
import { UpdateOrchestrator } from './updateOrchestrator.js';
import type {
  ContentFetcher,
  IndexEntry,
  KnowledgeBaseSettings,
  SourceContent,
  Summarizer,
  UpdateOptions,
  UpdateReport,
  UpdateScope,
  WatchSettings,
} from './types.js';

export interface KnowledgeBaseDeps {
  settings: KnowledgeBaseSettings;
  summarizer: Summarizer;
  fetcher: ContentFetcher;
  now?: () => Date;
}

/**
 * The knowledge base as the rest of the application sees it: update passes,
 * background watching and refresh, and read access to the committed index
 * and to the sources behind it.
 */
export class KnowledgeBase {
  private readonly settings: KnowledgeBaseSettings;
  private readonly fetcher: ContentFetcher;
  private readonly store: CacheStore;
  private readonly enumerator: SourceEnumerator;
  private readonly orchestrator: UpdateOrchestrator;
  private watcher: SourceWatcher | null = null;
  private ticker: RefreshTicker | null = null;

  constructor(deps: KnowledgeBaseDeps) {
    this.settings = deps.settings;
    this.fetcher = deps.fetcher;
    this.store = new CacheStore(deps.settings.cachePath, deps.settings.indexPath);
    this.enumerator = new SourceEnumerator(deps.settings);
    this.orchestrator = new UpdateOrchestrator({
      settings: deps.settings,
      store: this.store,
      lock: new UpdateLock(deps.settings.cachePath),
      enumerator: this.enumerator,
      summarizer: deps.summarizer,
      fetcher: deps.fetcher,
      now: deps.now,
    });
  }

  public update(
    scope: UpdateScope = { kind: 'full' },
    options: UpdateOptions = {}
  ): Promise<UpdateReport> {
    return this.orchestrator.runUpdate(scope, options);
  }

  /**
   * Startup sync followed by file/link watching and the periodic URL refresh.
   * Watching starts even when the startup pass fails, so the next trigger
   * retries it; the failure is still rethrown.
   */
  public async start(watch: WatchSettings): Promise<UpdateReport> {
    console.error('Starting knowledge base startup sync...');
    try {
      return await this.update({ kind: 'full' });
    } finally {
      await this.startBackground(watch);
    }
  }

  private async startBackground(watch: WatchSettings): Promise<void> {
    const trigger = (scope: UpdateScope) => this.update(scope);
    if ((watch.watchFiles || watch.watchLinks) && !this.watcher) {
      this.watcher = new SourceWatcher(
        this.enumerator,
        this.settings.linksFilePath,
        watch,
        trigger
      );
      await this.watcher.start();
    }
    if (!this.ticker) {
      this.ticker = new RefreshTicker(watch.refreshIntervalMs, () =>
        trigger({ kind: 'tick' })
      );
      this.ticker.start();
    }
  }

  public async stop(): Promise<void> {
    await this.watcher?.stop();
    await this.ticker?.stop();
    this.watcher = null;
    this.ticker = null;
  }

  /** The last committed index text, or an empty string before the first pass. */
  public loadIndexText(): Promise<string> {
    return this.store.readIndexText();
  }

  public async loadIndexEntries(): Promise<IndexEntry[]> {
    return parseIndexEntries(await this.loadIndexText());
  }

  /** Full text of a source, looked up by its identifier. */
  public async loadSourceContent(sourceId: string): Promise<SourceContent> {
    if (isHttpUrl(sourceId)) {
      return this.loadUrlContent(sourceId);
    }

    const filePath = this.resolveFileSource(sourceId);
    let bytes: Buffer;
    try {
      const stats = await fsp.stat(filePath);
      if (!stats.isFile()) {
        throw new KnowledgeBaseError(`Source not found: ${sourceId}`, sourceId);
      }
      bytes = await fsp.readFile(filePath);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new KnowledgeBaseError(`Source not found: ${sourceId}`, sourceId, {
          cause: error,
        });
      }
      throw error;
    }

    const text = decodeUtf8(bytes, sourceId);
    if (!text.trim()) {
      throw new KnowledgeBaseError(`Source is empty: ${sourceId}`, sourceId);
    }
    return { sourceId, text };
  }

  /**
   * Maps a file identifier to a path inside the source root. Identifiers may
   * carry Windows separators, leading slashes or the source root prefix
   * (absolute, or relative to the working directory). The result must lie
   * inside the root.
   */
  public resolveFileSource(sourceId: string): string {
    const root = this.enumerator.root;
    const raw = sourceId.trim();

    if (path.isAbsolute(raw) && path.resolve(raw).startsWith(root + path.sep)) {
      return path.resolve(raw);
    }

    let normalized = toPosixPath(raw).replace(/^\/+/, '');
    const rootPosix = toPosixPath(root).replace(/^\/+/, '').replace(/\/+$/, '');
    const fromCwd = toPosixPath(path.relative(process.cwd(), root));
    for (const prefix of [rootPosix, fromCwd]) {
      if (prefix && normalized.startsWith(`${prefix}/`)) {
        normalized = normalized.slice(prefix.length + 1);
        break;
      }
    }

    const resolved = path.resolve(root, normalized);
    if (!resolved.startsWith(root + path.sep)) {
      throw new KnowledgeBaseError(
        `File source is outside the sources directory: ${sourceId}`,
        sourceId
      );
    }
    return resolved;
  }

  private async loadUrlContent(url: string): Promise<SourceContent> {
    const result = await this.fetcher.fetch({ url });
    if (result.status !== 'success' || !result.bodyText.trim()) {
      const reason =
        result.status === 'error' || result.status === 'timeout'
          ? `: ${result.error ?? result.status}`
          : '';
      throw new KnowledgeBaseError(
        `Failed to load URL source content (${result.status})${reason}: ${url}`,
        url
      );
    }
    return { sourceId: url, text: result.bodyText };
  }
}
