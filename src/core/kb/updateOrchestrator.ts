import {
  contentHash,
  formatDuration,
  normalizeContent,
  withTimeout,
} from '../../utils/helpers.js';
import type { CacheStore } from './cacheStore.js';
import { detectFileChange } from './changeDetector.js';
import {
  DecodeError,
  SourceTooLargeError,
  SummarizerError,
  TimeoutError,
  errorMessage,
} from './errors.js';
import { renderIndex } from './indexGenerator.js';
import type { SourceEnumerator } from './sourceEnumerator.js';
import type { LockLease, UpdateLock } from './updateLock.js';
import {
  applyFetchFailure,
  applyFetchSuccess,
  applyNotModified,
  buildFetchRequest,
  seedUrlRecord,
  selectDueUrls,
} from './urlScheduler.js';
import type {
  Cache,
  ContentFetcher,
  FailureKind,
  FetchResult,
  FileCacheRecord,
  KnowledgeBaseSettings,
  Summarizer,
  UpdateOptions,
  UpdateReport,
  UpdateScope,
  UrlCacheRecord,
} from './types.js';

export interface OrchestratorDeps {
  settings: KnowledgeBaseSettings;
  store: CacheStore;
  lock: UpdateLock;
  enumerator: SourceEnumerator;
  summarizer: Summarizer;
  fetcher: ContentFetcher;
  now?: () => Date;
}

interface Pass {
  cache: Cache;
  report: UpdateReport;
  dirty: boolean;
  force: boolean;
}

function classify(error: unknown): FailureKind {
  if (error instanceof DecodeError) return 'decode';
  if (error instanceof SourceTooLargeError) return 'too_large';
  if (error instanceof SummarizerError) return 'summarizer';
  if (error instanceof TimeoutError) return 'timeout';
  return 'read';
}

/**
 * The incremental update algorithm shared by every trigger. Each pass runs
 * under the update lock: load cache, diff the sources in scope, call the
 * summarizer/fetcher for what changed, then persist cache and index together.
 */
export class UpdateOrchestrator {
  private readonly settings: KnowledgeBaseSettings;
  private readonly store: CacheStore;
  private readonly lock: UpdateLock;
  private readonly enumerator: SourceEnumerator;
  private readonly summarizer: Summarizer;
  private readonly fetcher: ContentFetcher;
  private readonly now: () => Date;

  constructor(deps: OrchestratorDeps) {
    this.settings = deps.settings;
    this.store = deps.store;
    this.lock = deps.lock;
    this.enumerator = deps.enumerator;
    this.summarizer = deps.summarizer;
    this.fetcher = deps.fetcher;
    this.now = deps.now ?? (() => new Date());
  }

  public runUpdate(
    scope: UpdateScope,
    options: UpdateOptions = {}
  ): Promise<UpdateReport> {
    return this.lock.runExclusive((lease) =>
      this.runPass(scope, options, lease)
    );
  }

  private async runPass(
    scope: UpdateScope,
    options: UpdateOptions,
    lease: LockLease
  ): Promise<UpdateReport> {
    const startTime = Date.now();
    const pass: Pass = {
      cache: await this.store.load(),
      dirty: false,
      force: options.force ?? false,
      report: {
        scope: scope.kind,
        added: [],
        changed: [],
        removed: [],
        metadataOnly: [],
        unchanged: 0,
        urlsProcessed: [],
        failures: [],
        persisted: false,
        indexWritten: false,
        durationMs: 0,
      },
    };

    switch (scope.kind) {
      case 'full':
        await this.syncAllFiles(pass);
        await this.syncUrlList(pass);
        await this.refreshUrls(pass, this.settings.manualUrlBudget);
        break;
      case 'files':
        await this.syncAllFiles(pass);
        break;
      case 'file':
        await this.syncOneFile(pass, scope.relPath);
        break;
      case 'links':
        await this.syncUrlList(pass);
        break;
      case 'tick':
        await this.syncUrlList(pass);
        await this.refreshUrls(pass, this.settings.tickUrlBudget);
        break;
    }

    const indexText = renderIndex(pass.cache);
    if (pass.dirty) {
      pass.cache.generatedAt = this.now().toISOString();
      lease.assertHeld();
      await this.store.persist(pass.cache, indexText);
      pass.report.persisted = true;
      pass.report.indexWritten = true;
    } else if ((await this.store.readIndexText()) !== indexText) {
      // Nothing changed, but the committed index is missing or stale.
      lease.assertHeld();
      await this.store.writeIndex(indexText);
      pass.report.indexWritten = true;
    }

    pass.report.durationMs = Date.now() - startTime;
    this.logReport(pass.report);
    return pass.report;
  }

  private async syncAllFiles(pass: Pass): Promise<void> {
    let current: string[];
    try {
      current = await this.enumerator.listFiles();
    } catch (error) {
      // Without a listing we cannot tell deletions apart; keep every record.
      this.recordFailure(pass, this.enumerator.root, 'read', error);
      return;
    }

    const present = new Set(current);
    for (const [id, record] of pass.cache.sources) {
      if (record.sourceType === 'file' && !present.has(id)) {
        this.removeRecord(pass, id);
      }
    }
    for (const relPath of current) {
      await this.processFile(pass, relPath);
    }
  }

  private async syncOneFile(pass: Pass, relPath: string): Promise<void> {
    let isSource: boolean;
    try {
      isSource = await this.enumerator.isFileSource(relPath);
    } catch (error) {
      this.recordFailure(pass, relPath, 'read', error);
      return;
    }

    if (isSource) {
      await this.processFile(pass, relPath);
    } else if (pass.cache.sources.get(relPath)?.sourceType === 'file') {
      this.removeRecord(pass, relPath);
    }
  }

  private async processFile(pass: Pass, relPath: string): Promise<void> {
    const existing = pass.cache.sources.get(relPath);
    const record: FileCacheRecord | undefined =
      existing?.sourceType === 'file' ? existing : undefined;

    try {
      const change = await detectFileChange(
        relPath,
        this.enumerator.resolveFile(relPath),
        record,
        { force: pass.force, maxSourceBytes: this.settings.maxSourceBytes }
      );

      switch (change.kind) {
        case 'unchanged':
          pass.report.unchanged++;
          return;
        case 'metadata':
          if (record) {
            record.sizeBytes = change.fingerprint.sizeBytes;
            record.mtimeNs = change.fingerprint.mtimeNs;
            record.lastIndexedAt = this.now().toISOString();
            pass.report.metadataOnly.push(relPath);
            pass.dirty = true;
          }
          return;
        case 'new':
        case 'changed': {
          const summaryText = await this.summarize(relPath, change.text);
          pass.cache.sources.set(relPath, {
            sourceId: relPath,
            sourceType: 'file',
            relPath,
            contentHash: change.contentHash,
            summaryText,
            sizeBytes: change.fingerprint.sizeBytes,
            mtimeNs: change.fingerprint.mtimeNs,
            lastIndexedAt: this.now().toISOString(),
          });
          (change.kind === 'new' ? pass.report.added : pass.report.changed).push(
            relPath
          );
          pass.dirty = true;
          return;
        }
      }
    } catch (error) {
      // The prior record (if any) stays as committed; retried next pass.
      this.recordFailure(pass, relPath, classify(error), error);
    }
  }

  private async syncUrlList(pass: Pass): Promise<void> {
    let urls: string[];
    try {
      urls = await this.enumerator.listUrls();
    } catch (error) {
      this.recordFailure(pass, this.settings.linksFilePath, 'read', error);
      return;
    }

    const listed = new Set(urls);
    for (const [id, record] of pass.cache.sources) {
      if (record.sourceType === 'url' && !listed.has(id)) {
        this.removeRecord(pass, id);
      }
    }
    for (const url of urls) {
      if (!pass.cache.sources.has(url)) {
        pass.cache.sources.set(url, seedUrlRecord(url, this.now()));
        pass.report.added.push(url);
        pass.dirty = true;
      }
    }
  }

  private async refreshUrls(pass: Pass, budget: number): Promise<void> {
    const records: UrlCacheRecord[] = [];
    for (const record of pass.cache.sources.values()) {
      if (record.sourceType === 'url') records.push(record);
    }

    const selected = selectDueUrls(
      records,
      this.now(),
      budget,
      this.settings,
      pass.force
    );
    // Strictly in selection order; one URL at a time.
    for (const record of selected) {
      await this.refreshUrl(pass, record);
    }
  }

  private async refreshUrl(pass: Pass, record: UrlCacheRecord): Promise<void> {
    const url = record.sourceId;
    pass.report.urlsProcessed.push(url);
    pass.dirty = true;

    const request = buildFetchRequest(record, pass.force);
    let result: FetchResult;
    try {
      result = await withTimeout(
        (signal) => this.fetcher.fetch(request, signal),
        this.settings.fetchTimeoutMs,
        `Fetching ${url}`
      );
    } catch (error) {
      result =
        error instanceof TimeoutError
          ? { status: 'timeout', error: error.message }
          : { status: 'error', error: errorMessage(error) };
    }

    switch (result.status) {
      case 'not_modified':
        if (record.contentHash === undefined) {
          this.failUrl(
            pass,
            record,
            'error',
            'fetch',
            'Not modified, but nothing is cached'
          );
          return;
        }
        applyNotModified(record, this.now(), this.settings, result);
        return;
      case 'timeout':
        this.failUrl(
          pass,
          record,
          'timeout',
          'timeout',
          result.error ?? 'Request timed out'
        );
        return;
      case 'error':
        this.failUrl(pass, record, 'error', 'fetch', result.error);
        return;
      case 'success':
        await this.applyBody(pass, record, result);
        return;
    }
  }

  private async applyBody(
    pass: Pass,
    record: UrlCacheRecord,
    result: Extract<FetchResult, { status: 'success' }>
  ): Promise<void> {
    const url = record.sourceId;
    const size = Buffer.byteLength(result.bodyText, 'utf-8');
    if (size > this.settings.maxSourceBytes) {
      this.failUrl(
        pass,
        record,
        'error',
        'too_large',
        `Body exceeds ${this.settings.maxSourceBytes} bytes (${size})`
      );
      return;
    }

    const text = normalizeContent(result.bodyText);
    const hash = contentHash(text);
    if (!pass.force && hash === record.contentHash) {
      applyFetchSuccess(record, this.now(), this.settings, {
        etag: result.etag,
        lastModified: result.lastModified,
      });
      return;
    }

    let summaryText: string;
    try {
      summaryText = await this.summarize(url, text);
    } catch (error) {
      // Keep old hash and validators so the next fetch returns the body again.
      this.failUrl(pass, record, 'error', 'summarizer', errorMessage(error));
      return;
    }

    applyFetchSuccess(record, this.now(), this.settings, {
      etag: result.etag,
      lastModified: result.lastModified,
      content: { contentHash: hash, summaryText },
    });
    if (!pass.report.added.includes(url)) {
      pass.report.changed.push(url);
    }
  }

  private failUrl(
    pass: Pass,
    record: UrlCacheRecord,
    status: 'timeout' | 'error',
    kind: FailureKind,
    message: string
  ): void {
    applyFetchFailure(record, this.now(), this.settings, status);
    this.recordFailure(pass, record.sourceId, kind, message);
    console.error(
      `URL ${record.sourceId} backing off until ${record.nextCheckAt} (${record.consecutiveFailures} consecutive failures)`
    );
  }

  private async summarize(sourceId: string, text: string): Promise<string> {
    if (!text) return '';
    try {
      const summary = await withTimeout(
        (signal) => this.summarizer.summarize({ sourceId, text }, signal),
        this.settings.summarizeTimeoutMs,
        `Summarizing ${sourceId}`
      );
      return summary.trim();
    } catch (error) {
      if (error instanceof SummarizerError) throw error;
      throw new SummarizerError(
        `Summarizer failed for ${sourceId}: ${errorMessage(error)}`,
        sourceId,
        { cause: error }
      );
    }
  }

  private removeRecord(pass: Pass, sourceId: string): void {
    pass.cache.sources.delete(sourceId);
    pass.report.removed.push(sourceId);
    pass.dirty = true;
  }

  private recordFailure(
    pass: Pass,
    sourceId: string,
    kind: FailureKind,
    error: unknown
  ): void {
    const message = errorMessage(error);
    pass.report.failures.push({ sourceId, kind, message });
    console.error(`Failed to process source ${sourceId} [${kind}]: ${message}`);
  }

  private logReport(report: UpdateReport): void {
    console.error(
      `Update pass (${report.scope}) finished in ${formatDuration(
        report.durationMs / 1000
      )}: ${report.added.length} added, ${report.changed.length} changed, ` +
        `${report.removed.length} removed, ${report.metadataOnly.length} metadata-only, ` +
        `${report.unchanged} unchanged, ${report.urlsProcessed.length} URLs fetched, ` +
        `${report.failures.length} failures.`
    );
  }
}
