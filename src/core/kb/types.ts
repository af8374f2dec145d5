export type SourceType = 'file' | 'url';

export type FetchStatus = 'success' | 'not_modified' | 'timeout' | 'error';

interface BaseCacheRecord {
  sourceId: string;
  lastIndexedAt?: string;
}

export interface FileCacheRecord extends BaseCacheRecord {
  sourceType: 'file';
  contentHash: string;
  summaryText: string;
  relPath: string;
  sizeBytes: number;
  mtimeNs: string; // decimal string; nanoseconds overflow a JSON number
}

export interface UrlCacheRecord extends BaseCacheRecord {
  sourceType: 'url';
  // Absent until the first successful fetch + summary.
  contentHash?: string;
  summaryText?: string;
  lastFetchedAt?: string;
  etag?: string;
  lastModified?: string;
  fetchStatus?: FetchStatus;
  consecutiveFailures: number;
  nextCheckAt: string;
}

export type CacheRecord = FileCacheRecord | UrlCacheRecord;

export interface Cache {
  schemaVersion: number;
  generatedAt?: string;
  sources: Map<string, CacheRecord>;
}

export interface KnowledgeBaseSettings {
  sourcesDir: string;
  linksFilePath: string;
  cachePath: string;
  indexPath: string;
  urlMinRefreshMs: number;
  urlMaxAgeMs: number;
  manualUrlBudget: number;
  tickUrlBudget: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  summarizeTimeoutMs: number;
  fetchTimeoutMs: number;
  maxSourceBytes: number;
}

export interface WatchSettings {
  refreshIntervalMs: number;
  watchFiles: boolean;
  watchLinks: boolean;
  fileDebounceMs: number;
  linksDebounceMs: number;
}

export interface SummarizeRequest {
  sourceId: string;
  text: string;
}

/**
 * Produces the index description of a source. Implementations may be slow
 * and are expected to honour the abort signal.
 */
export interface Summarizer {
  summarize(request: SummarizeRequest, signal?: AbortSignal): Promise<string>;
}

export interface FetchRequest {
  url: string;
  etag?: string;
  lastModified?: string;
}

interface Validators {
  etag?: string;
  lastModified?: string;
}

export type FetchResult =
  | ({ status: 'success'; bodyText: string } & Validators)
  | ({ status: 'not_modified' } & Validators)
  | { status: 'timeout'; error?: string }
  | { status: 'error'; error: string };

/**
 * Performs a (conditional) GET of a URL source and returns its extracted text.
 * Network failures are reported through `status`, not thrown.
 */
export interface ContentFetcher {
  fetch(request: FetchRequest, signal?: AbortSignal): Promise<FetchResult>;
}

export type UpdateScope =
  | { kind: 'full' }
  | { kind: 'files' }
  | { kind: 'file'; relPath: string }
  | { kind: 'links' }
  | { kind: 'tick' };

export interface UpdateOptions {
  /** Ignore fingerprints, hashes and schedules; re-summarize everything in scope. */
  force?: boolean;
}

export type FailureKind =
  | 'decode'
  | 'too_large'
  | 'read'
  | 'summarizer'
  | 'timeout'
  | 'fetch';

export interface SourceFailure {
  sourceId: string;
  kind: FailureKind;
  message: string;
}

export interface UpdateReport {
  scope: UpdateScope['kind'];
  added: string[];
  changed: string[];
  removed: string[];
  metadataOnly: string[];
  unchanged: number;
  urlsProcessed: string[];
  failures: SourceFailure[];
  persisted: boolean;
  indexWritten: boolean;
  durationMs: number;
}

export interface IndexEntry {
  sourceId: string;
  description: string;
}

export interface SourceContent {
  sourceId: string;
  text: string;
}
