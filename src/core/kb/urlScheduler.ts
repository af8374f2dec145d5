import { addMs } from '../../utils/helpers.js';
import type { FetchRequest, FetchStatus, UrlCacheRecord } from './types.js';

export interface RefreshPolicy {
  urlMinRefreshMs: number;
  urlMaxAgeMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

const time = (iso: string | undefined): number =>
  iso ? Date.parse(iso) : Number.NaN;

export function seedUrlRecord(url: string, now: Date): UrlCacheRecord {
  return {
    sourceId: url,
    sourceType: 'url',
    consecutiveFailures: 0,
    nextCheckAt: now.toISOString(),
  };
}

/**
 * A URL is due when its scheduled check has arrived, or when its last fetch
 * is older than the maximum age regardless of schedule.
 */
export function isDue(
  record: UrlCacheRecord,
  now: Date,
  policy: Pick<RefreshPolicy, 'urlMaxAgeMs'>
): boolean {
  const nowMs = now.getTime();
  const next = time(record.nextCheckAt);
  if (Number.isNaN(next) || next <= nowMs) return true;

  const fetched = time(record.lastFetchedAt);
  return !Number.isNaN(fetched) && nowMs - fetched > policy.urlMaxAgeMs;
}

/**
 * Due URLs in ascending `nextCheckAt` order (ties by id), cut to `budget`.
 * Whatever is left stays due for the next pass.
 */
export function selectDueUrls(
  records: Iterable<UrlCacheRecord>,
  now: Date,
  budget: number,
  policy: Pick<RefreshPolicy, 'urlMaxAgeMs'>,
  force = false
): UrlCacheRecord[] {
  const due = Array.from(records).filter(
    (record) => force || isDue(record, now, policy)
  );
  due.sort((a, b) => {
    const diff = time(a.nextCheckAt) - time(b.nextCheckAt);
    if (diff !== 0 && !Number.isNaN(diff)) return diff;
    return a.sourceId < b.sourceId ? -1 : a.sourceId > b.sourceId ? 1 : 0;
  });
  return due.slice(0, Math.max(0, budget));
}

/** Delay before the next attempt after `failures` consecutive failures. */
export function computeBackoffMs(
  failures: number,
  policy: Pick<RefreshPolicy, 'backoffBaseMs' | 'backoffMaxMs'>
): number {
  if (failures <= 0) return 0;
  const delay = policy.backoffBaseMs * 2 ** (failures - 1);
  return Math.min(delay, policy.backoffMaxMs);
}

/**
 * Conditional request for a record. Validators are only attached once the
 * record holds content; a 304 for a URL we never summarized would leave it
 * without an entry.
 */
export function buildFetchRequest(
  record: UrlCacheRecord,
  force = false
): FetchRequest {
  if (force || record.contentHash === undefined) {
    return { url: record.sourceId };
  }
  return {
    url: record.sourceId,
    etag: record.etag,
    lastModified: record.lastModified,
  };
}

export function applyNotModified(
  record: UrlCacheRecord,
  now: Date,
  policy: Pick<RefreshPolicy, 'urlMinRefreshMs'>,
  validators: { etag?: string; lastModified?: string } = {}
): void {
  record.fetchStatus = 'not_modified';
  record.lastFetchedAt = now.toISOString();
  record.consecutiveFailures = 0;
  record.nextCheckAt = addMs(now, policy.urlMinRefreshMs).toISOString();
  if (validators.etag) record.etag = validators.etag;
  if (validators.lastModified) record.lastModified = validators.lastModified;
}

export function applyFetchSuccess(
  record: UrlCacheRecord,
  now: Date,
  policy: Pick<RefreshPolicy, 'urlMinRefreshMs'>,
  result: {
    etag?: string;
    lastModified?: string;
    content?: { contentHash: string; summaryText: string };
  }
): void {
  if (result.content) {
    record.contentHash = result.content.contentHash;
    record.summaryText = result.content.summaryText;
  }
  if (result.etag) record.etag = result.etag;
  if (result.lastModified) record.lastModified = result.lastModified;
  record.fetchStatus = 'success';
  record.lastFetchedAt = now.toISOString();
  record.lastIndexedAt = now.toISOString();
  record.consecutiveFailures = 0;
  record.nextCheckAt = addMs(now, policy.urlMinRefreshMs).toISOString();
}

/** Records a failed attempt; content, summary and validators are left alone. */
export function applyFetchFailure(
  record: UrlCacheRecord,
  now: Date,
  policy: Pick<RefreshPolicy, 'backoffBaseMs' | 'backoffMaxMs'>,
  status: Extract<FetchStatus, 'timeout' | 'error'>
): void {
  record.fetchStatus = status;
  record.lastFetchedAt = now.toISOString();
  record.consecutiveFailures += 1;
  record.nextCheckAt = addMs(
    now,
    computeBackoffMs(record.consecutiveFailures, policy)
  ).toISOString();
}
