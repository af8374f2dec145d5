import { z } from 'zod';
import {
  atomicWriteFile,
  commitTempFile,
  discardTempFile,
  readFileIfExists,
  writeTempFile,
} from '../../utils/fileUtils.js';
import { PersistError, errorMessage } from './errors.js';
import type { Cache, CacheRecord } from './types.js';

export const CACHE_SCHEMA_VERSION = 1;

const fileRecordSchema = z.object({
  source_id: z.string(),
  source_type: z.literal('file'),
  content_hash: z.string(),
  summary_text: z.string(),
  last_indexed_at: z.string().nullish(),
  rel_path: z.string(),
  size_bytes: z.number().int().nonnegative(),
  mtime_ns: z.string().regex(/^\d+$/),
});

const urlRecordSchema = z.object({
  source_id: z.string(),
  source_type: z.literal('url'),
  content_hash: z.string().nullish(),
  summary_text: z.string().nullish(),
  last_indexed_at: z.string().nullish(),
  last_fetched_at: z.string().nullish(),
  etag: z.string().nullish(),
  last_modified: z.string().nullish(),
  fetch_status: z
    .enum(['success', 'not_modified', 'timeout', 'error'])
    .nullish(),
  consecutive_failures: z.number().int().nonnegative(),
  next_check_at: z.string(),
});

const recordSchema = z.discriminatedUnion('source_type', [
  fileRecordSchema,
  urlRecordSchema,
]);

const cacheFileSchema = z.object({
  schema_version: z.number().int(),
  generated_at: z.string().nullish(),
  sources: z.record(recordSchema),
});

type PersistedRecord = z.infer<typeof recordSchema>;

// null on disk, undefined in memory
const opt = <T>(value: T | null | undefined): T | undefined =>
  value ?? undefined;

function fromPersisted(record: PersistedRecord): CacheRecord {
  if (record.source_type === 'file') {
    return {
      sourceId: record.source_id,
      sourceType: 'file',
      contentHash: record.content_hash,
      summaryText: record.summary_text,
      lastIndexedAt: opt(record.last_indexed_at),
      relPath: record.rel_path,
      sizeBytes: record.size_bytes,
      mtimeNs: record.mtime_ns,
    };
  }
  return {
    sourceId: record.source_id,
    sourceType: 'url',
    contentHash: opt(record.content_hash),
    summaryText: opt(record.summary_text),
    lastIndexedAt: opt(record.last_indexed_at),
    lastFetchedAt: opt(record.last_fetched_at),
    etag: opt(record.etag),
    lastModified: opt(record.last_modified),
    fetchStatus: opt(record.fetch_status),
    consecutiveFailures: record.consecutive_failures,
    nextCheckAt: record.next_check_at,
  };
}

function toPersisted(record: CacheRecord): PersistedRecord {
  if (record.sourceType === 'file') {
    return {
      source_id: record.sourceId,
      source_type: 'file',
      content_hash: record.contentHash,
      summary_text: record.summaryText,
      last_indexed_at: record.lastIndexedAt ?? null,
      rel_path: record.relPath,
      size_bytes: record.sizeBytes,
      mtime_ns: record.mtimeNs,
    };
  }
  return {
    source_id: record.sourceId,
    source_type: 'url',
    content_hash: record.contentHash ?? null,
    summary_text: record.summaryText ?? null,
    last_indexed_at: record.lastIndexedAt ?? null,
    last_fetched_at: record.lastFetchedAt ?? null,
    etag: record.etag ?? null,
    last_modified: record.lastModified ?? null,
    fetch_status: record.fetchStatus ?? null,
    consecutive_failures: record.consecutiveFailures,
    next_check_at: record.nextCheckAt,
  };
}

export function createEmptyCache(): Cache {
  return { schemaVersion: CACHE_SCHEMA_VERSION, sources: new Map() };
}

/**
 * Serializes the cache with records in source-id order so that identical
 * caches produce identical files.
 */
export function serializeCache(cache: Cache): string {
  const sources: Record<string, PersistedRecord> = {};
  const ids = Array.from(cache.sources.keys()).sort();
  for (const id of ids) {
    const record = cache.sources.get(id);
    if (record) sources[id] = toPersisted(record);
  }
  return `${JSON.stringify(
    {
      schema_version: cache.schemaVersion,
      generated_at: cache.generatedAt ?? null,
      sources,
    },
    null,
    2
  )}\n`;
}

export function parseCache(content: string): Cache | null {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return null;
  }
  const parsed = cacheFileSchema.safeParse(raw);
  if (!parsed.success || parsed.data.schema_version !== CACHE_SCHEMA_VERSION) {
    return null;
  }

  const sources = new Map<string, CacheRecord>();
  for (const [id, record] of Object.entries(parsed.data.sources)) {
    if (record.source_id !== id) return null;
    sources.set(id, fromPersisted(record));
  }
  return {
    schemaVersion: parsed.data.schema_version,
    generatedAt: opt(parsed.data.generated_at),
    sources,
  };
}

/**
 * Durable home of the cache and the rendered index. Only the update
 * orchestrator calls {@link persist}, and only while holding the update lock.
 */
export class CacheStore {
  constructor(
    private readonly cachePath: string,
    private readonly indexPath: string
  ) {}

  /** Loads the cache; a missing, unreadable or corrupt file yields an empty cache. */
  public async load(): Promise<Cache> {
    let content: string | null;
    try {
      content = await readFileIfExists(this.cachePath);
    } catch (error) {
      console.warn(
        `Cache file ${this.cachePath} could not be read, starting fresh:`,
        errorMessage(error)
      );
      return createEmptyCache();
    }
    if (content === null) {
      return createEmptyCache();
    }

    const cache = parseCache(content);
    if (!cache) {
      console.warn(
        `Cache file ${this.cachePath} has invalid format or schema version. Starting fresh; all sources will be re-summarized.`
      );
      return createEmptyCache();
    }
    return cache;
  }

  public async readIndexText(): Promise<string> {
    return (await readFileIfExists(this.indexPath)) ?? '';
  }

  /**
   * Writes both artifacts through temp files and renames. The index is
   * renamed first: if the process dies before the cache rename, the old cache
   * makes the next pass redo the work and rewrite the index.
   */
  public async persist(cache: Cache, indexText: string): Promise<void> {
    const staged: string[] = [];
    try {
      const indexTemp = await writeTempFile(this.indexPath, indexText);
      staged.push(indexTemp);
      const cacheTemp = await writeTempFile(this.cachePath, serializeCache(cache));
      staged.push(cacheTemp);

      await commitTempFile(indexTemp, this.indexPath);
      staged.shift();
      await commitTempFile(cacheTemp, this.cachePath);
      staged.shift();
    } catch (error) {
      for (const tempPath of staged) {
        await discardTempFile(tempPath);
      }
      throw new PersistError(
        `Failed to persist knowledge base artifacts: ${errorMessage(error)}`,
        undefined,
        { cause: error }
      );
    }
    console.error(
      `Cache saved to: ${this.cachePath} (${cache.sources.size} sources); index saved to: ${this.indexPath}`
    );
  }

  public async writeIndex(indexText: string): Promise<void> {
    try {
      await atomicWriteFile(this.indexPath, indexText);
    } catch (error) {
      throw new PersistError(
        `Failed to write index ${this.indexPath}: ${errorMessage(error)}`,
        undefined,
        { cause: error }
      );
    }
  }
}
