import * as fsp from 'node:fs/promises';
import { contentHash, decodeUtf8, normalizeContent } from '../../utils/helpers.js';
import { SourceTooLargeError } from './errors.js';
import type { FileCacheRecord } from './types.js';

export interface FileFingerprint {
  sizeBytes: number;
  mtimeNs: string;
}

export type FileChange =
  | { kind: 'unchanged'; fingerprint: FileFingerprint }
  | { kind: 'metadata'; fingerprint: FileFingerprint; contentHash: string }
  | {
      kind: 'new' | 'changed';
      fingerprint: FileFingerprint;
      contentHash: string;
      text: string;
    };

export interface DetectOptions {
  force?: boolean;
  maxSourceBytes: number;
}

export async function readFingerprint(
  absolutePath: string
): Promise<FileFingerprint> {
  const stats = await fsp.stat(absolutePath, { bigint: true });
  return {
    sizeBytes: Number(stats.size),
    mtimeNs: stats.mtimeNs.toString(),
  };
}

/**
 * Classifies a file against its cached record. The size/mtime fingerprint is
 * checked first; the file is only read and hashed when it differs. Only
 * equality matters, not which way the mtime moved.
 */
export async function detectFileChange(
  sourceId: string,
  absolutePath: string,
  record: FileCacheRecord | undefined,
  options: DetectOptions
): Promise<FileChange> {
  const fingerprint = await readFingerprint(absolutePath);

  if (
    record &&
    !options.force &&
    record.sizeBytes === fingerprint.sizeBytes &&
    record.mtimeNs === fingerprint.mtimeNs
  ) {
    return { kind: 'unchanged', fingerprint };
  }

  if (fingerprint.sizeBytes > options.maxSourceBytes) {
    throw new SourceTooLargeError(
      `Source exceeds ${options.maxSourceBytes} bytes (${fingerprint.sizeBytes}): ${sourceId}`,
      sourceId
    );
  }

  const bytes = await fsp.readFile(absolutePath);
  const text = normalizeContent(decodeUtf8(bytes, sourceId));
  const hash = contentHash(text);

  if (!record) {
    return { kind: 'new', fingerprint, contentHash: hash, text };
  }
  if (!options.force && record.contentHash === hash) {
    return { kind: 'metadata', fingerprint, contentHash: hash };
  }
  return { kind: 'changed', fingerprint, contentHash: hash, text };
}
