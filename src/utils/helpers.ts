import { createHash } from 'node:crypto';
import { DecodeError, TimeoutError } from '../core/kb/errors.js';

export function generateHash(content: string, algorithm = 'sha256'): string {
  return createHash(algorithm).update(content).digest('hex');
}

export function formatDuration(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  return [
    hours.toString().padStart(2, '0'),
    minutes.toString().padStart(2, '0'),
    secs.toString().padStart(2, '0'),
  ].join(':');
}

/**
 * Canonical text form used for change detection: LF line endings, no
 * trailing whitespace per line, no leading or trailing blank lines.
 */
export function normalizeContent(text: string): string {
  const lines = text
    .replace(/^\uFEFF/, '')
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/\s+$/, ''));

  let start = 0;
  let end = lines.length;
  while (start < end && lines[start] === '') start++;
  while (end > start && lines[end - 1] === '') end--;

  return lines.slice(start, end).join('\n');
}

export function contentHash(text: string): string {
  return generateHash(normalizeContent(text));
}

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export function decodeUtf8(bytes: Uint8Array, sourceId?: string): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (error) {
    throw new DecodeError(
      `Source is not valid UTF-8 text${sourceId ? `: ${sourceId}` : ''}`,
      sourceId,
      { cause: error }
    );
  }
}

/**
 * Runs `work` with an abort signal that fires after `ms`. Rejects with a
 * TimeoutError when the deadline passes first, whether or not `work` honours
 * the signal.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting so the race settles with the timeout, not
      // with whatever the aborted work throws.
      reject(new TimeoutError(`${label} timed out after ${ms}ms`));
      controller.abort();
    }, ms);
  });

  try {
    return await Promise.race([work(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

export function toPosixPath(value: string): string {
  return value.replace(/\\/g, '/');
}

export function addMs(date: Date, ms: number): Date {
  return new Date(date.getTime() + ms);
}
