import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { detectFileChange, readFingerprint } from '../src/core/kb/changeDetector.js';
import { DecodeError, SourceTooLargeError } from '../src/core/kb/errors.js';
import type { FileCacheRecord } from '../src/core/kb/types.js';
import { contentHash } from '../src/utils/helpers.js';
import { createWorkspace, setMtime, type Workspace } from './fixtures.js';

const MTIME = 1_700_000_000;
const options = { maxSourceBytes: 1_000 };

describe('detectFileChange', () => {
  let ws: Workspace;

  beforeEach(async () => {
    ws = await createWorkspace();
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  async function cachedRecord(relPath: string, text: string): Promise<FileCacheRecord> {
    const abs = await ws.writeSource(relPath, text);
    await setMtime(abs, MTIME);
    const fingerprint = await readFingerprint(abs);
    return {
      sourceId: relPath,
      sourceType: 'file',
      relPath,
      contentHash: contentHash(text),
      summaryText: 'Cached summary.',
      ...fingerprint,
    };
  }

  it('reports a file without a record as new, with normalized text', async () => {
    const abs = await ws.writeSource('new.md', 'Title  \r\nBody\r\n\r\n');

    const change = await detectFileChange('new.md', abs, undefined, options);

    expect(change).toMatchObject({
      kind: 'new',
      text: 'Title\nBody',
      contentHash: contentHash('Title\nBody'),
    });
  });

  it('trusts a matching size and mtime without reading the file', async () => {
    const record = await cachedRecord('doc.md', 'hello');
    const abs = await ws.writeSource('doc.md', 'jello');
    await setMtime(abs, MTIME);

    const change = await detectFileChange('doc.md', abs, record, options);

    expect(change.kind).toBe('unchanged');
  });

  it('reports a metadata-only change when the content hash still matches', async () => {
    const record = await cachedRecord('doc.md', 'hello');
    const abs = await ws.writeSource('doc.md', 'hello   \n\n');
    await setMtime(abs, MTIME + 60);

    const change = await detectFileChange('doc.md', abs, record, options);

    expect(change).toMatchObject({
      kind: 'metadata',
      contentHash: record.contentHash,
      fingerprint: { sizeBytes: 10, mtimeNs: `${MTIME + 60}000000000` },
    });
  });

  it('reports a changed file when the content hash differs', async () => {
    const record = await cachedRecord('doc.md', 'hello');
    const abs = await ws.writeSource('doc.md', 'hello world');

    const change = await detectFileChange('doc.md', abs, record, options);

    expect(change).toMatchObject({ kind: 'changed', text: 'hello world' });
  });

  it('re-reads a file whose mtime moved backwards', async () => {
    const record = await cachedRecord('doc.md', 'hello');
    const abs = await ws.writeSource('doc.md', 'jello');
    await setMtime(abs, MTIME - 3600);

    const change = await detectFileChange('doc.md', abs, record, options);

    expect(change.kind).toBe('changed');
  });

  it('skips both shortcuts when forced', async () => {
    const record = await cachedRecord('doc.md', 'hello');
    const abs = path.join(ws.settings.sourcesDir, 'doc.md');

    const change = await detectFileChange('doc.md', abs, record, {
      ...options,
      force: true,
    });

    expect(change.kind).toBe('changed');
  });

  it('rejects files above the size limit', async () => {
    const abs = await ws.writeSource('big.md', 'x'.repeat(1_001));
    await expect(
      detectFileChange('big.md', abs, undefined, options)
    ).rejects.toBeInstanceOf(SourceTooLargeError);
  });

  it('rejects files that are not valid UTF-8', async () => {
    const abs = await ws.writeSource('blob.bin', Uint8Array.from([0xc3, 0x28, 0xff]));
    await expect(
      detectFileChange('blob.bin', abs, undefined, options)
    ).rejects.toBeInstanceOf(DecodeError);
  });
});
