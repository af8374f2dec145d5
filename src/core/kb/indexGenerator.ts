import { normalizeContent } from '../../utils/helpers.js';
import type { Cache, CacheRecord, IndexEntry } from './types.js';

const byId = (a: CacheRecord, b: CacheRecord): number =>
  a.sourceId < b.sourceId ? -1 : a.sourceId > b.sourceId ? 1 : 0;

/**
 * Renders the index: file entries, then URL entries, each sorted by source id.
 * Every block is the source id line followed by its summary; blocks are
 * separated by a blank line. Records without a summary yet are left out.
 */
export function renderIndex(cache: Cache): string {
  const records = Array.from(cache.sources.values()).filter(
    (record) => record.summaryText !== undefined
  );
  const files = records.filter((r) => r.sourceType === 'file').sort(byId);
  const urls = records.filter((r) => r.sourceType === 'url').sort(byId);

  const blocks = [...files, ...urls].map((record) => {
    // Blank lines inside a summary would split its block when parsed back.
    const summary = normalizeContent(record.summaryText ?? '').replace(
      /\n{2,}/g,
      '\n'
    );
    return summary ? `${record.sourceId}\n${summary}` : record.sourceId;
  });
  return blocks.length > 0 ? `${blocks.join('\n\n')}\n` : '';
}

export function parseIndexEntries(text: string): IndexEntry[] {
  const entries: IndexEntry[] = [];
  const trimmed = text.trim();
  if (!trimmed) return entries;

  for (const chunk of trimmed.split(/\n\s*\n/)) {
    const lines = chunk.trim().split('\n');
    const sourceId = lines[0]?.trim();
    if (!sourceId) continue;
    entries.push({
      sourceId,
      description: lines.slice(1).join('\n').trim(),
    });
  }
  return entries;
}
