import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CacheStore } from '../src/core/kb/cacheStore.js';
import { KnowledgeBaseError, PersistError } from '../src/core/kb/errors.js';
import { KnowledgeBase } from '../src/core/kb/knowledgeBase.js';
import {
  FakeClock,
  FakeFetcher,
  FakeSummarizer,
  createWorkspace,
  type Workspace,
} from './fixtures.js';

describe('KnowledgeBase', () => {
  let ws: Workspace;
  let fetcher: FakeFetcher;
  let summarizer: FakeSummarizer;
  let kb: KnowledgeBase;

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    ws = await createWorkspace();
    fetcher = new FakeFetcher();
    summarizer = new FakeSummarizer();
    kb = new KnowledgeBase({
      settings: ws.settings,
      summarizer,
      fetcher,
      now: new FakeClock().now,
    });
    await ws.writeSource('guides/intro.md', 'Intro text\n');
  });

  afterEach(async () => {
    await kb.stop();
    await ws.cleanup();
  });

  describe('index access', () => {
    it('returns an empty index before the first pass', async () => {
      expect(await kb.loadIndexText()).toBe('');
      expect(await kb.loadIndexEntries()).toEqual([]);
    });

    it('exposes the committed index as entries', async () => {
      await kb.update();

      expect(await kb.loadIndexEntries()).toEqual([
        {
          sourceId: 'guides/intro.md',
          description: 'Summary of guides/intro.md: Intro text',
        },
      ]);
    });

    it('runs the startup pass on start and stops cleanly', async () => {
      const report = await kb.start({
        refreshIntervalMs: 60_000,
        watchFiles: false,
        watchLinks: false,
        fileDebounceMs: 10,
        linksDebounceMs: 10,
      });

      expect(report.scope).toBe('full');
      expect(report.added).toEqual(['guides/intro.md']);
      await kb.stop();
    });
  });

  describe('start after a failed startup pass', () => {
    const watch = {
      refreshIntervalMs: 60_000,
      watchFiles: false,
      watchLinks: false,
      fileDebounceMs: 20,
      linksDebounceMs: 20,
    };

    beforeEach(() => {
      vi.spyOn(CacheStore.prototype, 'persist').mockRejectedValueOnce(
        new PersistError('disk full')
      );
    });

    it('still watches sources, so the next file change is indexed', async () => {
      await expect(kb.start({ ...watch, watchFiles: true })).rejects.toThrow('disk full');
      expect(await kb.loadIndexText()).toBe('');

      await ws.writeSource('notes.md', 'Release notes\n');

      await vi.waitFor(
        async () => {
          expect(await kb.loadIndexEntries()).toEqual([
            { sourceId: 'notes.md', description: 'Summary of notes.md: Release notes' },
          ]);
        },
        { timeout: 10_000, interval: 100 }
      );
    });

    it('still runs the refresh ticker', async () => {
      const url = 'https://docs.example.com/faq';
      await ws.writeLinks([url]);
      fetcher.respond(url, { status: 'success', bodyText: 'FAQ answers' });

      await expect(kb.start({ ...watch, refreshIntervalMs: 50 })).rejects.toBeInstanceOf(
        PersistError
      );

      await vi.waitFor(
        async () => {
          expect(await kb.loadIndexEntries()).toEqual([
            { sourceId: url, description: `Summary of ${url}: FAQ answers` },
          ]);
        },
        { timeout: 5_000, interval: 50 }
      );
    });
  });

  describe('loadSourceContent', () => {
    it('reads a file by its identifier', async () => {
      expect(await kb.loadSourceContent('guides/intro.md')).toEqual({
        sourceId: 'guides/intro.md',
        text: 'Intro text\n',
      });
    });

    it('accepts Windows separators, leading slashes and root prefixes', async () => {
      const root = ws.settings.sourcesDir;
      const rootPosix = root.replace(/\\/g, '/').replace(/^\/+/, '');
      const variants = [
        'guides\\intro.md',
        '/guides/intro.md',
        path.join(root, 'guides', 'intro.md'),
        `${rootPosix}/guides/intro.md`,
      ];

      for (const id of variants) {
        expect((await kb.loadSourceContent(id)).text).toBe('Intro text\n');
      }
    });

    it('refuses paths that escape the source root', async () => {
      await expect(kb.loadSourceContent('../links.txt')).rejects.toThrow(
        'File source is outside the sources directory: ../links.txt'
      );
    });

    it('reports missing files and directories as not found', async () => {
      await expect(kb.loadSourceContent('missing.md')).rejects.toThrow(
        'Source not found: missing.md'
      );
      await expect(kb.loadSourceContent('guides')).rejects.toThrow(
        'Source not found: guides'
      );
    });

    it('reports files without content as empty', async () => {
      await ws.writeSource('blank.md', '  \n\n');
      await expect(kb.loadSourceContent('blank.md')).rejects.toThrow(
        new KnowledgeBaseError('Source is empty: blank.md')
      );
    });

    it('fetches URL sources fresh, without validators', async () => {
      const url = 'https://docs.example.com/guide';
      fetcher.respond(url, { status: 'success', bodyText: 'Guide page' });

      expect(await kb.loadSourceContent(url)).toEqual({ sourceId: url, text: 'Guide page' });
      expect(fetcher.requests).toEqual([{ url }]);
    });

    it('fails when a URL cannot be fetched', async () => {
      const url = 'https://docs.example.com/gone';
      fetcher.respond(url, { status: 'error', error: 'HTTP 404 from server' });

      await expect(kb.loadSourceContent(url)).rejects.toThrow(
        `Failed to load URL source content (error): HTTP 404 from server: ${url}`
      );
    });
  });
});
