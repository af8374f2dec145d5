import * as fsp from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { CacheStore } from '../src/core/kb/cacheStore.js';
import { SummarizerError } from '../src/core/kb/errors.js';
import { SourceEnumerator } from '../src/core/kb/sourceEnumerator.js';
import { UpdateLock } from '../src/core/kb/updateLock.js';
import { UpdateOrchestrator } from '../src/core/kb/updateOrchestrator.js';
import type {
  ContentFetcher,
  FetchRequest,
  FetchResult,
  KnowledgeBaseSettings,
  SummarizeRequest,
  Summarizer,
} from '../src/core/kb/types.js';

export const T0 = new Date('2025-03-01T12:00:00.000Z');

export class FakeClock {
  private ms: number;

  constructor(start: Date = T0) {
    this.ms = start.getTime();
  }

  now = (): Date => new Date(this.ms);

  advance(ms: number): void {
    this.ms += ms;
  }

  set(date: Date | string): void {
    this.ms = new Date(date).getTime();
  }
}

export class FakeSummarizer implements Summarizer {
  readonly calls: SummarizeRequest[] = [];
  readonly failing = new Set<string>();
  /** Sources whose summary never arrives. */
  readonly hanging = new Set<string>();
  active = 0;
  maxActive = 0;
  delayMs = 0;

  async summarize(request: SummarizeRequest): Promise<string> {
    this.calls.push(request);
    if (this.hanging.has(request.sourceId)) {
      return new Promise<string>(() => undefined);
    }
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      }
      if (this.failing.has(request.sourceId)) {
        throw new SummarizerError('provider unavailable', request.sourceId);
      }
      return `Summary of ${request.sourceId}: ${request.text.split('\n')[0]}`;
    } finally {
      this.active--;
    }
  }
}

type FetchResponder = (request: FetchRequest) => FetchResult | Promise<FetchResult>;

export class FakeFetcher implements ContentFetcher {
  readonly requests: FetchRequest[] = [];
  private readonly responders = new Map<string, FetchResponder>();

  respond(url: string, responder: FetchResponder | FetchResult): void {
    this.responders.set(
      url,
      typeof responder === 'function' ? responder : () => responder
    );
  }

  async fetch(request: FetchRequest): Promise<FetchResult> {
    this.requests.push(request);
    const responder = this.responders.get(request.url);
    if (!responder) {
      return { status: 'error', error: `no responder for ${request.url}` };
    }
    return responder(request);
  }
}

export interface Workspace {
  dir: string;
  settings: KnowledgeBaseSettings;
  writeSource(relPath: string, content: string | Uint8Array): Promise<string>;
  removeSource(relPath: string): Promise<void>;
  writeLinks(lines: string[]): Promise<void>;
  readIndex(): Promise<string>;
  readCacheFile(): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createWorkspace(
  overrides: Partial<KnowledgeBaseSettings> = {}
): Promise<Workspace> {
  const dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'kb-test-'));
  const sourcesDir = path.join(dir, 'sources');
  await fsp.mkdir(sourcesDir, { recursive: true });

  const settings: KnowledgeBaseSettings = {
    sourcesDir,
    linksFilePath: path.join(dir, 'links.txt'),
    cachePath: path.join(dir, 'index', 'kb-cache.json'),
    indexPath: path.join(dir, 'index', 'index.txt'),
    urlMinRefreshMs: 3_600_000,
    urlMaxAgeMs: 7 * 86_400_000,
    manualUrlBudget: 50,
    tickUrlBudget: 10,
    backoffBaseMs: 10_000,
    backoffMaxMs: 60_000,
    summarizeTimeoutMs: 5_000,
    fetchTimeoutMs: 5_000,
    maxSourceBytes: 100_000,
    ...overrides,
  };

  return {
    dir,
    settings,
    async writeSource(relPath, content) {
      const target = path.join(sourcesDir, relPath);
      await fsp.mkdir(path.dirname(target), { recursive: true });
      await fsp.writeFile(target, content);
      return target;
    },
    async removeSource(relPath) {
      await fsp.rm(path.join(sourcesDir, relPath), { force: true });
    },
    async writeLinks(lines) {
      await fsp.writeFile(settings.linksFilePath, `${lines.join('\n')}\n`);
    },
    readIndex() {
      return fsp.readFile(settings.indexPath, 'utf-8');
    },
    readCacheFile() {
      return fsp.readFile(settings.cachePath, 'utf-8');
    },
    async cleanup() {
      await fsp.rm(dir, { recursive: true, force: true });
    },
  };
}

/** Pins a file's mtime to a whole second so nanosecond values are predictable. */
export async function setMtime(filePath: string, epochSeconds: number): Promise<void> {
  await fsp.utimes(filePath, epochSeconds, epochSeconds);
}

export interface Harness {
  ws: Workspace;
  clock: FakeClock;
  summarizer: FakeSummarizer;
  fetcher: FakeFetcher;
  store: CacheStore;
  orchestrator: UpdateOrchestrator;
}

export async function createHarness(
  overrides: Partial<KnowledgeBaseSettings> = {}
): Promise<Harness> {
  const ws = await createWorkspace(overrides);
  const clock = new FakeClock();
  const summarizer = new FakeSummarizer();
  const fetcher = new FakeFetcher();
  const store = new CacheStore(ws.settings.cachePath, ws.settings.indexPath);
  const orchestrator = new UpdateOrchestrator({
    settings: ws.settings,
    store,
    lock: new UpdateLock(ws.settings.cachePath),
    enumerator: new SourceEnumerator(ws.settings),
    summarizer,
    fetcher,
    now: clock.now,
  });
  return { ws, clock, summarizer, fetcher, store, orchestrator };
}
