import path from 'node:path';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';
import { z } from 'zod';
import type {
  KnowledgeBaseSettings,
  WatchSettings,
} from '../core/kb/types.js';
import type { LlmSummarizerOptions } from '../adapters/llmSummarizer.js';

dotenv.config();

// Helper to get __dirname in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Resolve project root assuming config is in src/config
const projectRoot = path.resolve(__dirname, '..', '..');

const DEFAULT_SUMMARIZATION_PROMPT =
  'You maintain the index of a knowledge base. Describe the following source in a short paragraph: ' +
  'what it covers, which questions it can answer, and the key terms a reader would search for. ' +
  'Reply with the description only.';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const seconds = (fallback: number) =>
  z.coerce.number().nonnegative().default(fallback);

const count = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  KB_SOURCES_DIR: z.string().default('files/sources'),
  KB_LINKS_FILE: z.string().default('files/links.txt'),
  KB_CACHE_PATH: z.string().default('files/index/kb-cache.json'),
  KB_INDEX_PATH: z.string().default('files/index/index.txt'),
  KB_URL_MIN_REFRESH_SECONDS: seconds(3600),
  KB_URL_MAX_AGE_SECONDS: seconds(7 * 24 * 3600),
  KB_URL_MANUAL_BUDGET: count(50),
  KB_URL_TICK_BUDGET: count(10),
  KB_URL_BACKOFF_BASE_SECONDS: seconds(60),
  KB_URL_BACKOFF_MAX_SECONDS: seconds(24 * 3600),
  KB_URL_REFRESH_INTERVAL_SECONDS: z.coerce.number().positive().default(900),
  KB_WATCH_FILES: booleanFlag.default('true'),
  KB_WATCH_LINKS: booleanFlag.default('true'),
  KB_FILE_DEBOUNCE_MS: count(1000),
  KB_LINKS_DEBOUNCE_MS: count(1000),
  KB_SUMMARIZE_TIMEOUT_SECONDS: z.coerce.number().positive().default(60),
  KB_FETCH_TIMEOUT_SECONDS: z.coerce.number().positive().default(30),
  KB_MAX_SOURCE_BYTES: z.coerce.number().int().positive().default(1_000_000),
  LLM_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  LLM_API_KEY: z.string().default(''),
  LLM_MODEL: z.string().min(1).default('gpt-4o-mini'),
  KB_SUMMARIZATION_PROMPT: z.string().default(DEFAULT_SUMMARIZATION_PROMPT),
});

export interface AppConfig {
  serverName: string;
  projectRoot: string;
  knowledgeBase: KnowledgeBaseSettings;
  watch: WatchSettings;
  llm: LlmSummarizerOptions;
}

function resolvePath(value: string, root: string): string {
  return path.isAbsolute(value) ? value : path.join(root, value);
}

/**
 * Builds the application configuration from environment variables.
 * Relative paths are resolved against `root`.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  root: string = projectRoot
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;

  return {
    serverName: 'knowledge-base',
    projectRoot: root,
    knowledgeBase: {
      sourcesDir: resolvePath(e.KB_SOURCES_DIR, root),
      linksFilePath: resolvePath(e.KB_LINKS_FILE, root),
      cachePath: resolvePath(e.KB_CACHE_PATH, root),
      indexPath: resolvePath(e.KB_INDEX_PATH, root),
      urlMinRefreshMs: e.KB_URL_MIN_REFRESH_SECONDS * 1000,
      urlMaxAgeMs: e.KB_URL_MAX_AGE_SECONDS * 1000,
      manualUrlBudget: e.KB_URL_MANUAL_BUDGET,
      tickUrlBudget: e.KB_URL_TICK_BUDGET,
      backoffBaseMs: e.KB_URL_BACKOFF_BASE_SECONDS * 1000,
      backoffMaxMs: e.KB_URL_BACKOFF_MAX_SECONDS * 1000,
      summarizeTimeoutMs: e.KB_SUMMARIZE_TIMEOUT_SECONDS * 1000,
      fetchTimeoutMs: e.KB_FETCH_TIMEOUT_SECONDS * 1000,
      maxSourceBytes: e.KB_MAX_SOURCE_BYTES,
    },
    watch: {
      refreshIntervalMs: e.KB_URL_REFRESH_INTERVAL_SECONDS * 1000,
      watchFiles: e.KB_WATCH_FILES,
      watchLinks: e.KB_WATCH_LINKS,
      fileDebounceMs: e.KB_FILE_DEBOUNCE_MS,
      linksDebounceMs: e.KB_LINKS_DEBOUNCE_MS,
    },
    llm: {
      baseUrl: e.LLM_BASE_URL,
      apiKey: e.LLM_API_KEY,
      model: e.LLM_MODEL,
      systemPrompt: e.KB_SUMMARIZATION_PROMPT,
    },
  };
}

export const config: AppConfig = loadConfig();
