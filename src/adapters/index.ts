import type { AppConfig } from '../config/index.js';
import { KnowledgeBase } from '../core/kb/knowledgeBase.js';
import { LlmSummarizer } from './llmSummarizer.js';
import { WebFetcher } from './webFetcher.js';

/** Wires the knowledge base to the production summarizer and fetcher. */
export function createKnowledgeBase(appConfig: AppConfig): KnowledgeBase {
  const settings = appConfig.knowledgeBase;
  if (!appConfig.llm.apiKey) {
    console.warn(
      'LLM_API_KEY is not set; summarization requests will likely be rejected.'
    );
  }
  return new KnowledgeBase({
    settings,
    summarizer: new LlmSummarizer(appConfig.llm),
    fetcher: new WebFetcher({
      timeoutMs: settings.fetchTimeoutMs,
      maxSourceBytes: settings.maxSourceBytes,
    }),
  });
}
