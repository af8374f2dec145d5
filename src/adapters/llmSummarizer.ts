import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { SummarizerError, errorMessage } from '../core/kb/errors.js';
import type { SummarizeRequest, Summarizer } from '../core/kb/types.js';

export interface LlmSummarizerOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  systemPrompt?: string;
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

/**
 * Summarizer backed by an OpenAI-compatible chat completions endpoint.
 */
export class LlmSummarizer implements Summarizer {
  private readonly http: AxiosInstance;

  constructor(
    private readonly options: LlmSummarizerOptions,
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create();
  }

  public async summarize(
    request: SummarizeRequest,
    signal?: AbortSignal
  ): Promise<string> {
    if (!request.text.trim()) {
      return '';
    }

    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    const messages: { role: 'system' | 'user'; content: string }[] = [];
    if (this.options.systemPrompt) {
      messages.push({ role: 'system', content: this.options.systemPrompt });
    }
    messages.push({ role: 'user', content: request.text });

    let data: unknown;
    try {
      const response = await this.http.post(
        url,
        { model: this.options.model, messages, temperature: 0 },
        {
          headers: {
            Authorization: `Bearer ${this.options.apiKey}`,
            'Content-Type': 'application/json',
          },
          signal,
        }
      );
      data = response.data;
    } catch (error) {
      const status =
        axios.isAxiosError(error) && error.response
          ? ` (HTTP ${error.response.status})`
          : '';
      throw new SummarizerError(
        `LLM request failed for ${request.sourceId}${status}: ${errorMessage(error)}`,
        request.sourceId,
        { cause: error }
      );
    }

    const parsed = completionSchema.safeParse(data);
    if (!parsed.success) {
      throw new SummarizerError(
        `Unexpected LLM response for ${request.sourceId}`,
        request.sourceId
      );
    }
    return (parsed.data.choices[0]?.message.content ?? '').trim();
  }
}
