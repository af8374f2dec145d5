import axios, { type AxiosInstance, type RawAxiosRequestHeaders } from 'axios';
import * as cheerio from 'cheerio';
import { errorMessage } from '../core/kb/errors.js';
import type {
  ContentFetcher,
  FetchRequest,
  FetchResult,
} from '../core/kb/types.js';

export interface WebFetcherOptions {
  timeoutMs: number;
  maxSourceBytes: number;
  /** Injected in tests; defaults to a configured axios instance. */
  http?: AxiosInstance;
}

export function createHttpClient(timeoutMs: number): AxiosInstance {
  return axios.create({
    timeout: timeoutMs,
    headers: {
      'User-Agent': 'KnowledgeBaseIndexer/1.0',
      Accept: 'text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8',
    },
    maxRedirects: 5,
    responseType: 'text',
    // 304 is an answer to a conditional request, not an error.
    validateStatus: (status) => (status >= 200 && status < 300) || status === 304,
  });
}

/** Extracts readable text from an HTML page, dropping navigation chrome. */
export function extractPageText(html: string): string {
  const $ = cheerio.load(html);
  const title =
    $('head title').text().trim() || $('h1').first().text().trim() || '';

  $(
    'script, style, nav, header, footer, aside, .sidebar, .toc, .menu, .navigation, .ads, .advertisement, noscript'
  ).remove();

  let contentElement = $('main').first();
  if (!contentElement.length) contentElement = $('article').first();
  if (!contentElement.length) contentElement = $('.content').first();
  if (!contentElement.length) contentElement = $('#content').first();
  if (!contentElement.length) contentElement = $('body');

  const content = contentElement
    .text()
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');

  return title && !content.startsWith(title) ? `${title}\n${content}` : content;
}

function headerValue(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * HTTP implementation of the content-fetch capability. Sends conditional
 * headers from cached validators and maps every outcome to a FetchResult.
 */
export class WebFetcher implements ContentFetcher {
  private readonly http: AxiosInstance;

  constructor(private readonly options: WebFetcherOptions) {
    this.http = options.http ?? createHttpClient(options.timeoutMs);
  }

  public async fetch(
    request: FetchRequest,
    signal?: AbortSignal
  ): Promise<FetchResult> {
    const headers: RawAxiosRequestHeaders = {};
    if (request.etag) headers['If-None-Match'] = request.etag;
    if (request.lastModified) headers['If-Modified-Since'] = request.lastModified;

    try {
      const response = await this.http.get<string>(request.url, {
        headers,
        signal,
        timeout: this.options.timeoutMs,
        maxContentLength: this.options.maxSourceBytes,
        responseType: 'text',
      });
      const etag = headerValue(response.headers['etag']);
      const lastModified = headerValue(response.headers['last-modified']);

      if (response.status === 304) {
        return { status: 'not_modified', etag, lastModified };
      }

      const body = typeof response.data === 'string' ? response.data : '';
      const contentType = String(response.headers['content-type'] ?? '');
      const bodyText = /html/i.test(contentType) ? extractPageText(body) : body;
      return { status: 'success', bodyText, etag, lastModified };
    } catch (error) {
      if (
        axios.isAxiosError(error) &&
        (error.code === 'ECONNABORTED' ||
          error.code === 'ETIMEDOUT' ||
          error.code === 'ERR_CANCELED')
      ) {
        return { status: 'timeout', error: error.message };
      }
      if (axios.isAxiosError(error) && error.response) {
        return {
          status: 'error',
          error: `HTTP ${error.response.status} from ${request.url}`,
        };
      }
      return { status: 'error', error: errorMessage(error) };
    }
  }
}
