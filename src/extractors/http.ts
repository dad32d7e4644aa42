import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { FetchFailedError } from '../exceptions.js';
import { createLogger } from '../logging-config.js';
import { retryAsync } from '../utils.js';
import { htmlToMarkdown } from './markdown.js';
import {
  assertHttpUrl,
  isTransientFetchError,
  toFetchError,
  type ContentExtractor,
  type FetchOptions,
} from './views.js';

const logger = createLogger('structura.extractors.http');

const USER_AGENT = 'Mozilla/5.0 (compatible; StructuraBot/1.0)';

export interface HttpMarkdownExtractorOptions {
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  /** Responses larger than this are rejected (default: 10 MiB). */
  maxContentBytes?: number;
  adapter?: AxiosAdapter;
}

const isHtml = (contentType: string, body: string) =>
  /html/i.test(contentType) || (!contentType && /<html[\s>]/i.test(body));

/**
 * Plain GET plus turndown, used when no Firecrawl key is configured.
 */
export class HttpMarkdownExtractor implements ContentExtractor {
  readonly name = 'http';
  private readonly client: AxiosInstance;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: HttpMarkdownExtractorOptions = {}) {
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.client = axios.create({
      timeout: options.timeoutMs ?? 30000,
      maxContentLength: options.maxContentBytes ?? 10 * 1024 * 1024,
      maxRedirects: 5,
      responseType: 'text',
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8',
      },
      adapter: options.adapter,
    });
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<string> {
    assertHttpUrl(url);

    try {
      return await retryAsync(() => this.download(url, options.signal), {
        maxAttempts: this.maxRetries + 1,
        delayMs: this.retryDelayMs,
        backoffMultiplier: 2,
        shouldRetry: isTransientFetchError,
        onRetry: (error, attempt, nextDelayMs) =>
          logger.warning(
            `GET ${url} failed (attempt ${attempt}); retrying in ${Math.round(nextDelayMs)}ms`,
            error
          ),
        signal: options.signal,
      });
    } catch (error) {
      throw toFetchError(error, url);
    }
  }

  private async download(url: string, signal?: AbortSignal): Promise<string> {
    logger.debug(`Fetching ${url}`);
    const response = await this.client.get<string>(url, { signal });
    const body = typeof response.data === 'string' ? response.data : String(response.data ?? '');
    const contentType = String(response.headers['content-type'] ?? '');

    let markdown: string;
    if (isHtml(contentType, body)) {
      const converted = htmlToMarkdown(body, { url });
      logger.debug(`Converted ${url} to markdown`, converted.stats);
      markdown = converted.content;
    } else {
      markdown = body.trim();
    }
    if (!markdown) {
      throw new FetchFailedError(`Empty markdown content extracted from ${url}`);
    }
    return markdown;
  }
}
