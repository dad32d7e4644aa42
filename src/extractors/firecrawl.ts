import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { FetchFailedError } from '../exceptions.js';
import { createLogger } from '../logging-config.js';
import { retryAsync } from '../utils.js';
import {
  assertHttpUrl,
  isTransientFetchError,
  toFetchError,
  type ContentExtractor,
  type FetchOptions,
} from './views.js';

const logger = createLogger('structura.extractors.firecrawl');

interface FirecrawlScrapeResponse {
  success: boolean;
  data?: {
    markdown?: string;
    metadata?: {
      title?: string;
      sourceURL?: string;
      statusCode?: number;
    };
  };
  error?: string;
}

export interface FirecrawlExtractorOptions {
  apiKey: string;
  /** Firecrawl API URL (default: https://api.firecrawl.dev) */
  apiUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Retries after the first attempt for transient failures (default: 2) */
  maxRetries?: number;
  retryDelayMs?: number;
  adapter?: AxiosAdapter;
}

/**
 * Markdown via Firecrawl's scrape endpoint, main content only.
 */
export class FirecrawlExtractor implements ContentExtractor {
  readonly name = 'firecrawl';
  private readonly client: AxiosInstance;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: FirecrawlExtractorOptions) {
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.client = axios.create({
      baseURL: options.apiUrl ?? 'https://api.firecrawl.dev',
      timeout: options.timeoutMs ?? 30000,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${options.apiKey}`,
      },
      adapter: options.adapter,
    });
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<string> {
    assertHttpUrl(url);

    try {
      return await retryAsync(() => this.scrape(url, options.signal), {
        maxAttempts: this.maxRetries + 1,
        delayMs: this.retryDelayMs,
        backoffMultiplier: 2,
        shouldRetry: isTransientFetchError,
        onRetry: (error, attempt, nextDelayMs) =>
          logger.warning(
            `Scrape of ${url} failed (attempt ${attempt}); retrying in ${Math.round(nextDelayMs)}ms`,
            error
          ),
        signal: options.signal,
      });
    } catch (error) {
      throw toFetchError(error, url);
    }
  }

  private async scrape(url: string, signal?: AbortSignal): Promise<string> {
    logger.debug(`Scraping ${url}`);
    const response = await this.client.post<FirecrawlScrapeResponse>(
      '/v1/scrape',
      {
        url,
        formats: ['markdown'],
        onlyMainContent: true,
      },
      { signal }
    );

    if (!response.data.success) {
      throw new FetchFailedError(
        `Firecrawl could not scrape ${url}: ${response.data.error || 'Unknown error'}`
      );
    }
    const markdown = response.data.data?.markdown ?? '';
    if (!markdown.trim()) {
      throw new FetchFailedError(`Empty markdown content extracted from ${url}`);
    }
    return markdown;
  }
}
