import axios from 'axios';
import {
  CancelledError,
  FetchFailedError,
  InvalidInputError,
  isExtractionError,
  type ExtractionError,
} from '../exceptions.js';
import { TimeoutError } from '../utils.js';

export interface FetchOptions {
  signal?: AbortSignal;
}

/** Turns a page URL into markdown. */
export interface ContentExtractor {
  readonly name: string;
  fetch(url: string, options?: FetchOptions): Promise<string>;
}

/**
 * Checked before any network call: only absolute http(s) URLs are fetched.
 */
export const assertHttpUrl = (url: string): URL => {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidInputError(`Invalid URL: ${url}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidInputError(`Unsupported URL scheme '${parsed.protocol}' in ${url}`);
  }
  return parsed;
};

// Everything else (DNS, redirect loops, oversized bodies, bad options) fails the same way again.
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EPIPE',
  'ERR_NETWORK',
  'ESOCKETTIMEDOUT',
]);

/**
 * Timeouts, dropped connections, 5xx and 429 are worth another attempt.
 */
export const isTransientFetchError = (error: unknown): boolean => {
  if (error instanceof TimeoutError) {
    return true;
  }
  if (!axios.isAxiosError(error) || axios.isCancel(error)) {
    return false;
  }
  const status = error.response?.status;
  if (status !== undefined) {
    return status === 429 || status >= 500;
  }
  return error.code !== undefined && TRANSIENT_NETWORK_CODES.has(error.code);
};

/** Normalise whatever a fetch threw into the pipeline's error kinds. */
export const toFetchError = (error: unknown, url: string): ExtractionError => {
  if (isExtractionError(error)) {
    return error;
  }
  if (axios.isCancel(error)) {
    return new CancelledError();
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const reason = status !== undefined ? `HTTP ${status}` : error.code ?? error.message;
    return new FetchFailedError(`Failed to fetch ${url}: ${reason}`, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new FetchFailedError(`Failed to fetch ${url}: ${message}`, { cause: error });
};
