/**
 * HTTP Utility Module
 *
 * Provides HTTP client functionality with support for:
 * - Per-request timeout and AbortSignal cancellation
 * - Retry-After parsing for rate-limited (429) responses
 * - Network failures surfaced as TransientUpstreamError
 */

import axios from 'axios';
import { CancelledError, TransientUpstreamError, toError } from '../errors/index.js';
import { logger } from '../core/logger.js';

/**
 * HTTP response structure
 */
export interface HttpResponse {
  status: number; // HTTP status code
  data: unknown; // Response body (parsed JSON when the server sent JSON)
  retryAfterMs?: number; // Retry-After header converted to milliseconds
}

export interface HttpGetOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type HttpGet = (url: string, options?: HttpGetOptions) => Promise<HttpResponse>;

/**
 * Converts a Retry-After header (delta seconds or HTTP date) to milliseconds
 *
 * @example
 * parseRetryAfter('3') // 3000
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value !== 'string' || value.trim() === '') return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const at = Date.parse(value);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

/**
 * Performs an HTTP GET request
 *
 * Never throws on HTTP errors (validateStatus: () => true); status mapping
 * belongs to the caller. Throws CancelledError when the signal fires and
 * TransientUpstreamError for network failures and timeouts.
 *
 * @param url - Full URL to request
 * @param options - Headers, timeout and cancellation signal
 */
export async function httpGet(url: string, options: HttpGetOptions = {}): Promise<HttpResponse> {
  const { headers = {}, timeoutMs, signal } = options;
  try {
    const res = await axios.get(url, { headers, timeout: timeoutMs, signal, validateStatus: () => true });

    // Log errors for non-2xx responses
    if (res.status >= 400) {
      logger.warn({ url, status: res.status }, 'HTTP request failed');
    }

    const retryAfterMs = parseRetryAfter(res.headers['retry-after']);
    return { status: res.status, data: res.data, retryAfterMs };
  } catch (err) {
    if (signal?.aborted || axios.isCancel(err)) {
      throw new CancelledError(`GET ${url}`);
    }
    const error = toError(err);
    throw new TransientUpstreamError(`HTTP request failed: ${error.message}`, url, 0, error);
  }
}
