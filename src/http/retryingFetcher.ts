/**
 * Retrying Fetcher
 *
 * Wraps a single upstream call with bounded exponential backoff. Every
 * attempt first passes through the shared RateLimiter.
 */

import { systemClock, type Clock } from '../core/clock.js';
import { componentLogger, type Logger } from '../core/logger.js';
import { RATE_LIMIT, RETRY } from '../core/constants.js';
import {
  CancelledError,
  RateLimitedError,
  UpstreamUnavailableError,
  isTransient,
  throwIfCancelled
} from '../errors/index.js';
import type { RateLimiter } from '../util/rateLimiter.js';

/**
 * One upstream call, described so it can be attempted repeatedly
 */
export interface FetchRequest<T> {
  /** Identifies the request in logs and errors (the cache key id) */
  label: string;
  run(signal?: AbortSignal): Promise<T>;
}

export interface RetryOptions {
  maxAttempts: number;
  backoffBaseMs: number;
  maxBackoffMs: number;
  jitterMs: number;
  /** Cooldown handed to the rate limiter after a 429 without Retry-After */
  rateLimitCooldownMs: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: RETRY.MAX_ATTEMPTS,
  backoffBaseMs: RETRY.BASE_DELAY_MS,
  maxBackoffMs: RETRY.MAX_DELAY_MS,
  jitterMs: RETRY.JITTER_MS,
  rateLimitCooldownMs: RATE_LIMIT.COOLDOWN_MS
};

export interface RetryingFetcherDeps {
  limiter: RateLimiter;
  clock?: Clock;
  options?: Partial<RetryOptions>;
  /** Source of jitter in [0, 1) */
  random?: () => number;
  logger?: Logger;
}

export class RetryingFetcher {
  private readonly limiter: RateLimiter;
  private readonly clock: Clock;
  private readonly options: RetryOptions;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(deps: RetryingFetcherDeps) {
    this.limiter = deps.limiter;
    this.clock = deps.clock ?? systemClock;
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...deps.options };
    this.random = deps.random ?? Math.random;
    this.logger = deps.logger ?? componentLogger('retryingFetcher');
  }

  /**
   * Delay before the attempt following `attempt` (1-based)
   *
   * backoffBaseMs * 2^(attempt-1), capped at maxBackoffMs, plus jitter
   */
  backoffMs(attempt: number): number {
    const { backoffBaseMs, maxBackoffMs, jitterMs } = this.options;
    const exponential = Math.min(maxBackoffMs, backoffBaseMs * 2 ** (attempt - 1));
    return exponential + Math.floor(this.random() * jitterMs);
  }

  /**
   * Runs the request, retrying transient failures
   *
   * @throws NonTransientUpstreamError (or any non-transient error) after the first failure
   * @throws UpstreamUnavailableError once maxAttempts transient failures have occurred
   * @throws CancelledError when the signal fires; nothing is returned after cancellation
   */
  async fetch<T>(request: FetchRequest<T>, signal?: AbortSignal): Promise<T> {
    const { maxAttempts, rateLimitCooldownMs } = this.options;
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      await this.limiter.acquire(signal);
      try {
        const result = await request.run(signal);
        throwIfCancelled(signal, request.label);
        if (attempt > 1) {
          this.logger.info({ key: request.label, attempt }, 'fetch succeeded after retry');
        }
        return result;
      } catch (err) {
        if (err instanceof CancelledError) throw err;
        throwIfCancelled(signal, request.label);
        if (!isTransient(err)) {
          this.logger.warn({ key: request.label, attempt, err }, 'non-transient upstream failure');
          throw err;
        }

        lastError = err;
        if (err instanceof RateLimitedError) {
          this.limiter.penalize(err.retryAfterMs ?? rateLimitCooldownMs);
        }
        if (attempt < maxAttempts) {
          const delayMs = this.backoffMs(attempt);
          this.logger.warn({ key: request.label, attempt, maxAttempts, delayMs, err: err.message }, 'transient upstream failure, retrying');
          await this.clock.sleep(delayMs, signal);
        }
      }
    }

    this.logger.error({ key: request.label, attempts: maxAttempts, err: lastError }, 'upstream unavailable');
    throw new UpstreamUnavailableError(
      `${request.label} unavailable after ${maxAttempts} attempts`,
      request.label,
      maxAttempts,
      lastError
    );
  }
}
