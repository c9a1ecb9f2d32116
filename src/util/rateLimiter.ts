/**
 * Rate Limiter
 *
 * Enforces a minimum spacing between outbound calls to the upstream
 * service. One instance is shared by every fetch path.
 */

import { systemClock, type Clock } from '../core/clock.js';
import { componentLogger, type Logger } from '../core/logger.js';
import { CancelledError, throwIfCancelled } from '../errors/index.js';

export class RateLimiter {
  private lastRequestAt: number | null = null;
  private cooldownMs = 0;
  /** Tail of the acquisition queue; grants run one at a time in call order */
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock,
    private readonly logger: Logger = componentLogger('rateLimiter')
  ) {}

  /**
   * Waits until `minIntervalMs` (plus any pending cooldown) has elapsed since
   * the previous grant, then records the new grant time.
   *
   * A cancelled acquisition rejects with CancelledError as soon as its
   * signal fires, even while queued behind other callers, and leaves
   * `lastRequestAt` untouched.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.queue.then(() => this.grant(signal));
    // The caller observes the rejection through `turn`; the queue only needs to keep moving.
    this.queue = turn.catch(() => undefined);
    if (!signal) return turn;

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => reject(new CancelledError('rate limiter acquisition'));
      if (signal.aborted) onAbort();
      else signal.addEventListener('abort', onAbort, { once: true });
      void turn.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
    });
  }

  /**
   * Pushes the next window back by `ms` (adaptive back-pressure after a 429)
   */
  penalize(ms: number): void {
    this.cooldownMs = Math.max(this.cooldownMs, ms);
    this.logger.warn({ cooldownMs: this.cooldownMs }, 'upstream rate limit, cooling down');
  }

  /** Milliseconds the next acquisition would wait right now */
  pendingWaitMs(): number {
    if (this.lastRequestAt === null) return this.cooldownMs;
    const nextAt = this.lastRequestAt + this.minIntervalMs + this.cooldownMs;
    return Math.max(0, nextAt - this.clock.now());
  }

  private async grant(signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal, 'rate limiter acquisition');
    const waitMs = this.pendingWaitMs();
    if (waitMs > 0) {
      this.logger.debug({ waitMs }, 'rate limit: waiting');
      await this.clock.sleep(waitMs, signal);
    }
    this.lastRequestAt = this.clock.now();
    this.cooldownMs = 0;
  }
}
