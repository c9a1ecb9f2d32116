import { describe, it, expect, vi } from 'vitest';
import { RetryingFetcher, type FetchRequest } from '../../src/http/retryingFetcher.js';
import { RateLimiter } from '../../src/util/rateLimiter.js';
import {
  CancelledError,
  NonTransientUpstreamError,
  RateLimitedError,
  TransientUpstreamError,
  UpstreamUnavailableError
} from '../../src/errors/index.js';
import { FakeClock } from '../helpers/fakeClock.js';

const BRIDGE_URL = 'http://localhost:8000/standings';

function setup(random = () => 0) {
  const clock = new FakeClock();
  const limiter = new RateLimiter(600, clock);
  const fetcher = new RetryingFetcher({ limiter, clock, random });
  return { clock, limiter, fetcher };
}

function request<T>(run: FetchRequest<T>['run']): FetchRequest<T> {
  return { label: 'standings', run };
}

describe('RetryingFetcher', () => {
  it('should return the payload of a successful first attempt', async () => {
    const { fetcher, clock } = setup();
    const run = vi.fn(async () => 'payload');

    await expect(fetcher.fetch(request(run))).resolves.toBe('payload');
    expect(run).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('should back off exponentially between transient failures', async () => {
    const { fetcher, clock } = setup();
    const run = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientUpstreamError('timeout', BRIDGE_URL, 0))
      .mockRejectedValueOnce(new TransientUpstreamError('bad gateway', BRIDGE_URL, 502))
      .mockResolvedValueOnce('payload');

    await expect(fetcher.fetch(request(run))).resolves.toBe('payload');

    expect(run).toHaveBeenCalledTimes(3);
    // backoff sleeps only; by then the 600ms rate-limit window has passed
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it('should fail with UpstreamUnavailableError carrying the last error once attempts run out', async () => {
    const { fetcher, clock } = setup();
    const last = new TransientUpstreamError('service unavailable', BRIDGE_URL, 503);
    const run = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientUpstreamError('timeout', BRIDGE_URL, 0))
      .mockRejectedValueOnce(new TransientUpstreamError('timeout', BRIDGE_URL, 0))
      .mockRejectedValueOnce(last);

    const err = await fetcher.fetch(request(run)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamUnavailableError);
    expect(err).toMatchObject({ key: 'standings', attempts: 3, cause: last });
    expect(run).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it('should not retry a non-transient failure', async () => {
    const { fetcher, clock } = setup();
    const rejected = new NonTransientUpstreamError('Upstream returned 404', BRIDGE_URL, 404);
    const run = vi.fn<() => Promise<string>>().mockRejectedValue(rejected);

    await expect(fetcher.fetch(request(run))).rejects.toBe(rejected);
    expect(run).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('should push the rate limiter window back after a 429', async () => {
    const { fetcher, clock } = setup();
    const run = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new RateLimitedError('Rate limited', BRIDGE_URL))
      .mockResolvedValueOnce('payload');

    await fetcher.fetch(request(run));

    // 1000ms backoff, then the rest of the 600ms window plus the 5000ms cooldown
    expect(clock.sleeps).toEqual([1000, 4600]);
  });

  it('should use Retry-After as the cooldown when upstream sends it', async () => {
    const { fetcher, clock } = setup();
    const run = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new RateLimitedError('Rate limited', BRIDGE_URL, 2000))
      .mockResolvedValueOnce('payload');

    await fetcher.fetch(request(run));

    expect(clock.sleeps).toEqual([1000, 1600]);
  });

  it('should add jitter and cap the exponential delay', () => {
    const { fetcher } = setup(() => 0.5);

    expect(fetcher.backoffMs(1)).toBe(1125);
    expect(fetcher.backoffMs(3)).toBe(4125);
    expect(fetcher.backoffMs(5)).toBe(10125);
  });

  it('should stop without calling upstream when already cancelled', async () => {
    const { fetcher } = setup();
    const controller = new AbortController();
    controller.abort();
    const run = vi.fn(async () => 'payload');

    await expect(fetcher.fetch(request(run), controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(run).not.toHaveBeenCalled();
  });

  it('should discard a result that arrives after cancellation', async () => {
    const { fetcher } = setup();
    const controller = new AbortController();
    const run = vi.fn(async () => {
      controller.abort();
      return 'late payload';
    });

    await expect(fetcher.fetch(request(run), controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});
