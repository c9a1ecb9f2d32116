import { describe, it, expect } from 'vitest';
import { RateLimiter } from '../../src/util/rateLimiter.js';
import { CancelledError } from '../../src/errors/index.js';
import { FakeClock, ManualClock, flush } from '../helpers/fakeClock.js';

describe('RateLimiter', () => {
  it('should grant the first acquisition immediately', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(600, clock);

    await limiter.acquire();

    expect(clock.sleeps).toEqual([]);
  });

  it('should space consecutive acquisitions by the minimum interval', async () => {
    const clock = new FakeClock();
    const start = clock.now();
    const limiter = new RateLimiter(600, clock);

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(clock.sleeps).toEqual([600, 600]);
    expect(clock.now() - start).toBe(1200);
  });

  it('should only wait for the remainder of the interval', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(600, clock);

    await limiter.acquire();
    clock.advance(450);
    await limiter.acquire();

    expect(clock.sleeps).toEqual([150]);
  });

  it('should not wait when the interval has already elapsed', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(600, clock);

    await limiter.acquire();
    clock.advance(1000);
    await limiter.acquire();

    expect(clock.sleeps).toEqual([]);
  });

  it('should add a penalty to the next window only', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(600, clock);

    await limiter.acquire();
    limiter.penalize(5000);
    expect(limiter.pendingWaitMs()).toBe(5600);

    await limiter.acquire();
    await limiter.acquire();

    expect(clock.sleeps).toEqual([5600, 600]);
  });

  it('should keep the larger of two penalties', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(600, clock);

    limiter.penalize(3000);
    limiter.penalize(1000);
    await limiter.acquire();

    expect(clock.sleeps).toEqual([3000]);
  });

  it('should reject a cancelled acquisition without recording it', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(600, clock);
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(CancelledError);
    await limiter.acquire();

    expect(clock.sleeps).toEqual([]);
  });

  it('should abandon a waiting acquisition when its signal fires', async () => {
    const clock = new ManualClock();
    const limiter = new RateLimiter(600, clock);
    const controller = new AbortController();

    await limiter.acquire();
    const waiting = limiter.acquire(controller.signal);
    await flush();
    expect(clock.pendingSleeps).toEqual([600]);

    controller.abort();
    await expect(waiting).rejects.toBeInstanceOf(CancelledError);

    // the abandoned turn left lastRequestAt alone, so the next caller still owes the full interval
    const next = limiter.acquire();
    await flush();
    expect(clock.pendingSleeps).toEqual([600]);
    clock.releaseNext();
    await next;
  });

  it('should reject a queued acquisition as soon as its signal fires', async () => {
    const clock = new ManualClock();
    const limiter = new RateLimiter(600, clock);
    const controller = new AbortController();

    await limiter.acquire();
    const ahead = limiter.acquire();
    const queued = limiter.acquire(controller.signal);
    await flush();
    expect(clock.pendingSleeps).toEqual([600]);

    controller.abort();
    await expect(queued).rejects.toBeInstanceOf(CancelledError);
    expect(clock.pendingSleeps).toEqual([600]);

    clock.releaseNext();
    await ahead;
    const next = limiter.acquire();
    await flush();
    expect(clock.pendingSleeps).toEqual([600]);
    clock.releaseNext();
    await next;
  });
});
