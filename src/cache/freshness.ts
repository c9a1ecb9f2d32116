/**
 * Entry freshness
 *
 * Each cache entry moves one way through three states as it ages:
 *
 *   fresh ──(age > ttl)──▶ stale-usable ──(age > offline window)──▶ expired
 *
 * Only fresh and stale-usable payloads are ever handed to a caller.
 */

export type FreshnessState = 'fresh' | 'stale-usable' | 'expired';

/** The states a returned payload can carry */
export type ServedFreshness = Exclude<FreshnessState, 'expired'>;

/**
 * A cache entry. Owned by TieredCache, replaced on refresh, never mutated.
 */
export interface CacheEntry<T> {
  readonly key: string;
  readonly payload: T;
  /** Epoch milliseconds at which the fetch completed */
  readonly fetchedAt: number;
  readonly ttlSeconds: number;
}

export function ageSeconds(entry: Pick<CacheEntry<unknown>, 'fetchedAt'>, now: number): number {
  return Math.max(0, now - entry.fetchedAt) / 1000;
}

/**
 * Derives the state of an entry at `now`
 *
 * A window shorter than the TTL is widened to the TTL, so an entry never
 * skips from fresh straight to expired before its TTL runs out.
 */
export function freshnessOf(
  entry: Pick<CacheEntry<unknown>, 'fetchedAt'>,
  now: number,
  ttlSeconds: number,
  offlineWindowSeconds: number
): FreshnessState {
  const age = ageSeconds(entry, now);
  if (age <= ttlSeconds) return 'fresh';
  if (age <= Math.max(ttlSeconds, offlineWindowSeconds)) return 'stale-usable';
  return 'expired';
}

/**
 * Picks the entry with the larger fetchedAt; ties keep `a`
 */
export function newerOf<T>(a: CacheEntry<T> | null, b: CacheEntry<T> | null): CacheEntry<T> | null {
  if (!a) return b;
  if (!b) return a;
  return b.fetchedAt > a.fetchedAt ? b : a;
}
