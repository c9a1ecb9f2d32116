/**
 * Tiered Cache
 *
 * Read-through cache for one dataset kind, and the only path from callers
 * to the network. Entries live in memory and in a persistent store; the
 * persistent tier is read lazily, the first time a key is needed and
 * memory has nothing fresh for it.
 *
 * Read path:
 * 1. Memory, then the persistent tier; the copy with the larger fetchedAt wins
 * 2. Fresh and not invalidated: returned without a network call
 * 3. Otherwise one fetch through the RetryingFetcher, serialized per key
 * 4. On failure, a non-expired copy is served as stale-usable
 */

import { systemClock, type Clock } from '../core/clock.js';
import { componentLogger, type Logger } from '../core/logger.js';
import {
  CacheIOError,
  CancelledError,
  UpstreamUnavailableError,
  throwIfCancelled,
  toError
} from '../errors/index.js';
import type { RetryingFetcher } from '../http/retryingFetcher.js';
import { KeyedMutex } from '../util/keyedMutex.js';
import { freshnessOf, newerOf, type CacheEntry, type ServedFreshness } from './freshness.js';
import { keyId, type DatasetKey } from './keys.js';
import type { PersistentStore } from './store.js';

export interface CacheResult<T> {
  payload: T;
  freshness: ServedFreshness;
  /** Epoch milliseconds of the fetch that produced the payload */
  fetchedAt: number;
}

export interface TieredCacheOptions<K extends DatasetKey, T> {
  /** Dataset name for logs */
  name: string;
  /** Performs one upstream request for the key */
  load: (key: K, signal?: AbortSignal) => Promise<T>;
  /** Validates a payload read back from the persistent tier */
  decode: (raw: unknown) => T;
  fetcher: RetryingFetcher;
  /** Persistent tier; null keeps the cache memory-only */
  store: PersistentStore | null;
  ttlSeconds: number;
  offlineWindowSeconds: number;
  clock?: Clock;
  logger?: Logger;
}

export class TieredCache<K extends DatasetKey, T> {
  private readonly memory = new Map<string, CacheEntry<T>>();
  private readonly invalidated = new Set<string>();
  /** Keys whose persistent tier failed a write; cached in memory only from then on */
  private readonly diskDisabled = new Set<string>();
  private readonly mutex = new KeyedMutex();
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly options: TieredCacheOptions<K, T>) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? componentLogger('tieredCache', { dataset: options.name });
  }

  /**
   * Returns the payload for `key` with its freshness
   *
   * @param ttlSeconds freshness limit for this read; defaults to the dataset TTL
   * @throws UpstreamUnavailableError when the fetch fails and no non-expired copy exists
   * @throws CancelledError when the signal fires; neither tier is written
   */
  async get(key: K, ttlSeconds: number = this.options.ttlSeconds, signal?: AbortSignal): Promise<CacheResult<T>> {
    const id = keyId(key);
    throwIfCancelled(signal, `get ${id}`);

    const cached = await this.lookup(id, ttlSeconds);
    if (cached && !this.invalidated.has(id) && this.stateOf(cached, ttlSeconds) === 'fresh') {
      return this.served(cached, 'fresh');
    }

    return this.mutex.run(id, async () => {
      // another caller may have refreshed the key while this one queued
      const current = await this.lookup(id, ttlSeconds);
      if (current && !this.invalidated.has(id) && this.stateOf(current, ttlSeconds) === 'fresh') {
        return this.served(current, 'fresh');
      }
      return this.refresh(key, id, ttlSeconds, signal);
    });
  }

  /**
   * Makes the next `get` for the key skip the fresh fast path. The cached
   * copy stays available as a fallback.
   */
  invalidate(key: K): void {
    this.invalidated.add(keyId(key));
  }

  invalidateAll(): void {
    for (const id of this.memory.keys()) this.invalidated.add(id);
  }

  /** Number of entries held in memory */
  get size(): number {
    return this.memory.size;
  }

  private async refresh(key: K, id: string, ttlSeconds: number, signal?: AbortSignal): Promise<CacheResult<T>> {
    const { fetcher, load } = this.options;
    try {
      const payload = await fetcher.fetch({ label: id, run: s => load(key, s) }, signal);
      throwIfCancelled(signal, `get ${id}`);
      const entry: CacheEntry<T> = { key: id, payload, fetchedAt: this.clock.now(), ttlSeconds };
      const committed = await this.commit(entry);
      this.invalidated.delete(id);
      return this.served(committed, 'fresh');
    } catch (err) {
      if (err instanceof CancelledError) throw err;

      const fallback = await this.lookup(id, ttlSeconds);
      if (fallback && this.stateOf(fallback, ttlSeconds) !== 'expired') {
        this.logger.warn(
          { key: id, fetchedAt: fallback.fetchedAt, err: toError(err).message },
          'upstream failed, serving cached copy'
        );
        return this.served(fallback, 'stale-usable');
      }

      if (err instanceof UpstreamUnavailableError) throw err;
      throw new UpstreamUnavailableError(`${id} unavailable: ${toError(err).message}`, id, 1, toError(err));
    }
  }

  /**
   * Stores a completed fetch in both tiers unless a newer entry is already there
   */
  private async commit(entry: CacheEntry<T>): Promise<CacheEntry<T>> {
    // a completion never replaces an entry fetched later than itself
    const winner = newerOf(entry, this.memory.get(entry.key) ?? null) ?? entry;
    this.memory.set(entry.key, winner);
    if (winner !== entry) return winner;

    const { store } = this.options;
    if (!store || this.diskDisabled.has(entry.key)) return winner;
    try {
      await store.write(entry.key, {
        key: entry.key,
        fetchedAt: entry.fetchedAt,
        ttlSeconds: entry.ttlSeconds,
        payload: entry.payload
      });
    } catch (err) {
      this.diskDisabled.add(entry.key);
      this.logger.warn({ key: entry.key, err: toError(err).message }, 'persistent tier write failed, caching in memory only');
    }
    return winner;
  }

  /**
   * Current entry for a key across both tiers. Expired entries are evicted
   * from memory and never returned.
   */
  private async lookup(id: string, ttlSeconds: number): Promise<CacheEntry<T> | null> {
    let entry = this.memory.get(id) ?? null;
    if (!entry || this.stateOf(entry, ttlSeconds) !== 'fresh') {
      const persisted = await this.readPersisted(id);
      // a fetch may have committed to memory while the read was pending
      entry = newerOf(this.memory.get(id) ?? null, persisted);
    }
    if (!entry || this.stateOf(entry, ttlSeconds) === 'expired') {
      this.memory.delete(id);
      return null;
    }
    this.memory.set(id, entry);
    return entry;
  }

  private async readPersisted(id: string): Promise<CacheEntry<T> | null> {
    const { store, decode } = this.options;
    if (!store || this.diskDisabled.has(id)) return null;
    try {
      const stored = await store.read(id);
      if (!stored) return null;
      return { key: id, payload: decode(stored.payload), fetchedAt: stored.fetchedAt, ttlSeconds: stored.ttlSeconds };
    } catch (err) {
      const reason = err instanceof CacheIOError ? err.message : `undecodable payload: ${toError(err).message}`;
      this.logger.warn({ key: id, err: reason }, 'ignoring unreadable persisted entry');
      return null;
    }
  }

  private stateOf(entry: CacheEntry<T>, ttlSeconds: number) {
    return freshnessOf(entry, this.clock.now(), ttlSeconds, this.options.offlineWindowSeconds);
  }

  private served(entry: CacheEntry<T>, freshness: ServedFreshness): CacheResult<T> {
    return { payload: entry.payload, freshness, fetchedAt: entry.fetchedAt };
  }
}
