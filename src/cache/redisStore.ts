/**
 * Redis-backed persistent tier
 *
 * Alternative to the file store when several processes on different hosts
 * should share one cache. Each dataset key maps to one Redis string that
 * expires with the offline window, after which it could never be served.
 */

import { Redis } from 'ioredis';
import { CacheIOError, toError } from '../errors/index.js';
import { componentLogger } from '../core/logger.js';
import { storedEntrySchema, type PersistentStore, type StoredEntry } from './store.js';

/**
 * The Redis commands the store needs
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, expiryMode: 'EX', seconds: number): Promise<unknown>;
  quit(): Promise<unknown>;
}

/**
 * Generates Redis keys for cache records
 */
export const REDIS_KEYS = {
  /** Serialized cache entry for a dataset key id */
  entry: (id: string) => `courtside:cache:${id}`
};

export class RedisStore implements PersistentStore {
  constructor(
    private readonly redis: RedisCommands,
    private readonly expirySeconds: number
  ) {}

  async read(id: string): Promise<StoredEntry | null> {
    let raw: string | null;
    try {
      raw = await this.redis.get(REDIS_KEYS.entry(id));
    } catch (err) {
      throw new CacheIOError(`Failed to read ${id} from Redis`, 'get', toError(err));
    }
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new CacheIOError(`Corrupted Redis record for ${id}`, 'parse', toError(err));
    }
    const parsed = storedEntrySchema.safeParse(json);
    if (!parsed.success || parsed.data.key !== id) {
      throw new CacheIOError(`Redis record ${REDIS_KEYS.entry(id)} does not hold a record for ${id}`, 'parse');
    }
    return parsed.data;
  }

  async write(id: string, entry: StoredEntry): Promise<void> {
    try {
      await this.redis.set(REDIS_KEYS.entry(id), JSON.stringify(entry), 'EX', Math.max(1, Math.ceil(this.expirySeconds)));
    } catch (err) {
      throw new CacheIOError(`Failed to write ${id} to Redis`, 'setex', toError(err));
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

/**
 * Connects to Redis and wraps the client in a RedisStore
 *
 * Connection events are logged for monitoring; commands issued while the
 * server is unreachable fail fast and surface as CacheIOError.
 */
export function createRedisStore(url: string, expirySeconds: number): RedisStore {
  const log = componentLogger('redisStore');
  const redis = new Redis(url, { maxRetriesPerRequest: 1, enableOfflineQueue: false });
  redis.on('connect', () => log.info('Redis connected'));
  redis.on('error', (err) => log.error({ err }, 'Redis error'));
  return new RedisStore(redis, expirySeconds);
}
