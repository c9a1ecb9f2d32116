/**
 * Persistent cache tier contract
 *
 * One record per dataset key, surviving process restarts. Implementations
 * report I/O failures as CacheIOError; a missing record is `null`.
 */

import { z } from 'zod';

/**
 * Serialized form of a cache entry. The payload stays opaque here and is
 * decoded by the cache that owns the key.
 */
export const storedEntrySchema = z.object({
  key: z.string(),
  fetchedAt: z.number(),
  ttlSeconds: z.number(),
  payload: z.unknown()
});

export type StoredEntry = z.infer<typeof storedEntrySchema>;

export interface PersistentStore {
  read(id: string): Promise<StoredEntry | null>;
  write(id: string, entry: StoredEntry): Promise<void>;
  close(): Promise<void>;
}
