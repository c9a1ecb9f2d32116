/**
 * File-backed persistent tier
 *
 * One JSON file per dataset key under the cache directory. Writes go to a
 * temporary file first and are renamed into place, so readers see either
 * the previous record or the new one, never a partial file.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { CacheIOError, toError } from '../errors/index.js';
import { storedEntrySchema, type PersistentStore, type StoredEntry } from './store.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Maps a key id to a file name ('games:2025-02-13' -> 'games_2025-02-13.json')
 */
export function fileNameFor(id: string): string {
  return `${id.replace(/[^A-Za-z0-9._-]/g, '_')}.json`;
}

export class FileStore implements PersistentStore {
  private dirReady: Promise<void> | null = null;

  constructor(private readonly dir: string) {}

  pathFor(id: string): string {
    return path.join(this.dir, fileNameFor(id));
  }

  /**
   * @returns the stored record, or null when no file exists
   * @throws CacheIOError when the file is unreadable or not a valid record
   */
  async read(id: string): Promise<StoredEntry | null> {
    const file = this.pathFor(id);
    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new CacheIOError(`Failed to read cache file ${file}`, 'read', toError(err));
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new CacheIOError(`Corrupted cache file ${file}`, 'parse', toError(err));
    }

    const parsed = storedEntrySchema.safeParse(json);
    if (!parsed.success || parsed.data.key !== id) {
      throw new CacheIOError(`Cache file ${file} does not hold a record for ${id}`, 'parse');
    }
    return parsed.data;
  }

  async write(id: string, entry: StoredEntry): Promise<void> {
    const file = this.pathFor(id);
    const tmp = `${file}.${randomUUID()}.tmp`;
    try {
      await this.ensureDir();
      await writeFile(tmp, JSON.stringify(entry), 'utf8');
      await rename(tmp, file);
    } catch (err) {
      // the write error below is what the caller sees; leftover temp files are harmless
      await rm(tmp, { force: true }).catch(() => undefined);
      throw new CacheIOError(`Failed to write cache file ${file}`, 'write', toError(err));
    }
  }

  async close(): Promise<void> {
    // nothing held open between operations
  }

  private ensureDir(): Promise<void> {
    if (!this.dirReady) {
      this.dirReady = mkdir(this.dir, { recursive: true }).then(() => undefined);
      this.dirReady.catch(() => {
        this.dirReady = null;
      });
    }
    return this.dirReady;
  }
}
