import { CacheIOError } from '../../src/errors/index.js';
import type { PersistentStore, StoredEntry } from '../../src/cache/store.js';

/**
 * In-process persistent tier. Records survive as long as the instance, so
 * two caches sharing one MemoryStore behave like two process lifetimes
 * sharing a cache directory.
 */
export class MemoryStore implements PersistentStore {
  readonly records = new Map<string, StoredEntry>();
  writeAttempts = 0;
  failReads = false;
  failWrites = false;
  closed = false;
  private heldRead: Promise<void> | null = null;

  /**
   * The next read takes its record immediately but does not return it
   * until the returned function is called
   */
  holdNextRead(): () => void {
    let release: () => void = () => undefined;
    this.heldRead = new Promise<void>(resolve => (release = resolve));
    return () => release();
  }

  async read(id: string): Promise<StoredEntry | null> {
    if (this.failReads) throw new CacheIOError(`unreadable ${id}`, 'read');
    const record = this.records.get(id) ?? null;
    const gate = this.heldRead;
    this.heldRead = null;
    if (gate) await gate;
    return record;
  }

  async write(id: string, entry: StoredEntry): Promise<void> {
    this.writeAttempts++;
    if (this.failWrites) throw new CacheIOError(`disk full writing ${id}`, 'write');
    this.records.set(id, entry);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
