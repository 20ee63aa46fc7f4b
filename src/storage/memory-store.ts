/**
 * In-memory key-value storage.
 *
 * Reference implementation for development and testing. Expired entries are
 * dropped lazily on read and by `purgeExpired()`.
 */

import { createKeyValueStore, KeyValueStore, KeyValueStoreOptions, Store } from './store';

/** Time source for expiry checks. */
export interface TimeSource {
  now(): number;
}

interface Entry {
  value: string;
  expiresAt?: number;
}

export class MemoryKeyValueStore implements KeyValueStore {
  readonly backend: string = 'memory';
  private data = new Map<string, Entry>();

  constructor(private readonly time: TimeSource = { now: () => Date.now() }) {}

  async get(key: string): Promise<string | null> {
    const entry = this.data.get(key);
    if (!entry) return null;
    if (this.isExpired(entry)) {
      this.data.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    const entry: Entry = { value };
    if (ttlMs !== undefined) entry.expiresAt = this.time.now() + ttlMs;
    this.data.set(key, entry);
  }

  async delete(key: string): Promise<boolean> {
    const entry = this.data.get(key);
    this.data.delete(key);
    return entry !== undefined && !this.isExpired(entry);
  }

  /** Remove every expired entry. Returns how many were removed. */
  purgeExpired(): number {
    let removed = 0;
    for (const [key, entry] of this.data) {
      if (this.isExpired(entry)) {
        this.data.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.data.size;
  }

  private isExpired(entry: Entry): boolean {
    return entry.expiresAt !== undefined && entry.expiresAt <= this.time.now();
  }
}

/** Create a complete in-memory store. */
export function createMemoryStore(options: KeyValueStoreOptions & { time?: TimeSource } = {}): Store {
  return createKeyValueStore(new MemoryKeyValueStore(options.time), options);
}
