/**
 * Persistent cache tier contract and an in-process TTL implementation
 */

/**
 * External TTL-capable key/value store (Redis, memcached, a database table…)
 * adapted by the host. Calls are synchronous.
 */
export interface PersistentStore {
  /** Returns undefined on a miss or an expired entry */
  get(key: string): unknown;

  put(key: string, value: unknown, ttlSeconds: number): void;

  forget(key: string): void;
}

interface StoreEntry {
  value: unknown;
  expiresAt: number;
}

/**
 * Map-backed PersistentStore with per-entry expiry
 */
export class MemoryStore implements PersistentStore {
  private readonly entries = new Map<string, StoreEntry>();

  get(key: string): unknown {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  put(key: string, value: unknown, ttlSeconds: number): void {
    this.entries.set(key, {
      value,
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  forget(key: string): void {
    this.entries.delete(key);
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Keys currently held, expired or not
   */
  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  clear(): void {
    this.entries.clear();
  }
}
