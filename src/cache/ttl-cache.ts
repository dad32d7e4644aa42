export type Clock = () => number;

export interface TtlCacheOptions {
  /** How long an entry is served without going back to the source. */
  ttlMs: number;
  /**
   * How long an entry may still be served when the source is failing.
   * Entries older than this are evicted. Defaults to `ttlMs`.
   */
  staleTtlMs?: number;
  now?: Clock;
}

interface Entry<V> {
  value: V;
  storedAt: number;
}

/**
 * Process-scoped read-mostly cache. Entries expire by age only; concurrent
 * writers for the same key simply overwrite each other.
 */
export class TtlCache<K, V> {
  private readonly entries = new Map<K, Entry<V>>();
  private readonly ttlMs: number;
  private readonly staleTtlMs: number;
  private readonly now: Clock;

  constructor(options: TtlCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.staleTtlMs = Math.max(options.staleTtlMs ?? options.ttlMs, options.ttlMs);
    this.now = options.now ?? Date.now;
  }

  /** Fresh value, or undefined once the entry is older than the TTL. */
  get(key: K): V | undefined {
    const entry = this.lookup(key);
    if (!entry) {
      return undefined;
    }
    return this.now() - entry.storedAt < this.ttlMs ? entry.value : undefined;
  }

  /** Value within the stale window, for use when the source is unreachable. */
  getStale(key: K): V | undefined {
    return this.lookup(key)?.value;
  }

  set(key: K, value: V): void {
    this.entries.set(key, { value, storedAt: this.now() });
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private lookup(key: K): Entry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.now() - entry.storedAt >= this.staleTtlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
