export interface MemoCacheOptions {
  /** Least recently used entries are evicted beyond this count. */
  maxEntries: number;
  /** Entry lifetime in milliseconds; `0` or omitted keeps entries forever. */
  ttlMs?: number;
}

interface Entry<V> {
  value: V;
  expiresAt: number;
}

/**
 * Memoizes an async computation per argument tuple.
 *
 * Concurrent calls with the same arguments share one in-flight computation.
 * Only resolved values are stored; a rejection reaches every waiting caller
 * and the next call starts over.
 */
export class MemoCache<Args extends readonly unknown[], V> {
  private readonly entries = new Map<string, Entry<V>>();
  private readonly inFlight = new Map<string, Promise<V>>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;

  constructor({ maxEntries, ttlMs = 0 }: MemoCacheOptions) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new Error(`Invalid cache size: ${maxEntries}`);
    }

    this.maxEntries = maxEntries;
    this.ttlMs = ttlMs;
  }

  get size(): number {
    return this.entries.size;
  }

  get(args: Args, compute: () => Promise<V>): Promise<V> {
    const key = JSON.stringify(args);
    const entry = this.lookup(key);

    if (entry) {
      return Promise.resolve(entry.value);
    }

    const pending = this.inFlight.get(key);

    if (pending) {
      return pending;
    }

    const promise = compute()
      .then((value) => {
        this.store(key, value);
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, promise);

    return promise;
  }

  has(args: Args): boolean {
    return this.lookup(JSON.stringify(args)) !== undefined;
  }

  delete(args: Args): boolean {
    return this.entries.delete(JSON.stringify(args));
  }

  clear(): void {
    this.entries.clear();
  }

  private lookup(key: string): Entry<V> | undefined {
    const entry = this.entries.get(key);

    if (!entry) {
      return undefined;
    }

    this.entries.delete(key);

    if (entry.expiresAt <= Date.now()) {
      return undefined;
    }

    // re-insert to mark as most recently used
    this.entries.set(key, entry);

    return entry;
  }

  private store(key: string, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, {
      value,
      expiresAt: this.ttlMs > 0 ? Date.now() + this.ttlMs : Infinity,
    });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();

      if (oldest.done) {
        break;
      }

      this.entries.delete(oldest.value);
    }
  }
}
