type LocalRecord<V> = { value: V; expiresAtMs: number };

export interface LocalCacheOptions {
  ttlMs: number;
  maxEntries: number;
}

export interface LocalCacheStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
}

/**
 * Process-local tier. Entries expire after `ttlMs`; when full, the entry
 * written longest ago is dropped first. Concurrent writers resolve
 * last-write-wins.
 */
export class LocalCache<V> {
  private readonly entries = new Map<string, LocalRecord<V>>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(private readonly options: LocalCacheOptions) {}

  get(key: string): V | undefined {
    const rec = this.entries.get(key);
    if (!rec) {
      this.misses++;
      return undefined;
    }
    if (Date.now() >= rec.expiresAtMs) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }
    this.hits++;
    return rec.value;
  }

  set(key: string, value: V): void {
    // re-insert so Map order tracks write recency
    this.entries.delete(key);
    this.entries.set(key, {
      value,
      expiresAtMs: Date.now() + this.options.ttlMs,
    });
    while (this.entries.size > this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  deleteByPrefix(prefix: string): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): LocalCacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
