// TTL-based cache for automatic expiration
// Holds finished research runs so their results can be polled for a while

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export class TTLCache<K, V> {
  private cache = new Map<K, CacheEntry<V>>();
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  constructor(
    private defaultTTL: number = 30 * 60 * 1000,
    private cleanupMs: number = 60 * 1000
  ) {
    this.cleanupInterval = setInterval(() => this.cleanup(), this.cleanupMs);
    // Never keep the process alive just to sweep
    this.cleanupInterval.unref();
  }

  private cleanup(now = Date.now()): void {
    for (const [key, entry] of this.cache.entries()) {
      if (entry.expiresAt <= now) {
        this.cache.delete(key);
      }
    }
  }

  set(key: K, value: V, ttl?: number): void {
    this.cache.set(key, { value, expiresAt: Date.now() + (ttl ?? this.defaultTTL) });
  }

  get(key: K): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt <= Date.now()) {
      this.cache.delete(key);
      return undefined;
    }

    return entry.value;
  }

  get size(): number {
    this.cleanup();
    return this.cache.size;
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.cache.clear();
  }
}
