// services/list-api/src/core/cache/ttl.cache.ts

export type CacheEntry<T> = {
  value: T
  expiresAt: number // epoch ms
}

/**
 * In-memory TTL cache with a max size cap.
 *
 * - Eviction is FIFO by insertion order (Map iteration order); `set` on an
 *   existing key re-inserts it, so refreshed keys move to the back.
 * - Expired entries are dropped lazily on `get` and by `prune`.
 */
export class TtlCache<T> {
  private readonly maxEntries: number
  private readonly map = new Map<string, CacheEntry<T>>()
  private readonly onEvict?: (key: string, value: T) => void

  constructor(opts: { maxEntries: number; onEvict?: (key: string, value: T) => void }) {
    this.maxEntries = Math.max(0, opts.maxEntries)
    this.onEvict = opts.onEvict
  }

  get(key: string, now = Date.now()): T | undefined {
    const e = this.map.get(key)
    if (!e) return undefined
    if (e.expiresAt <= now) {
      this.map.delete(key)
      this.onEvict?.(key, e.value)
      return undefined
    }
    return e.value
  }

  set(key: string, value: T, ttlMs: number, now = Date.now()): void {
    if (this.maxEntries === 0) return
    const expiresAt = ttlMs <= 0 ? now : now + ttlMs
    this.map.delete(key)
    this.map.set(key, { value, expiresAt })

    // FIFO eviction
    while (this.map.size > this.maxEntries) {
      const first = this.map.entries().next()
      if (first.done) break
      const [k, e] = first.value
      this.map.delete(k)
      this.onEvict?.(k, e.value)
    }
  }

  delete(key: string): boolean {
    return this.map.delete(key)
  }

  /** Drop every expired entry; returns how many were removed. */
  prune(now = Date.now()): number {
    let removed = 0
    for (const [k, e] of this.map) {
      if (e.expiresAt <= now) {
        this.map.delete(k)
        this.onEvict?.(k, e.value)
        removed++
      }
    }
    return removed
  }

  clear(): void {
    this.map.clear()
  }

  size(): number {
    return this.map.size
  }
}
