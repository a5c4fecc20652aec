/**
 * Bounded least-recently-used map.
 *
 * Relies on Map iteration order: a read re-inserts the key at the end, so the
 * first key is always the least recently used one.
 */
export class LruCache<K, V extends object> {
  private readonly entries = new Map<K, V>()
  private hits = 0
  private misses = 0

  constructor(readonly maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`LruCache maxSize must be a positive integer, got ${maxSize}`)
    }
  }

  get size(): number {
    return this.entries.size
  }

  get(key: K): V | undefined {
    const value = this.entries.get(key)
    if (value === undefined) {
      this.misses++
      return undefined
    }
    this.entries.delete(key)
    this.entries.set(key, value)
    this.hits++
    return value
  }

  set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key)
    } else if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next()
      if (!oldest.done) {
        this.entries.delete(oldest.value)
      }
    }
    this.entries.set(key, value)
  }

  has(key: K): boolean {
    return this.entries.has(key)
  }

  clear(): void {
    this.entries.clear()
  }

  stats(): { hits: number; misses: number; size: number; maxSize: number } {
    return { hits: this.hits, misses: this.misses, size: this.entries.size, maxSize: this.maxSize }
  }
}
