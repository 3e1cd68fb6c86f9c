export class LRUCache<V> {
  private cache: Map<string, V>;
  private maxSize: number;

  constructor(maxSize: number) {
    this.cache = new Map();
    this.maxSize = maxSize;
  }

  get(key: string): V | undefined {
    const value = this.cache.get(key);
    if (value !== undefined) {
      // Re-insert so the key becomes the most recently used
      this.cache.delete(key);
      this.cache.set(key, value);
    }
    return value;
  }

  set(key: string, value: V): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
      this.cache.set(key, value);
      return;
    }

    // Map iteration order is insertion order, so the first key is the LRU one
    if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }

    this.cache.set(key, value);
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  size(): number {
    return this.cache.size;
  }

  /**
   * Remove every entry the predicate selects, without touching recency.
   */
  prune(predicate: (value: V) => boolean): number {
    let deleted = 0;

    for (const [key, value] of this.cache) {
      if (predicate(value)) {
        this.cache.delete(key);
        deleted++;
      }
    }

    return deleted;
  }
}
