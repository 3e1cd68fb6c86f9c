import { createHash } from 'crypto';
import { LRUCache } from './memory-cache.js';
import type { IntrospectionVerdict } from '../introspection/types.js';
import type { CacheEntry, LoadResult, VerdictCacheOptions, VerdictCacheStats } from './types.js';

export type { CacheEntry, LoadResult, VerdictCacheOptions, VerdictCacheStats } from './types.js';
export { LRUCache } from './memory-cache.js';

export function hashToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

/**
 * Short, non-reversible identifier for a token, safe to log.
 */
export function tokenFingerprint(token: string): string {
  return hashToken(token).substring(0, 8);
}

/**
 * Introspection verdicts keyed by token digest.
 *
 * At most one load per key runs at a time: callers arriving while a load is
 * pending receive the same promise. A verdict is published before the pending
 * marker is cleared, so a caller sees either the pending load or the stored
 * entry. Failed loads are handed to their waiters and forgotten.
 */
export class VerdictCache<E> {
  private entries: LRUCache<CacheEntry>;
  private inflight = new Map<string, Promise<LoadResult<E>>>();
  private options: VerdictCacheOptions;
  private hits = 0;
  private misses = 0;
  private coalesced = 0;

  constructor(options: VerdictCacheOptions) {
    this.options = options;
    this.entries = new LRUCache(options.maxEntries);
  }

  private now(): number {
    return (this.options.clock ?? Date.now)();
  }

  async getOrLoad(token: string, loader: () => Promise<LoadResult<E>>): Promise<LoadResult<E>> {
    const key = hashToken(token);

    const entry = this.entries.get(key);
    if (entry) {
      if (entry.expiresAt > this.now()) {
        this.hits++;
        return { ok: true, verdict: entry.verdict };
      }
      this.entries.delete(key);
    }

    const pending = this.inflight.get(key);
    if (pending) {
      this.coalesced++;
      return pending;
    }

    this.misses++;
    // The loader starts on the next microtask, after the marker is in place
    const load = Promise.resolve()
      .then(loader)
      .then((result) => {
        if (result.ok) {
          this.store(key, result.verdict);
        }
        return result;
      })
      .finally(() => {
        this.inflight.delete(key);
      });

    this.inflight.set(key, load);
    return load;
  }

  private expiryFor(verdict: IntrospectionVerdict, now: number): number {
    // A token stays valid through the whole second named by exp
    let expiresAt =
      verdict.exp !== undefined ? (verdict.exp + 1) * 1000 : now + this.options.defaultTtlMs;

    if (this.options.maxTtlMs !== undefined) {
      expiresAt = Math.min(expiresAt, now + this.options.maxTtlMs);
    }

    return expiresAt;
  }

  private store(key: string, verdict: IntrospectionVerdict): void {
    const now = this.now();
    const expiresAt = this.expiryFor(verdict, now);

    // Already dead on arrival
    if (expiresAt <= now) return;

    this.entries.set(key, { verdict, expiresAt });
  }

  cleanupExpired(): number {
    const now = this.now();
    return this.entries.prune((entry) => entry.expiresAt <= now);
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): VerdictCacheStats {
    return {
      size: this.entries.size(),
      inflight: this.inflight.size,
      hits: this.hits,
      misses: this.misses,
      coalesced: this.coalesced,
    };
  }
}
