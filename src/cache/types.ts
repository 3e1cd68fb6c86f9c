import type { IntrospectionVerdict } from '../introspection/types.js';

export interface VerdictCacheOptions {
  maxEntries: number;
  /** Lifetime of a verdict that carries no `exp` */
  defaultTtlMs: number;
  /** Upper bound on any entry's lifetime, whatever its `exp` says */
  maxTtlMs?: number;
  /** Epoch milliseconds, defaults to `Date.now` */
  clock?: () => number;
}

export interface CacheEntry {
  verdict: IntrospectionVerdict;
  /** Epoch milliseconds; the entry is dead from this instant on */
  expiresAt: number;
}

export type LoadResult<E> =
  | { ok: true; verdict: IntrospectionVerdict }
  | { ok: false; error: E };

export interface VerdictCacheStats {
  size: number;
  inflight: number;
  hits: number;
  misses: number;
  coalesced: number;
}
