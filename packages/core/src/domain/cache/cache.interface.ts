/**
 * @fileoverview IQueryCache - Fingerprint-Keyed Result Cache
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/cache
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Results of cacheable messages are stored by fingerprint and tagged with
 * entity types. A commit that mutates a type purges every entry tagged
 * with it.
 *
 * ## Write Protocol
 *
 * ```
 * ticket = cache.beginWrite(fp)      // before running the handler
 * value  = await handler(...)
 * cache.commitWrite(ticket, value, { tags })
 *   ├─ live entry for fp            -> 'lost-race' (existing entry kept)
 *   ├─ a tag invalidated since begin -> 'stale'     (nothing stored)
 *   └─ otherwise                    -> 'stored'
 * ```
 *
 * @version 1.0.0
 */

import { createToken } from '../di/capability';

export interface CacheEntry<V = unknown> {
  readonly fingerprint: string;
  readonly value: V;
  readonly tags: ReadonlySet<string>;
  readonly storedAt: number;
  readonly expiresAt: number;
}

export interface CacheSetOptions {
  tags?: Iterable<string>;
  /** Validity window; defaults to the cache's configured TTL */
  ttlMs?: number;
}

/**
 * Handle returned by `beginWrite`, remembering the invalidation
 * generation at the time the computation started.
 */
export interface CacheWriteTicket {
  readonly fingerprint: string;
  readonly generation: number;
}

export type CacheWriteResult<V> =
  | { readonly status: 'stored'; readonly entry: CacheEntry<V> }
  | { readonly status: 'lost-race'; readonly entry: CacheEntry<V> }
  | { readonly status: 'stale' };

export interface CacheStats {
  hits: number;
  misses: number;
  writes: number;
  discardedWrites: number;
  evictions: number;
  invalidations: number;
  size: number;
}

export interface IQueryCache<V = unknown> {
  /**
   * Live entry for a fingerprint. Expired entries are dropped and count
   * as a miss.
   */
  get(fingerprint: string): CacheEntry<V> | undefined;

  beginWrite(fingerprint: string): CacheWriteTicket;

  commitWrite(ticket: CacheWriteTicket, value: V, options?: CacheSetOptions): CacheWriteResult<V>;

  /**
   * `commitWrite(beginWrite(fingerprint), ...)`.
   */
  set(fingerprint: string, value: V, options?: CacheSetOptions): CacheWriteResult<V>;

  /**
   * Remove every entry tagged with one of `tags`.
   *
   * @returns Number of entries removed
   */
  invalidateTags(tags: Iterable<string>): number;

  clear(): void;

  readonly size: number;

  stats(): CacheStats;
}

/**
 * Cache of serialized results used by cachingMiddleware.
 */
export const QUERY_CACHE_TOKEN = createToken<IQueryCache<string>>('IQueryCache');
