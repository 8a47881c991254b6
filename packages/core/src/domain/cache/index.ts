/**
 * @fileoverview Domain Cache Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/cache
 * @license Apache-2.0
 */

export {
  type CacheEntry,
  type CacheSetOptions,
  type CacheWriteTicket,
  type CacheWriteResult,
  type CacheStats,
  type IQueryCache,
  QUERY_CACHE_TOKEN,
} from './cache.interface';
