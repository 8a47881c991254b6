/**
 * @fileoverview Infrastructure Cache Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/cache
 * @license Apache-2.0
 */

export { QueryCache, type QueryCacheOptions } from './query-cache';

export { fingerprint } from './fingerprint';

export { invalidateOnCommit } from './cache-invalidation';
