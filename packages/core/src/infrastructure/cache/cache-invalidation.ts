/**
 * @fileoverview Commit-Driven Cache Invalidation
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/cache
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 */

import { type IQueryCache } from '../../domain/cache';
import { type ICommitNotifier } from '../../domain/uow';

/**
 * Purge cache entries tagged with an entity type every time a commit
 * mutates that type.
 *
 * @returns Unsubscribe function
 */
export function invalidateOnCommit(notifier: ICommitNotifier, cache: IQueryCache): () => void {
  return notifier.subscribe((result) => {
    if (result.mutatedTypes.size > 0) {
      cache.invalidateTags(result.mutatedTypes);
    }
  });
}
