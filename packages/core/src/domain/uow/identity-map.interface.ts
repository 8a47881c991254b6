/**
 * @fileoverview IIdentityMap - One Instance per Identity
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/uow
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Each Unit of Work and each read scope owns one identity map. It is
 * cleared when its owner ends, so nothing tracked survives into the next
 * scope.
 *
 * @version 1.0.0
 */

import { type EntityIdentity, type IEntity } from '../entity/entity';

/**
 * Loader invoked by `getOrTrack` on a miss.
 */
export type EntityLoader<E extends IEntity> = () => Promise<E | undefined>;

export interface IIdentityMap {
  /**
   * Return the tracked instance for `identity`, or load and track it.
   *
   * @remarks
   * - Concurrent calls for one identity share a single `loader()` call
   * - A loader result of `undefined` is returned and not tracked
   *
   * @throws IdentityMismatchError if the loader returns another identity
   */
  getOrTrack<E extends IEntity>(identity: EntityIdentity, loader: EntityLoader<E>): Promise<E | undefined>;

  /**
   * Track an instance. Tracking the same instance twice is a no-op.
   *
   * @throws IdentityConflictError if another instance is tracked for the identity
   */
  track<E extends IEntity>(entity: E): E;

  get<E extends IEntity>(identity: EntityIdentity): E | undefined;

  has(identity: EntityIdentity): boolean;

  untrack(identity: EntityIdentity): boolean;

  /**
   * Drop every tracked instance. Loads still in flight finish untracked.
   */
  clear(): void;

  readonly size: number;

  entities(): IEntity[];

  trackedTypes(): Set<string>;
}
