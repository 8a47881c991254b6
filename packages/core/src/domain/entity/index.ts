/**
 * @fileoverview Domain Entity Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/entity
 * @license Apache-2.0
 */

export {
  type EntityId,
  type EntityIdentity,
  type IEntity,
  Entity,
  identityKey,
  identityOf,
  sameIdentity,
  isEntity,
} from './entity';
