/**
 * @fileoverview Infrastructure Persistence Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/persistence
 * @license Apache-2.0
 */

export {
  InMemoryRepository,
  type InMemoryRepositoryOptions,
  RepositoryError,
} from './in-memory-repository';
