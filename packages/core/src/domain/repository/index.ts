/**
 * @fileoverview Domain Repository Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/repository
 * @license Apache-2.0
 */

export {
  type IRepository,
  type ICompensatingRepository,
  type AppliedChange,
  type CommitStage,
  supportsCompensation,
  repositoryToken,
} from './repository.interface';
