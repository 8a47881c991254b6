/**
 * @fileoverview Domain Unit of Work Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/uow
 * @license Apache-2.0
 */

export { type IIdentityMap, type EntityLoader } from './identity-map.interface';

export {
  type ChangeKind,
  type PendingChange,
  type CommitResult,
  type CommitListener,
  type ICommitNotifier,
  type IReadScope,
  type IClosableReadScope,
  type IUnitOfWork,
  type IUnitOfWorkFactory,
  UnitOfWorkState,
  UNIT_OF_WORK_KEY,
  READ_SCOPE_KEY,
  UNIT_OF_WORK_FACTORY_TOKEN,
  COMMIT_NOTIFIER_TOKEN,
} from './unit-of-work.interface';

export {
  UnitOfWorkError,
  NestedScopeError,
  MissingExecutionContextError,
  UnitOfWorkClosedError,
  InvalidEntityStateError,
  IdentityConflictError,
  IdentityMismatchError,
  EntityNotFoundError,
  PartialCommitError,
  type PartialCommitDetails,
} from './uow.errors';
