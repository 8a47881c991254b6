/**
 * @fileoverview Unit of Work Errors
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/uow
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * @version 1.0.0
 */

import { FrameworkError } from '../common/framework-error';
import { type EntityIdentity, type EntityId, identityKey } from '../entity/entity';
import { type CommitStage } from '../repository/repository.interface';

import { type ChangeKind, type UnitOfWorkState } from './unit-of-work.interface';

export abstract class UnitOfWorkError extends FrameworkError {}

/**
 * Thrown when a Unit of Work (or read scope) is begun while the execution
 * context already has one, including a command dispatched from inside a
 * command handler.
 */
export class NestedScopeError extends UnitOfWorkError {
  public readonly activeScopeId: string;

  constructor(activeScopeId: string) {
    super(
      `A Unit of Work is already active in this execution context (${activeScopeId}). ` +
        `Nested Units of Work are not supported.`,
      'NESTED_SCOPE',
    );
    this.activeScopeId = activeScopeId;
  }
}

export class MissingExecutionContextError extends UnitOfWorkError {
  constructor() {
    super(
      'A Unit of Work must be begun inside an execution context. ' +
        'Use unitOfWorkFactory.run() or ExecutionContext.run().',
      'NO_EXECUTION_CONTEXT',
    );
  }
}

/**
 * Thrown when an operation is attempted on a Unit of Work or read scope
 * that is no longer active.
 */
export class UnitOfWorkClosedError extends UnitOfWorkError {
  public readonly unitOfWorkId: string;
  /** `'closed'` for a read scope */
  public readonly state: UnitOfWorkState | 'closed';

  constructor(unitOfWorkId: string, state: UnitOfWorkState | 'closed', operation: string) {
    super(`Cannot ${operation}: ${unitOfWorkId} is ${state}`, 'UNIT_OF_WORK_CLOSED');
    this.unitOfWorkId = unitOfWorkId;
    this.state = state;
  }
}

/**
 * Thrown by a registration that contradicts the pending change of the same
 * entity, e.g. `registerDirty` after `registerDeleted`.
 */
export class InvalidEntityStateError extends UnitOfWorkError {
  public readonly identity: EntityIdentity;
  public readonly current: ChangeKind;
  public readonly attempted: ChangeKind;

  constructor(identity: EntityIdentity, current: ChangeKind, attempted: ChangeKind) {
    super(
      `Cannot register ${identityKey(identity)} as ${attempted}: it is already registered as ${current}`,
      'INVALID_ENTITY_STATE',
    );
    this.identity = identity;
    this.current = current;
    this.attempted = attempted;
  }
}

/**
 * Thrown when a second instance is registered for an identity that is
 * already tracked.
 */
export class IdentityConflictError extends UnitOfWorkError {
  public readonly identity: EntityIdentity;

  constructor(identity: EntityIdentity) {
    super(
      `Another instance of ${identityKey(identity)} is already tracked by this Unit of Work`,
      'IDENTITY_CONFLICT',
    );
    this.identity = identity;
  }
}

/**
 * Thrown when a loader returns an entity whose identity differs from the
 * one requested.
 */
export class IdentityMismatchError extends UnitOfWorkError {
  public readonly requested: EntityIdentity;
  public readonly loaded: EntityIdentity;

  constructor(requested: EntityIdentity, loaded: EntityIdentity) {
    super(
      `Loader for ${identityKey(requested)} returned ${identityKey(loaded)}`,
      'IDENTITY_MISMATCH',
    );
    this.requested = requested;
    this.loaded = loaded;
  }
}

export class EntityNotFoundError extends UnitOfWorkError {
  public readonly entityType: string;
  public readonly entityId: EntityId;

  constructor(entityType: string, entityId: EntityId) {
    super(`${entityType} '${String(entityId)}' was not found`, 'ENTITY_NOT_FOUND');
    this.entityType = entityType;
    this.entityId = entityId;
  }
}

export interface PartialCommitDetails {
  stage: CommitStage;
  entityType: string;
  entityId: EntityId;
  /** Changes applied before the failure */
  appliedCount: number;
  /** True when no applied change remains in the stores */
  compensated: boolean;
  compensationErrors: Error[];
  cause: Error;
}

/**
 * Thrown by `commit()` when a repository call fails. The Unit of Work has
 * already been rolled back when this error is raised.
 *
 * @example
 * ```typescript
 * catch (error) {
 *   if (error instanceof PartialCommitError && !error.compensated) {
 *     alertOperator(error.stage, error.entityType, error.entityId);
 *   }
 * }
 * ```
 */
export class PartialCommitError extends UnitOfWorkError {
  public readonly stage: CommitStage;
  public readonly entityType: string;
  public readonly entityId: EntityId;
  public readonly appliedCount: number;
  public readonly compensated: boolean;
  public readonly compensationErrors: Error[];
  public readonly cause: Error;

  constructor(details: PartialCommitDetails) {
    super(
      `Commit failed in ${details.stage} stage at ${details.entityType} '${String(details.entityId)}': ` +
        `${details.cause.message} (${details.appliedCount} applied, ` +
        `${details.compensated ? 'compensated' : 'not compensated'})`,
      'PARTIAL_COMMIT',
    );
    this.stage = details.stage;
    this.entityType = details.entityType;
    this.entityId = details.entityId;
    this.appliedCount = details.appliedCount;
    this.compensated = details.compensated;
    this.compensationErrors = details.compensationErrors;
    this.cause = details.cause;
  }
}
