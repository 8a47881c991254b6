/**
 * @fileoverview IUnitOfWork - Transactional Scope of a Dispatch
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/uow
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A Unit of Work batches entity mutations and flushes them through the
 * repositories on commit. Queries get a read scope instead: the same
 * identity map and loading, no mutation.
 *
 * ## Lifecycle
 *
 * ```
 *             commit() ok
 * Active ──> Committing ──> Committed
 *   │              │
 *   │              └─ stage failed ──> RolledBack (PartialCommitError)
 *   │
 *   └─ rollback() / cancellation ────> RolledBack
 * ```
 *
 * @version 1.0.0
 */

import { ContextKey } from '../context/context-key';
import { createToken } from '../di/capability';
import { type IScope } from '../di/container.interface';
import { type IEntity } from '../entity/entity';

import { type IIdentityMap } from './identity-map.interface';

export enum UnitOfWorkState {
  Active = 'active',
  Committing = 'committing',
  Committed = 'committed',
  RolledBack = 'rolledBack',
}

/**
 * Kind of a pending change.
 */
export type ChangeKind = 'new' | 'dirty' | 'deleted';

export interface PendingChange {
  readonly kind: ChangeKind;
  readonly entity: IEntity;
}

/**
 * Summary of a successful commit, also delivered to commit listeners.
 */
export interface CommitResult {
  readonly unitOfWorkId: string;
  readonly deleted: number;
  readonly updated: number;
  readonly inserted: number;
  /**
   * Entity types touched by any stage. Cache entries tagged with one of
   * them are invalidated.
   */
  readonly mutatedTypes: ReadonlySet<string>;
}

export type CommitListener = (result: CommitResult) => void | Promise<void>;

/**
 * Registry of commit listeners shared by every Unit of Work of a factory.
 */
export interface ICommitNotifier {
  subscribe(listener: CommitListener): () => void;

  notify(result: CommitResult): Promise<void>;
}

/**
 * IReadScope - Read-only tracking scope.
 */
export interface IReadScope {
  readonly id: string;

  /**
   * Dependency scope; Scoped capabilities resolved during this scope
   * come from here.
   */
  readonly scope: IScope;

  readonly identityMap: IIdentityMap;

  /**
   * Load through the identity map using `repositoryToken(type)`'s
   * `getById`. Records `type` as read.
   */
  load<E extends IEntity>(type: string, id: E['id']): Promise<E | undefined>;

  /**
   * @throws EntityNotFoundError if the repository has no such entity
   */
  loadRequired<E extends IEntity>(type: string, id: E['id']): Promise<E>;

  /**
   * Entity types loaded through this scope.
   */
  readTypes(): ReadonlySet<string>;

  isActive(): boolean;
}

/**
 * IReadScope as handed out by the factory, which also ends it.
 */
export interface IClosableReadScope extends IReadScope {
  close(): Promise<void>;
}

/**
 * IUnitOfWork - Mutation log plus identity map.
 *
 * @remarks
 * Registration rules:
 *
 * | Already      | registerNew             | registerDirty           | registerDeleted        |
 * |--------------|-------------------------|-------------------------|------------------------|
 * | (nothing)    | new                     | dirty                   | deleted                |
 * | new          | no-op                   | no-op                   | cancelled out          |
 * | dirty        | InvalidEntityStateError | no-op                   | deleted                |
 * | deleted      | InvalidEntityStateError | InvalidEntityStateError | no-op                  |
 */
export interface IUnitOfWork extends IReadScope {
  readonly state: UnitOfWorkState;

  registerNew(entity: IEntity): void;

  registerDirty(entity: IEntity): void;

  registerDeleted(entity: IEntity): void;

  /**
   * Pending changes in flush order.
   */
  pendingChanges(): PendingChange[];

  /**
   * Flush deletes, then updates, then inserts.
   *
   * @throws PartialCommitError if a repository call fails
   * @throws UnitOfWorkClosedError if the Unit of Work is not active
   */
  commit(): Promise<CommitResult>;

  /**
   * Discard pending changes without repository calls. A no-op on a Unit of
   * Work already rolled back.
   *
   * @throws UnitOfWorkClosedError if the Unit of Work committed
   */
  rollback(): Promise<void>;
}

export interface IUnitOfWorkFactory {
  /**
   * Begin a Unit of Work bound to the current execution context.
   *
   * @throws NestedScopeError if the context already has an active scope
   * @throws MissingExecutionContextError outside an execution context
   */
  begin(): IUnitOfWork;

  /**
   * Begin a read-only scope bound to the current execution context.
   */
  beginRead(): IClosableReadScope;

  /**
   * Begin, run `work`, commit on success and roll back on failure.
   * Opens an execution context when called outside one.
   */
  run<R>(work: (unitOfWork: IUnitOfWork) => R | Promise<R>): Promise<R>;

  onCommit(listener: CommitListener): () => void;
}

/**
 * Execution context slot of the active Unit of Work.
 */
export const UNIT_OF_WORK_KEY = new ContextKey<IUnitOfWork>('weavearc:unitOfWork', {
  description: 'Active Unit of Work of the current dispatch',
});

/**
 * Execution context slot of the active read scope.
 */
export const READ_SCOPE_KEY = new ContextKey<IReadScope>('weavearc:readScope', {
  description: 'Active read scope of the current query',
});

export const UNIT_OF_WORK_FACTORY_TOKEN = createToken<IUnitOfWorkFactory>('IUnitOfWorkFactory');

export const COMMIT_NOTIFIER_TOKEN = createToken<ICommitNotifier>('ICommitNotifier');
