/**
 * @fileoverview IRepository - Persistence Port
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/repository
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Port)
 *
 * Repositories are external collaborators. The Unit of Work resolves one
 * per entity type from its scope and calls it in flush order:
 *
 * ```
 * commit()
 *   1. delete(entity) for every deleted entity
 *   2. update(entity) for every dirty entity
 *   3. add(entity)    for every new entity
 * ```
 *
 * Repository errors propagate; the Unit of Work wraps them in
 * PartialCommitError.
 *
 * @version 1.0.0
 */

import { type Capability } from '../di/capability';
import { type IEntity } from '../entity/entity';

/**
 * Persistence operations for one entity type.
 *
 * @template E - Entity type
 */
export interface IRepository<E extends IEntity = IEntity> {
  add(entity: E): Promise<void>;

  update(entity: E): Promise<void>;

  delete(entity: E): Promise<void>;

  /**
   * Load an entity, or `undefined` if it does not exist.
   */
  getById(id: E['id']): Promise<E | undefined>;
}

/**
 * Flush stage of a commit, in execution order.
 */
export type CommitStage = 'delete' | 'update' | 'insert';

/**
 * A change a repository has already applied during the current commit.
 */
export interface AppliedChange<E extends IEntity = IEntity> {
  readonly stage: CommitStage;
  readonly entity: E;
}

/**
 * Repository able to undo a change it applied earlier in the same commit.
 *
 * @remarks
 * When a flush stage fails, applied changes are compensated in reverse
 * order, but only if every repository involved implements this interface.
 */
export interface ICompensatingRepository<E extends IEntity = IEntity> extends IRepository<E> {
  compensate(change: AppliedChange<E>): Promise<void>;
}

export function supportsCompensation<E extends IEntity>(
  repository: IRepository<E>,
): repository is ICompensatingRepository<E> {
  return 'compensate' in repository && typeof repository.compensate === 'function';
}

/**
 * Capability under which the repository of an entity type is registered.
 *
 * @example
 * ```typescript
 * registry.addScopedFactory(repositoryToken<Order>('Order'), (r) => new SqlOrders(r.resolve(IDb)));
 *
 * const orders = scope.resolve(repositoryToken<Order>('Order'));
 * ```
 */
export function repositoryToken<E extends IEntity = IEntity>(
  entityType: string,
): Capability<IRepository<E>> {
  return `repository:${entityType}`;
}
