/**
 * @fileoverview InMemoryRepository - Map-Backed Repository Adapter
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/persistence
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE (Adapter)
 *
 * Repository for tests and prototypes. Rows are copies: changing a loaded
 * entity changes nothing stored until the Unit of Work flushes it.
 *
 * @version 1.0.0
 */

import { FrameworkError } from '../../domain/common';
import { type IEntity, identityKey, identityOf } from '../../domain/entity';
import { type AppliedChange, type ICompensatingRepository } from '../../domain/repository';

export class RepositoryError extends FrameworkError {
  public readonly entityType: string;

  constructor(message: string, code: string, entityType: string) {
    super(message, code);
    this.entityType = entityType;
  }
}

export interface InMemoryRepositoryOptions<E extends IEntity> {
  /**
   * Copy function for stored rows. Defaults to a shallow copy keeping
   * the prototype.
   */
  clone?: (entity: E) => E;
}

function shallowClone<E extends IEntity>(entity: E): E {
  const copy: E = Object.create(Object.getPrototypeOf(entity));
  return Object.assign(copy, entity);
}

/**
 * InMemoryRepository - ICompensatingRepository over a Map.
 *
 * @template E - Entity type
 *
 * @example
 * ```typescript
 * const orders = new InMemoryRepository<Order>('Order');
 * registry.addSingletonInstance(repositoryToken<Order>('Order'), orders);
 * ```
 */
export class InMemoryRepository<E extends IEntity> implements ICompensatingRepository<E> {
  readonly entityType: string;

  private readonly rows = new Map<string, E>();

  /**
   * Row state each update or delete replaced, keyed by the entity the
   * change was made with. Compensation receives that same entity.
   */
  private readonly previous = new WeakMap<E, E>();

  private readonly clone: (entity: E) => E;

  constructor(entityType: string, options: InMemoryRepositoryOptions<E> = {}) {
    this.entityType = entityType;
    this.clone = options.clone ?? shallowClone;
  }

  async add(entity: E): Promise<void> {
    const key = this.keyOf(entity);
    if (this.rows.has(key)) {
      throw new RepositoryError(
        `${this.entityType} '${String(entity.id)}' already exists`,
        'DUPLICATE_ENTITY',
        this.entityType,
      );
    }
    this.rows.set(key, this.clone(entity));
  }

  async update(entity: E): Promise<void> {
    const key = this.keyOf(entity);
    const current = this.rows.get(key);
    if (!current) {
      throw this.missing(entity);
    }
    this.previous.set(entity, current);
    this.rows.set(key, this.clone(entity));
  }

  async delete(entity: E): Promise<void> {
    const key = this.keyOf(entity);
    const current = this.rows.get(key);
    if (!current) {
      throw this.missing(entity);
    }
    this.previous.set(entity, current);
    this.rows.delete(key);
  }

  async getById(id: E['id']): Promise<E | undefined> {
    const row = this.rows.get(identityKey({ type: this.entityType, id }));
    return row ? this.clone(row) : undefined;
  }

  async compensate(change: AppliedChange<E>): Promise<void> {
    const key = this.keyOf(change.entity);

    if (change.stage === 'insert') {
      this.rows.delete(key);
      return;
    }

    const before = this.previous.get(change.entity);
    if (!before) {
      throw new RepositoryError(
        `No prior state of ${this.entityType} '${String(change.entity.id)}' to restore`,
        'NOTHING_TO_COMPENSATE',
        this.entityType,
      );
    }
    this.rows.set(key, before);
    this.previous.delete(change.entity);
  }

  /**
   * Store rows directly, bypassing any Unit of Work.
   */
  seed(...entities: E[]): this {
    for (const entity of entities) {
      this.rows.set(this.keyOf(entity), this.clone(entity));
    }
    return this;
  }

  /**
   * Copies of every stored row, in insertion order.
   */
  all(): E[] {
    return Array.from(this.rows.values(), (row) => this.clone(row));
  }

  get count(): number {
    return this.rows.size;
  }

  private keyOf(entity: E): string {
    if (entity.entityType !== this.entityType) {
      throw new RepositoryError(
        `Repository of ${this.entityType} cannot store ${entity.entityType}`,
        'WRONG_ENTITY_TYPE',
        this.entityType,
      );
    }
    return identityKey(identityOf(entity));
  }

  private missing(entity: E): RepositoryError {
    return new RepositoryError(
      `${this.entityType} '${String(entity.id)}' does not exist`,
      'ENTITY_MISSING',
      this.entityType,
    );
  }
}
