/**
 * @fileoverview Entity - Identity and Revision of Domain Objects
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/entity
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * An entity is identified by its type name and a value-typed id. Within one
 * Unit of Work two entities with equal identity are the same instance; the
 * identity map enforces it using the canonical key built here.
 *
 * @version 1.0.0
 */

/**
 * Value-typed entity key.
 */
export type EntityId = string | number | bigint;

/**
 * Identity of an entity: its type name plus its id.
 */
export interface EntityIdentity<TId extends EntityId = EntityId> {
  readonly type: string;
  readonly id: TId;
}

/**
 * Minimal contract the Unit of Work and repositories rely on.
 */
export interface IEntity<TId extends EntityId = EntityId> {
  /** Type name; repositories are resolved through `repositoryToken(entityType)` */
  readonly entityType: string;
  readonly id: TId;
  /** Revision counter, 0 until first persisted */
  readonly version: number;
}

/**
 * Canonical string key of an identity.
 *
 * @remarks
 * The id's runtime type is part of the key, so `1` and `'1'` are two
 * identities.
 *
 * @example
 * ```typescript
 * identityKey({ type: 'Order', id: 'o-1' }); // 'Order#string:o-1'
 * identityKey({ type: 'Order', id: 1 });     // 'Order#number:1'
 * ```
 */
export function identityKey(identity: EntityIdentity): string {
  return `${identity.type}#${typeof identity.id}:${String(identity.id)}`;
}

export function identityOf(entity: IEntity): EntityIdentity {
  return { type: entity.entityType, id: entity.id };
}

export function sameIdentity(a: EntityIdentity, b: EntityIdentity): boolean {
  return a.type === b.type && a.id === b.id;
}

/**
 * Entity - Base class for domain entities.
 *
 * @template TId - Id type
 *
 * @example
 * ```typescript
 * class Order extends Entity<string> {
 *   readonly entityType = 'Order';
 *
 *   constructor(id: string, public total: number) {
 *     super(id);
 *   }
 * }
 * ```
 */
export abstract class Entity<TId extends EntityId = EntityId> implements IEntity<TId> {
  abstract readonly entityType: string;

  readonly id: TId;

  private revision: number;

  protected constructor(id: TId, version = 0) {
    this.id = id;
    this.revision = version;
  }

  get version(): number {
    return this.revision;
  }

  get identity(): EntityIdentity<TId> {
    return { type: this.entityType, id: this.id };
  }

  equals(other: IEntity | undefined): boolean {
    return other !== undefined && sameIdentity(this.identity, identityOf(other));
  }

  /**
   * Advance the revision ahead of a flush, so the repository stores the
   * revision the entity carries once the commit succeeds.
   *
   * @internal Called by the Unit of Work only.
   */
  advanceRevision(): void {
    this.revision += 1;
  }

  /**
   * Undo {@link advanceRevision} after a failed flush.
   *
   * @internal Called by the Unit of Work only.
   */
  revertRevision(): void {
    this.revision -= 1;
  }
}

export function isEntity(value: unknown): value is Entity {
  return value instanceof Entity;
}
