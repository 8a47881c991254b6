/**
 * @fileoverview IdentityMap - Tracked Entities of One Scope
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/uow
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * @version 1.0.0
 */

import {
  type EntityIdentity,
  type IEntity,
  identityKey,
  identityOf,
  sameIdentity,
} from '../../domain/entity';
import {
  type EntityLoader,
  type IIdentityMap,
  IdentityConflictError,
  IdentityMismatchError,
} from '../../domain/uow';

/**
 * IdentityMap - IIdentityMap keyed by `identityKey()`.
 *
 * @remarks
 * Loads in flight are shared per identity. `clear()` starts a new
 * generation; a load begun before it resolves without being tracked.
 */
export class IdentityMap implements IIdentityMap {
  private readonly tracked = new Map<string, IEntity>();

  private readonly loading = new Map<string, Promise<IEntity | undefined>>();

  private generation = 0;

  async getOrTrack<E extends IEntity>(
    identity: EntityIdentity,
    loader: EntityLoader<E>,
  ): Promise<E | undefined> {
    const key = identityKey(identity);

    const existing = this.tracked.get(key);
    if (existing) {
      return existing as E;
    }

    const inFlight = this.loading.get(key);
    if (inFlight) {
      return inFlight as Promise<E | undefined>;
    }

    const generation = this.generation;
    const load = loader().then((entity): E | undefined => {
      if (entity === undefined) {
        return undefined;
      }

      const loaded = identityOf(entity);
      if (!sameIdentity(identity, loaded)) {
        throw new IdentityMismatchError(identity, loaded);
      }

      if (generation !== this.generation) {
        return entity;
      }

      // Tracked by someone else while loading
      const winner = this.tracked.get(key);
      if (winner) {
        return winner as E;
      }

      this.tracked.set(key, entity);
      return entity;
    });
    this.loading.set(key, load);

    try {
      return await load;
    } finally {
      if (this.loading.get(key) === load) {
        this.loading.delete(key);
      }
    }
  }

  track<E extends IEntity>(entity: E): E {
    const identity = identityOf(entity);
    const key = identityKey(identity);
    const existing = this.tracked.get(key);

    if (existing === entity) {
      return entity;
    }
    if (existing) {
      throw new IdentityConflictError(identity);
    }

    this.tracked.set(key, entity);
    return entity;
  }

  get<E extends IEntity>(identity: EntityIdentity): E | undefined {
    return this.tracked.get(identityKey(identity)) as E | undefined;
  }

  has(identity: EntityIdentity): boolean {
    return this.tracked.has(identityKey(identity));
  }

  untrack(identity: EntityIdentity): boolean {
    return this.tracked.delete(identityKey(identity));
  }

  clear(): void {
    this.generation += 1;
    this.tracked.clear();
    this.loading.clear();
  }

  get size(): number {
    return this.tracked.size;
  }

  entities(): IEntity[] {
    return Array.from(this.tracked.values());
  }

  trackedTypes(): Set<string> {
    return new Set(Array.from(this.tracked.values(), (entity) => entity.entityType));
  }
}
