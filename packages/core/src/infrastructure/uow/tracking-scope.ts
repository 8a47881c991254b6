/**
 * @fileoverview TrackingScope - Shared Base of Read Scopes and Units of Work
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/uow
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Owns what both scope kinds share: an identity map, a DI scope, the
 * execution context they are bound to, and the record of entity types
 * read.
 *
 * @version 1.0.0
 */

import { type IContext } from '../../domain/context';
import { type IScope, SCOPE_CONTEXT_KEY } from '../../domain/di';
import { type EntityIdentity, type IEntity, identityKey } from '../../domain/entity';
import { repositoryToken } from '../../domain/repository';
import { type IReadScope, EntityNotFoundError } from '../../domain/uow';
import { type Logger } from '../logging';

import { IdentityMap } from './identity-map';

/** @internal */
export interface TrackingScopeOptions {
  readonly id: string;
  readonly scope: IScope;
  readonly context: IContext;
  readonly logger: Logger;
}

/** @internal */
export abstract class TrackingScope implements IReadScope {
  readonly id: string;

  readonly scope: IScope;

  readonly identityMap = new IdentityMap();

  protected readonly context: IContext;

  protected readonly log: Logger;

  private readonly reads = new Set<string>();

  protected constructor(options: TrackingScopeOptions) {
    this.id = options.id;
    this.scope = options.scope;
    this.context = options.context;
    this.log = options.logger;
  }

  abstract isActive(): boolean;

  /**
   * @throws UnitOfWorkClosedError when the scope has ended
   */
  protected abstract ensureActive(operation: string): void;

  /**
   * Identities the scope answers `undefined` for without loading.
   */
  protected isHidden(_identity: EntityIdentity): boolean {
    return false;
  }

  async load<E extends IEntity>(type: string, id: E['id']): Promise<E | undefined> {
    this.ensureActive('load');
    this.reads.add(type);

    const identity: EntityIdentity = { type, id };
    if (this.isHidden(identity)) {
      return undefined;
    }

    return this.identityMap.getOrTrack<E>(identity, async () => {
      const repository = await this.scope.resolveAsync(repositoryToken<E>(type));
      return repository.getById(id);
    });
  }

  async loadRequired<E extends IEntity>(type: string, id: E['id']): Promise<E> {
    const entity = await this.load<E>(type, id);
    if (entity === undefined) {
      throw new EntityNotFoundError(type, id);
    }
    return entity;
  }

  readTypes(): ReadonlySet<string> {
    return new Set(this.reads);
  }

  protected bindScope(): void {
    this.context.set(SCOPE_CONTEXT_KEY, this.scope);
  }

  /**
   * Detach from the execution context, forget tracked entities and
   * dispose the DI scope.
   */
  protected async release(): Promise<void> {
    if (this.context.get(SCOPE_CONTEXT_KEY) === this.scope) {
      this.context.delete(SCOPE_CONTEXT_KEY);
    }
    this.identityMap.clear();
    await this.scope.dispose();
  }

  protected keyOf(identity: EntityIdentity): string {
    return identityKey(identity);
  }
}
