/**
 * @fileoverview ReadScope - Tracking Scope of a Query
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/uow
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * @version 1.0.0
 */

import { type IClosableReadScope, READ_SCOPE_KEY, UnitOfWorkClosedError } from '../../domain/uow';

import { type TrackingScopeOptions, TrackingScope } from './tracking-scope';

/**
 * ReadScope - Identity map and loading without a change log.
 *
 * @remarks
 * Binds itself and its DI scope to the execution context on creation.
 */
export class ReadScope extends TrackingScope implements IClosableReadScope {
  private closed = false;

  constructor(options: TrackingScopeOptions) {
    super(options);
    this.context.set(READ_SCOPE_KEY, this);
    this.bindScope();
  }

  isActive(): boolean {
    return !this.closed;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    if (this.context.get(READ_SCOPE_KEY) === this) {
      this.context.delete(READ_SCOPE_KEY);
    }
    await this.release();
    this.log.debug({ readScopeId: this.id }, 'Read scope closed');
  }

  protected ensureActive(operation: string): void {
    if (this.closed) {
      throw new UnitOfWorkClosedError(this.id, 'closed', operation);
    }
  }
}
