/**
 * @fileoverview ScopedContainer - Unit of Work Scoped Instances
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A ScopedContainer caches Scoped instances for exactly one Unit of Work:
 *
 * ```
 * UnitOfWork #1 ── ScopedContainer ───────────┐
 * │                instances:                  │
 * │                  repository:Order -> a     │
 * │                  OrderPricing     -> b     │
 * └────────────────────────────────────────────┘
 * ```
 *
 * **Lifecycle:**
 *
 * 1. `unitOfWorkFactory.begin()` creates the scope and binds it to the
 *    execution context
 * 2. Scoped capabilities resolved during the dispatch are cached here
 * 3. Commit or rollback disposes the scope, last created first
 *
 * @version 1.0.0
 */

import {
  type Capability,
  type IDisposable,
  type IProviderDescriptor,
  type IScope,
  AsyncProviderError,
  ScopeDisposedError,
  getCapabilityName,
  isDisposable,
} from '../../domain/di';

import type { Container } from './container';
import { WaitGraph } from './wait-graph';

/**
 * ScopedContainer - IScope implementation.
 *
 * @remarks
 * Resolution itself is done by the root container with this scope as the
 * source of Scoped instances; singletons come from the root cache.
 */
export class ScopedContainer implements IScope {
  readonly root: Container;

  private readonly instances = new Map<Capability, unknown>();

  private readonly pending = new Map<Capability, Promise<unknown>>();

  private readonly waits = new WaitGraph();

  /**
   * Disposable instances in creation order.
   */
  private readonly disposables: { capability: Capability; instance: IDisposable }[] = [];

  private disposed = false;

  constructor(root: Container) {
    this.root = root;
  }

  // ============================================================================
  // IScope Implementation
  // ============================================================================

  resolve<T>(capability: Capability<T>): T {
    this.ensureNotDisposed();
    return this.root.resolveWith(capability, { path: [], owner: undefined, scope: this });
  }

  tryResolve<T>(capability: Capability<T>): T | undefined {
    return this.root.isRegistered(capability) ? this.resolve(capability) : undefined;
  }

  async resolveAsync<T>(capability: Capability<T>): Promise<T> {
    this.ensureNotDisposed();
    return this.root.resolveAsyncWith(capability, { path: [], owner: undefined, scope: this });
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.disposed = true;
    this.instances.clear();

    const disposables = this.disposables.splice(0).reverse();
    for (const { capability, instance } of disposables) {
      await this.disposeInstance(capability, instance);
    }
  }

  // ============================================================================
  // Instance Cache (used by Container)
  // ============================================================================

  /** @internal */
  getOrCreate<T>(descriptor: IProviderDescriptor<T>, create: () => T): T {
    this.ensureNotDisposed();
    const { capability } = descriptor;

    if (this.instances.has(capability)) {
      return this.instances.get(capability) as T;
    }

    if (this.pending.has(capability)) {
      throw new AsyncProviderError(capability);
    }

    const instance = create();
    this.remember(capability, instance);
    return instance;
  }

  /** @internal */
  async getOrCreateAsync<T>(
    descriptor: IProviderDescriptor<T>,
    path: readonly Capability[],
    create: () => Promise<T>,
  ): Promise<T> {
    this.ensureNotDisposed();
    const { capability } = descriptor;

    if (this.instances.has(capability)) {
      return this.instances.get(capability) as T;
    }

    const inFlight = this.pending.get(capability);
    if (inFlight) {
      this.waits.join(path, capability);
      return inFlight as Promise<T>;
    }

    const creation = create().then(async (instance) => {
      if (this.disposed) {
        if (isDisposable(instance)) {
          await this.disposeInstance(capability, instance);
        }
        throw new ScopeDisposedError();
      }
      this.remember(capability, instance);
      return instance;
    });
    this.pending.set(capability, creation);

    try {
      return await creation;
    } finally {
      this.pending.delete(capability);
      this.waits.settle(capability);
    }
  }

  private remember(capability: Capability, instance: unknown): void {
    this.instances.set(capability, instance);
    if (isDisposable(instance)) {
      this.disposables.push({ capability, instance });
    }
  }

  private async disposeInstance(capability: Capability, instance: IDisposable): Promise<void> {
    try {
      await instance.dispose();
    } catch (error) {
      this.root.logger.error(
        { err: error, capability: getCapabilityName(capability) },
        'Error disposing scoped instance',
      );
    }
  }

  private ensureNotDisposed(): void {
    if (this.disposed) {
      throw new ScopeDisposedError();
    }
  }
}
