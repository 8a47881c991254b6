/**
 * @fileoverview Container - Capability Resolution Engine
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Implements IContainer: singleton caching, delegation of Scoped
 * capabilities to the scope of the active Unit of Work, and cycle
 * detection along the current resolution stack.
 *
 * ## Resolution Algorithm
 *
 * ```
 * resolve(capability)
 *   1. Capability already on the stack      -> CyclicDependencyError
 *   2. No descriptor                        -> UnregisteredCapabilityError
 *   3. Owner outlives the dependency        -> ScopeMismatchError (validateScopes)
 *   4. Based on lifetime:
 *      - Singleton: process-wide cache, created once
 *      - Scoped:    cache of the explicit scope, else of the scope bound
 *                   to the execution context (NoActiveScopeError if none)
 *      - Transient: always created
 *   5. If creating:
 *      a. factory(resolver), or `static inject` dependencies in order
 *      b. non-container errors wrapped in ProviderCreationError
 * ```
 *
 * `resolveAsync` follows the same steps, awaiting async factories. First
 * construction of an async singleton is shared: concurrent callers wait on
 * the same in-flight promise.
 *
 * @version 1.0.0
 */

import { toError } from '../../domain/common';
import {
  type Capability,
  type IBuildOptions,
  type IContainer,
  type IProviderDescriptor,
  type IResolver,
  type IScope,
  type IScopeFactory,
  CONTAINER_TOKEN,
  SCOPE_CONTEXT_KEY,
  SCOPE_FACTORY_TOKEN,
  Lifetime,
  DIError,
  AsyncProviderError,
  ContainerDisposedError,
  CyclicDependencyError,
  NoActiveScopeError,
  ProviderCreationError,
  ScopeMismatchError,
  UnregisteredCapabilityError,
  canDependOn,
  createInstanceDescriptor,
  getCapabilityName,
  getInjectDependencies,
  isDisposable,
} from '../../domain/di';
import { ExecutionContext } from '../context';
import { type Logger, logger as defaultLogger } from '../logging';

import { ScopedContainer } from './scoped-container';
import { WaitGraph } from './wait-graph';

/**
 * Container options: build options plus the logger used for disposal
 * failures and lifecycle events.
 */
export interface ContainerOptions extends IBuildOptions {
  logger?: Logger;
}

/**
 * One step of a resolution: the capabilities under construction, the
 * provider that asked, and the scope Scoped capabilities come from.
 *
 * @internal
 */
export interface ResolutionFrame {
  readonly path: readonly Capability[];
  readonly owner: IProviderDescriptor | undefined;
  readonly scope: ScopedContainer | undefined;
}

function pathNames(path: readonly Capability[]): string[] {
  return path.map((capability) => getCapabilityName(capability));
}

/**
 * Container - IContainer implementation.
 *
 * @remarks
 * Built by `CapabilityRegistry.build()`. The descriptor map is copied at
 * construction and never changes afterwards.
 *
 * @example
 * ```typescript
 * const container = registry.build();
 *
 * const clock = container.resolve(IClock);
 *
 * await unitOfWorkFactory.run(async (uow) => {
 *   const orders = container.resolve(repositoryToken('Order')); // uow.scope's instance
 * });
 * ```
 */
export class Container implements IContainer {
  private readonly descriptors: Map<Capability, IProviderDescriptor>;

  private readonly singletons = new Map<Capability, unknown>();

  /**
   * In-flight async singleton constructions.
   */
  private readonly pendingSingletons = new Map<Capability, Promise<unknown>>();

  private readonly singletonWaits = new WaitGraph();

  private readonly options: Required<IBuildOptions>;

  private readonly log: Logger;

  private disposed = false;

  constructor(descriptors: ReadonlyMap<Capability, IProviderDescriptor>, options: ContainerOptions = {}) {
    this.descriptors = new Map(descriptors);
    this.options = {
      validateScopes: options.validateScopes ?? true,
      eagerSingletons: options.eagerSingletons ?? false,
    };
    this.log = (options.logger ?? defaultLogger).child({ component: 'container' });

    const scopeFactory: IScopeFactory = { createScope: () => this.createScope() };
    this.descriptors.set(CONTAINER_TOKEN, createInstanceDescriptor<IContainer>(CONTAINER_TOKEN, this));
    this.descriptors.set(
      SCOPE_FACTORY_TOKEN,
      createInstanceDescriptor<IScopeFactory>(SCOPE_FACTORY_TOKEN, scopeFactory),
    );

    if (this.options.validateScopes) {
      this.validateScopeDependencies();
    }

    if (this.options.eagerSingletons) {
      this.createEagerSingletons();
    }

    this.log.debug({ providers: this.descriptors.size }, 'Container built');
  }

  // ============================================================================
  // IContainer Implementation
  // ============================================================================

  resolve<T>(capability: Capability<T>): T {
    this.ensureNotDisposed();
    return this.resolveWith(capability, { path: [], owner: undefined, scope: undefined });
  }

  tryResolve<T>(capability: Capability<T>): T | undefined {
    return this.isRegistered(capability) ? this.resolve(capability) : undefined;
  }

  async resolveAsync<T>(capability: Capability<T>): Promise<T> {
    this.ensureNotDisposed();
    return this.resolveAsyncWith(capability, { path: [], owner: undefined, scope: undefined });
  }

  isRegistered(capability: Capability): boolean {
    return this.descriptors.has(capability);
  }

  createScope(): IScope {
    this.ensureNotDisposed();
    return new ScopedContainer(this);
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.disposed = true;

    // Last created first
    const instances = Array.from(this.singletons.entries()).reverse();
    this.singletons.clear();

    for (const [capability, instance] of instances) {
      if (instance === this || !isDisposable(instance)) {
        continue;
      }
      try {
        await instance.dispose();
      } catch (error) {
        this.log.error(
          { err: error, capability: getCapabilityName(capability) },
          'Error disposing singleton',
        );
      }
    }
  }

  // ============================================================================
  // Internal Resolution (shared with ScopedContainer)
  // ============================================================================

  /** @internal */
  get logger(): Logger {
    return this.log;
  }

  /** @internal */
  isDisposed(): boolean {
    return this.disposed;
  }

  /** @internal */
  resolveWith<T>(capability: Capability<T>, frame: ResolutionFrame): T {
    const descriptor = this.lookup(capability, frame);

    switch (descriptor.lifetime) {
      case Lifetime.Singleton:
        return this.resolveSingleton(descriptor, frame);

      case Lifetime.Scoped: {
        const scope = this.requireScope(descriptor, frame);
        return scope.getOrCreate(descriptor, () => this.createInstance(descriptor, frame, scope));
      }

      case Lifetime.Transient:
        return this.createInstance(descriptor, frame, frame.scope);
    }
  }

  /** @internal */
  async resolveAsyncWith<T>(capability: Capability<T>, frame: ResolutionFrame): Promise<T> {
    const descriptor = this.lookup(capability, frame);

    switch (descriptor.lifetime) {
      case Lifetime.Singleton:
        return this.resolveSingletonAsync(descriptor, frame);

      case Lifetime.Scoped: {
        const scope = this.requireScope(descriptor, frame);
        return scope.getOrCreateAsync(descriptor, frame.path, () =>
          this.createInstanceAsync(descriptor, frame, scope),
        );
      }

      case Lifetime.Transient:
        return this.createInstanceAsync(descriptor, frame, frame.scope);
    }
  }

  private lookup<T>(capability: Capability<T>, frame: ResolutionFrame): IProviderDescriptor<T> {
    if (frame.path.includes(capability)) {
      throw new CyclicDependencyError(capability, pathNames(frame.path));
    }

    const descriptor = this.descriptors.get(capability) as IProviderDescriptor<T> | undefined;
    if (!descriptor) {
      throw new UnregisteredCapabilityError(capability, pathNames(frame.path));
    }

    const { owner } = frame;
    if (this.options.validateScopes && owner && !canDependOn(owner.lifetime, descriptor.lifetime)) {
      throw new ScopeMismatchError(
        owner.capability,
        capability,
        owner.lifetime,
        descriptor.lifetime,
        pathNames(frame.path),
      );
    }

    return descriptor;
  }

  private resolveSingleton<T>(descriptor: IProviderDescriptor<T>, frame: ResolutionFrame): T {
    const { capability } = descriptor;

    if (this.singletons.has(capability)) {
      return this.singletons.get(capability) as T;
    }

    if (this.pendingSingletons.has(capability)) {
      throw new AsyncProviderError(capability, pathNames(frame.path));
    }

    const instance = this.createInstance(descriptor, frame, undefined);
    this.singletons.set(capability, instance);
    return instance;
  }

  private async resolveSingletonAsync<T>(
    descriptor: IProviderDescriptor<T>,
    frame: ResolutionFrame,
  ): Promise<T> {
    const { capability } = descriptor;

    if (this.singletons.has(capability)) {
      return this.singletons.get(capability) as T;
    }

    const pending = this.pendingSingletons.get(capability);
    if (pending) {
      this.singletonWaits.join(frame.path, capability);
      return pending as Promise<T>;
    }

    const creation = this.createInstanceAsync(descriptor, frame, undefined).then((instance) => {
      this.singletons.set(capability, instance);
      return instance;
    });
    this.pendingSingletons.set(capability, creation);

    try {
      return await creation;
    } finally {
      this.pendingSingletons.delete(capability);
      this.singletonWaits.settle(capability);
    }
  }

  private requireScope(descriptor: IProviderDescriptor, frame: ResolutionFrame): ScopedContainer {
    const scope = frame.scope ?? this.ambientScope();
    if (!scope) {
      throw new NoActiveScopeError(descriptor.capability, pathNames(frame.path));
    }
    return scope;
  }

  /**
   * Scope bound to the current execution context by the active Unit of
   * Work, if it belongs to this container.
   */
  private ambientScope(): ScopedContainer | undefined {
    const bound = ExecutionContext.current()?.get(SCOPE_CONTEXT_KEY);
    return bound instanceof ScopedContainer && bound.root === this ? bound : undefined;
  }

  private childFrame(
    descriptor: IProviderDescriptor,
    frame: ResolutionFrame,
    scope: ScopedContainer | undefined,
  ): ResolutionFrame {
    return { path: [...frame.path, descriptor.capability], owner: descriptor, scope };
  }

  private createInstance<T>(
    descriptor: IProviderDescriptor<T>,
    frame: ResolutionFrame,
    scope: ScopedContainer | undefined,
  ): T {
    const child = this.childFrame(descriptor, frame, scope);

    try {
      if (descriptor.factory) {
        const result = descriptor.factory(this.createResolver(child));

        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            this.log.warn(
              { err: error, capability: getCapabilityName(descriptor.capability) },
              'Async provider failed after synchronous resolution was refused',
            );
          });
          throw new AsyncProviderError(descriptor.capability, pathNames(frame.path));
        }

        return result;
      }

      if (descriptor.implementationType) {
        const dependencies = getInjectDependencies(descriptor.implementationType).map((dep) =>
          this.resolveWith(dep, child),
        );
        return new descriptor.implementationType(...dependencies);
      }

      throw new TypeError(
        `No factory or implementation type for '${getCapabilityName(descriptor.capability)}'`,
      );
    } catch (error) {
      if (error instanceof DIError) {
        throw error;
      }
      throw new ProviderCreationError(descriptor.capability, toError(error), pathNames(frame.path));
    }
  }

  private async createInstanceAsync<T>(
    descriptor: IProviderDescriptor<T>,
    frame: ResolutionFrame,
    scope: ScopedContainer | undefined,
  ): Promise<T> {
    const child = this.childFrame(descriptor, frame, scope);

    try {
      if (descriptor.factory) {
        return await descriptor.factory(this.createResolver(child));
      }

      if (descriptor.implementationType) {
        const dependencies: unknown[] = [];
        for (const dep of getInjectDependencies(descriptor.implementationType)) {
          dependencies.push(await this.resolveAsyncWith(dep, child));
        }
        return new descriptor.implementationType(...dependencies);
      }

      throw new TypeError(
        `No factory or implementation type for '${getCapabilityName(descriptor.capability)}'`,
      );
    } catch (error) {
      if (error instanceof DIError) {
        throw error;
      }
      throw new ProviderCreationError(descriptor.capability, toError(error), pathNames(frame.path));
    }
  }

  /**
   * Resolver handed to factories, bound to the factory's frame.
   */
  private createResolver(frame: ResolutionFrame): IResolver {
    return {
      resolve: <T>(capability: Capability<T>): T => this.resolveWith(capability, frame),
      tryResolve: <T>(capability: Capability<T>): T | undefined =>
        this.isRegistered(capability) ? this.resolveWith(capability, frame) : undefined,
      resolveAsync: <T>(capability: Capability<T>): Promise<T> =>
        this.resolveAsyncWith(capability, frame),
    };
  }

  // ============================================================================
  // Validation
  // ============================================================================

  /**
   * Check declared class dependencies once, at build time.
   */
  private validateScopeDependencies(): void {
    for (const descriptor of this.descriptors.values()) {
      if (!descriptor.implementationType) {
        continue;
      }

      for (const dep of getInjectDependencies(descriptor.implementationType)) {
        const depDescriptor = this.descriptors.get(dep);
        if (!depDescriptor) {
          // Reported as UnregisteredCapabilityError on resolution
          continue;
        }

        if (!canDependOn(descriptor.lifetime, depDescriptor.lifetime)) {
          throw new ScopeMismatchError(
            descriptor.capability,
            dep,
            descriptor.lifetime,
            depDescriptor.lifetime,
          );
        }
      }
    }
  }

  private createEagerSingletons(): void {
    for (const descriptor of this.descriptors.values()) {
      if (descriptor.lifetime === Lifetime.Singleton) {
        this.resolveSingleton(descriptor, { path: [], owner: undefined, scope: undefined });
      }
    }
  }

  private ensureNotDisposed(): void {
    if (this.disposed) {
      throw new ContainerDisposedError();
    }
  }
}
