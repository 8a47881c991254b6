/**
 * @fileoverview Container Interfaces - Core Dependency Container Contracts
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * These contracts define WHAT the dependency container does: a registry
 * open during setup, a container that resolves capabilities once the
 * registry is sealed, and scopes that live as long as a Unit of Work.
 *
 * ## Scopes and Units of Work
 *
 * ```
 * dispatch(PlaceOrder) ── ExecutionContext.run() ────────────────┐
 * │                                                              │
 * │  UnitOfWork ── owns ── IScope ───────────────┐               │
 * │  │                     repository:Order -> instance-1         │
 * │  │                     OrderPricing     -> instance-1         │
 * │  └────────────────────────────────────────────┘               │
 * │                                                              │
 * └──────────────────────────────────────────────────────────────┘
 * ```
 *
 * The scope is bound to the execution context under SCOPE_CONTEXT_KEY, so
 * resolving a Scoped capability from the root container inside a handler
 * answers the instance belonging to that dispatch's Unit of Work.
 *
 * @version 1.0.0
 */

import { ContextKey } from '../context/context-key';

import { type Capability, type Constructor } from './capability';
import { type Lifetime } from './lifetime';
import {
  type IProviderDescriptor,
  type IProviderOptions,
  type IResolver,
  type ProviderFactory,
} from './provider-descriptor';

// ============================================================================
// IDisposable - Resource Cleanup Interface
// ============================================================================

/**
 * Implemented by instances that hold resources.
 *
 * @remarks
 * - Scoped instances are disposed when their Unit of Work ends, last
 *   created first.
 * - Singletons are disposed by `container.dispose()`.
 *
 * Disposal failures are logged and never rethrown.
 */
export interface IDisposable {
  dispose(): void | Promise<void>;
}

export function isDisposable(obj: unknown): obj is IDisposable {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'dispose' in obj &&
    typeof obj.dispose === 'function'
  );
}

// ============================================================================
// ICapabilityRegistry - Registration Phase
// ============================================================================

/**
 * ICapabilityRegistry - Binds capabilities to providers during setup.
 *
 * @remarks
 * Registering a capability twice replaces the earlier binding. Once
 * `build()` has been called the registry is sealed and every further
 * registration throws ContainerSealedError.
 *
 * @example
 * ```typescript
 * const registry = new CapabilityRegistry();
 *
 * registry
 *   .addSingletonFactory(IClock, () => new SystemClock())
 *   .addScoped(repositoryToken('Order'), SqlOrderRepository)
 *   .addTransient(PlaceOrderHandler);
 *
 * const container = registry.build({ validateScopes: true });
 * ```
 */
export interface ICapabilityRegistry {
  /**
   * Bind a capability to a factory with an explicit lifetime. Code
   * generators and other external tooling plug providers in through this
   * method.
   */
  register<T>(
    capability: Capability<T>,
    factory: ProviderFactory<T>,
    lifetime: Lifetime,
    options?: IProviderOptions,
  ): this;

  addSingleton<T>(implementation: Constructor<T>, options?: IProviderOptions): this;
  addSingleton<T>(
    capability: Capability<T>,
    implementation: Constructor<T>,
    options?: IProviderOptions,
  ): this;
  addSingletonFactory<T>(
    capability: Capability<T>,
    factory: ProviderFactory<T>,
    options?: IProviderOptions,
  ): this;
  addSingletonInstance<T>(capability: Capability<T>, instance: T, options?: IProviderOptions): this;

  addScoped<T>(implementation: Constructor<T>, options?: IProviderOptions): this;
  addScoped<T>(
    capability: Capability<T>,
    implementation: Constructor<T>,
    options?: IProviderOptions,
  ): this;
  addScopedFactory<T>(
    capability: Capability<T>,
    factory: ProviderFactory<T>,
    options?: IProviderOptions,
  ): this;

  addTransient<T>(implementation: Constructor<T>, options?: IProviderOptions): this;
  addTransient<T>(
    capability: Capability<T>,
    implementation: Constructor<T>,
    options?: IProviderOptions,
  ): this;
  addTransientFactory<T>(
    capability: Capability<T>,
    factory: ProviderFactory<T>,
    options?: IProviderOptions,
  ): this;

  has(capability: Capability): boolean;

  getDescriptors(): readonly IProviderDescriptor[];

  /**
   * Seal the registry and build the container.
   *
   * @throws ScopeMismatchError if `validateScopes` is on and a class
   *   provider declares a shorter-lived dependency
   */
  build(options?: IBuildOptions): IContainer;
}

// ============================================================================
// IContainer - Resolution Phase
// ============================================================================

/**
 * IContainer - Resolves capabilities to instances.
 *
 * @remarks
 * ```
 * resolve(capability)
 *   1. Capability already on the resolution stack -> CyclicDependencyError
 *   2. No binding                                 -> UnregisteredCapabilityError
 *   3. Singleton: process-wide cache
 *      Scoped:    cache of the scope bound to the execution context
 *      Transient: always new
 *   4. Dependencies resolved in declaration order
 * ```
 */
export interface IContainer extends IResolver {
  isRegistered(capability: Capability): boolean;

  /**
   * Create a detached scope. The Unit of Work factory binds the scope it
   * creates to the execution context; other callers own disposal.
   */
  createScope(): IScope;

  /**
   * Dispose every singleton implementing IDisposable. Idempotent.
   */
  dispose(): Promise<void>;
}

/**
 * IScope - Cache of Scoped instances for one Unit of Work.
 *
 * @remarks
 * Singleton resolution is delegated to the root container. Two scopes
 * never share a Scoped instance.
 */
export interface IScope extends IResolver, IDisposable {
  isDisposed(): boolean;

  /**
   * Dispose cached instances in reverse creation order. Idempotent.
   */
  dispose(): Promise<void>;
}

/**
 * Injectable factory for scopes, for code that runs its own units of work
 * (background jobs, tests).
 */
export interface IScopeFactory {
  createScope(): IScope;
}

/**
 * Execution context slot holding the scope of the active Unit of Work.
 */
export const SCOPE_CONTEXT_KEY = new ContextKey<IScope>('weavearc:di:scope', {
  description: 'Dependency scope of the active Unit of Work',
});

// ============================================================================
// Build Options
// ============================================================================

export interface IBuildOptions {
  /**
   * Reject captive dependencies (a provider depending on a shorter-lived
   * one) with ScopeMismatchError. Class providers are checked at build
   * time, factories when they resolve.
   *
   * Default: true
   */
  validateScopes?: boolean;

  /**
   * Construct every singleton during `build()`. Singletons with async
   * factories cannot be built eagerly and must be left lazy.
   *
   * Default: false
   */
  eagerSingletons?: boolean;
}
