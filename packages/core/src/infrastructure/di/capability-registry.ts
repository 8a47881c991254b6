/**
 * @fileoverview CapabilityRegistry - Provider Registration
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Implements ICapabilityRegistry with a fluent API. The registry is open
 * during application setup and sealed by `build()`.
 *
 * @version 1.0.0
 */

import {
  type Capability,
  type Constructor,
  type IProviderDescriptor,
  type IProviderOptions,
  type ProviderFactory,
  type ICapabilityRegistry,
  Lifetime,
  createClassDescriptor,
  createFactoryDescriptor,
  createInstanceDescriptor,
  getCapabilityName,
  validateDescriptor,
  ContainerSealedError,
} from '../../domain/di';

import { type ContainerOptions, Container } from './container';

/**
 * CapabilityRegistry - Fluent API for provider registration.
 *
 * @remarks
 * Not meant for concurrent use: register everything during startup, then
 * build once.
 *
 * @example
 * ```typescript
 * const registry = new CapabilityRegistry();
 *
 * registry.addSingletonFactory(IClock, () => new SystemClock());
 * registry.addScoped(repositoryToken('Order'), SqlOrderRepository);
 * registry.addTransient(PlaceOrderHandler);
 *
 * const container = registry.build();
 * ```
 */
export class CapabilityRegistry implements ICapabilityRegistry {
  private readonly descriptors = new Map<Capability, IProviderDescriptor>();

  private sealed = false;

  // ============================================================================
  // Generic Registration
  // ============================================================================

  register<T>(
    capability: Capability<T>,
    factory: ProviderFactory<T>,
    lifetime: Lifetime,
    options?: IProviderOptions,
  ): this {
    return this.add(createFactoryDescriptor(capability, lifetime, factory, options));
  }

  // ============================================================================
  // Singleton Registration
  // ============================================================================

  addSingleton<T>(implementation: Constructor<T>, options?: IProviderOptions): this;
  addSingleton<T>(
    capability: Capability<T>,
    implementation: Constructor<T>,
    options?: IProviderOptions,
  ): this;
  addSingleton<T>(
    capabilityOrImpl: Capability<T>,
    implementationOrOptions?: Constructor<T> | IProviderOptions,
    options?: IProviderOptions,
  ): this {
    return this.addClass(Lifetime.Singleton, capabilityOrImpl, implementationOrOptions, options);
  }

  addSingletonFactory<T>(
    capability: Capability<T>,
    factory: ProviderFactory<T>,
    options?: IProviderOptions,
  ): this {
    return this.register(capability, factory, Lifetime.Singleton, options);
  }

  addSingletonInstance<T>(capability: Capability<T>, instance: T, options?: IProviderOptions): this {
    return this.add(createInstanceDescriptor(capability, instance, options));
  }

  // ============================================================================
  // Scoped Registration
  // ============================================================================

  addScoped<T>(implementation: Constructor<T>, options?: IProviderOptions): this;
  addScoped<T>(
    capability: Capability<T>,
    implementation: Constructor<T>,
    options?: IProviderOptions,
  ): this;
  addScoped<T>(
    capabilityOrImpl: Capability<T>,
    implementationOrOptions?: Constructor<T> | IProviderOptions,
    options?: IProviderOptions,
  ): this {
    return this.addClass(Lifetime.Scoped, capabilityOrImpl, implementationOrOptions, options);
  }

  addScopedFactory<T>(
    capability: Capability<T>,
    factory: ProviderFactory<T>,
    options?: IProviderOptions,
  ): this {
    return this.register(capability, factory, Lifetime.Scoped, options);
  }

  // ============================================================================
  // Transient Registration
  // ============================================================================

  addTransient<T>(implementation: Constructor<T>, options?: IProviderOptions): this;
  addTransient<T>(
    capability: Capability<T>,
    implementation: Constructor<T>,
    options?: IProviderOptions,
  ): this;
  addTransient<T>(
    capabilityOrImpl: Capability<T>,
    implementationOrOptions?: Constructor<T> | IProviderOptions,
    options?: IProviderOptions,
  ): this {
    return this.addClass(Lifetime.Transient, capabilityOrImpl, implementationOrOptions, options);
  }

  addTransientFactory<T>(
    capability: Capability<T>,
    factory: ProviderFactory<T>,
    options?: IProviderOptions,
  ): this {
    return this.register(capability, factory, Lifetime.Transient, options);
  }

  // ============================================================================
  // Utility Methods
  // ============================================================================

  has(capability: Capability): boolean {
    return this.descriptors.has(capability);
  }

  getDescriptors(): readonly IProviderDescriptor[] {
    return Array.from(this.descriptors.values());
  }

  getDescriptor<T>(capability: Capability<T>): IProviderDescriptor<T> | undefined {
    return this.descriptors.get(capability) as IProviderDescriptor<T> | undefined;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Seal the registry and build the container.
   */
  build(options?: ContainerOptions): Container {
    this.sealed = true;
    return new Container(this.descriptors, options);
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private add<T>(descriptor: IProviderDescriptor<T>): this {
    if (this.sealed) {
      throw new ContainerSealedError();
    }
    validateDescriptor(descriptor);

    this.descriptors.set(descriptor.capability, descriptor);
    return this;
  }

  /**
   * Handles both `add*(Implementation)` and `add*(Capability, Implementation)`.
   */
  private addClass<T>(
    lifetime: Lifetime,
    capabilityOrImpl: Capability<T>,
    implementationOrOptions: Constructor<T> | IProviderOptions | undefined,
    options: IProviderOptions | undefined,
  ): this {
    if (typeof implementationOrOptions === 'function') {
      return this.add(
        createClassDescriptor(capabilityOrImpl, lifetime, implementationOrOptions, options),
      );
    }

    if (typeof capabilityOrImpl === 'function') {
      return this.add(
        createClassDescriptor(capabilityOrImpl, lifetime, capabilityOrImpl, implementationOrOptions),
      );
    }

    throw new TypeError(
      `Invalid registration for '${getCapabilityName(capabilityOrImpl)}': ` +
        `expected a constructor or a capability with an implementation`,
    );
  }
}

export function createCapabilityRegistry(): CapabilityRegistry {
  return new CapabilityRegistry();
}
