/**
 * @fileoverview IProviderDescriptor - Registration Metadata
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A provider descriptor is the registry entry for one capability: how to
 * build it and how long to keep it. Descriptors are created during setup
 * and never change once the registry is built.
 *
 * @version 1.0.0
 */

import { type Capability, type Constructor, getCapabilityName } from './capability';
import { Lifetime } from './lifetime';

/**
 * Factory function for creating provider instances.
 *
 * @template T - The instance type
 *
 * @remarks
 * Factories receive a resolver bound to the current resolution stack, so
 * dependencies they resolve take part in cycle detection.
 *
 * @example
 * ```typescript
 * const pricingFactory: ProviderFactory<OrderPricing> = (resolver) =>
 *   new OrderPricing(resolver.resolve(IClock));
 * ```
 *
 * @example Async factory (resolve it with `resolveAsync`)
 * ```typescript
 * const poolFactory: ProviderFactory<Pool> = async () => {
 *   const pool = new Pool(config);
 *   await pool.connect();
 *   return pool;
 * };
 * ```
 */
export type ProviderFactory<T> = (resolver: IResolver) => T | Promise<T>;

/**
 * Minimal resolver handed to factories.
 */
export interface IResolver {
  /**
   * @throws UnregisteredCapabilityError if the capability is not registered
   * @throws CyclicDependencyError if the capability is already being built
   */
  resolve<T>(capability: Capability<T>): T;

  /**
   * Returns undefined only when the capability is not registered.
   */
  tryResolve<T>(capability: Capability<T>): T | undefined;

  /**
   * Resolve a capability whose factory (or a dependency's) is async.
   */
  resolveAsync<T>(capability: Capability<T>): Promise<T>;
}

/**
 * IProviderDescriptor - Complete metadata for a registered capability.
 *
 * @template T - The instance type
 *
 * @remarks
 * Exactly one of `implementationType` and `factory` is set.
 */
export interface IProviderDescriptor<T = unknown> {
  readonly capability: Capability<T>;

  readonly lifetime: Lifetime;

  /**
   * Class to instantiate. Its `static inject` list is resolved first.
   */
  readonly implementationType?: Constructor<T>;

  readonly factory?: ProviderFactory<T>;

  /**
   * Human-readable name for diagnostics. Defaults to the capability name.
   */
  readonly name?: string | undefined;

  /**
   * Free-form tags, e.g. `['repository']` for generated providers.
   */
  readonly tags?: readonly string[] | undefined;

  readonly metadata?: Readonly<Record<string, unknown>> | undefined;
}

/**
 * Options accepted by every registration method.
 */
export interface IProviderOptions {
  name?: string;
  tags?: string[];
  metadata?: Record<string, unknown>;
}

/**
 * Create a descriptor for a class-based registration.
 */
export function createClassDescriptor<T>(
  capability: Capability<T>,
  lifetime: Lifetime,
  implementationType: Constructor<T>,
  options?: IProviderOptions,
): IProviderDescriptor<T> {
  return {
    capability,
    lifetime,
    implementationType,
    name: options?.name,
    tags: options?.tags,
    metadata: options?.metadata,
  };
}

/**
 * Create a descriptor for a factory-based registration.
 */
export function createFactoryDescriptor<T>(
  capability: Capability<T>,
  lifetime: Lifetime,
  factory: ProviderFactory<T>,
  options?: IProviderOptions,
): IProviderDescriptor<T> {
  return {
    capability,
    lifetime,
    factory,
    name: options?.name,
    tags: options?.tags,
    metadata: options?.metadata,
  };
}

/**
 * Create a descriptor for an existing instance. Always Singleton.
 */
export function createInstanceDescriptor<T>(
  capability: Capability<T>,
  instance: T,
  options?: IProviderOptions,
): IProviderDescriptor<T> {
  return {
    capability,
    lifetime: Lifetime.Singleton,
    factory: () => instance,
    name: options?.name,
    tags: options?.tags,
    metadata: options?.metadata,
  };
}

/**
 * Validate a descriptor before it enters the registry.
 *
 * @throws TypeError if the descriptor is malformed
 *
 * @internal
 */
export function validateDescriptor<T>(descriptor: IProviderDescriptor<T>): void {
  const label = getCapabilityName(descriptor.capability);
  const hasImplementation = descriptor.implementationType !== undefined;
  const hasFactory = descriptor.factory !== undefined;

  if (!hasImplementation && !hasFactory) {
    throw new TypeError(`Provider for '${label}' must have either implementationType or factory`);
  }

  if (hasImplementation && hasFactory) {
    throw new TypeError(`Provider for '${label}' cannot have both implementationType and factory`);
  }

  if (hasImplementation && typeof descriptor.implementationType !== 'function') {
    throw new TypeError(`implementationType for '${label}' must be a constructor function`);
  }

  if (hasFactory && typeof descriptor.factory !== 'function') {
    throw new TypeError(`factory for '${label}' must be a function`);
  }

  if (!Object.values(Lifetime).includes(descriptor.lifetime)) {
    throw new TypeError(`Unknown lifetime '${String(descriptor.lifetime)}' for '${label}'`);
  }
}
