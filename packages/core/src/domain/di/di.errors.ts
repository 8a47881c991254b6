/**
 * @fileoverview DI Errors - Dependency Container Error Classes
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Container errors carry the resolution path that led to them, so a
 * failure deep in a dependency chain names every link of it.
 *
 * @version 1.0.0
 */

import { FrameworkError } from '../common/framework-error';

import { type Capability, getCapabilityName } from './capability';
import { type Lifetime, getLifetimeName } from './lifetime';

/**
 * Base error class for all container errors.
 *
 * @example
 * ```typescript
 * try {
 *   container.resolve(PlaceOrderHandler);
 * } catch (error) {
 *   if (error instanceof DIError) {
 *     log.error({ path: error.resolutionPath }, error.message);
 *   }
 *   throw error;
 * }
 * ```
 */
export abstract class DIError extends FrameworkError {
  /**
   * Chain of capabilities being resolved when the error occurred:
   * ```
   * PlaceOrderHandler -> OrderPricing -> IClock (UNREGISTERED)
   * ```
   */
  public readonly resolutionPath: string[];

  /**
   * Indented rendering of `resolutionPath`:
   * ```
   * PlaceOrderHandler
   *   └─ OrderPricing
   *     └─ IClock (UNREGISTERED)
   * ```
   */
  public readonly dependencyGraph: string;

  constructor(message: string, code: string, resolutionPath: string[] = []) {
    super(message, code);
    this.resolutionPath = resolutionPath;
    this.dependencyGraph = this.buildDependencyGraph();
  }

  /** @internal */
  private buildDependencyGraph(): string {
    return this.resolutionPath
      .map((entry, i) => `${'  '.repeat(i)}${i === 0 ? '' : '└─ '}${entry}`)
      .join('\n');
  }
}

/**
 * Thrown when a capability has no binding. Resolution never answers
 * `undefined` for a missing capability; only `tryResolve` does.
 */
export class UnregisteredCapabilityError extends DIError {
  public readonly capability: Capability;

  constructor(capability: Capability, resolutionPath: string[] = []) {
    const name = getCapabilityName(capability);
    super(
      `Capability '${name}' is not registered in the container. ` +
        `Register a provider for it before building the container.`,
      'UNREGISTERED_CAPABILITY',
      [...resolutionPath, `${name} (UNREGISTERED)`],
    );
    this.capability = capability;
  }
}

/**
 * Thrown when resolution revisits a capability that is still being built
 * on the current resolution stack.
 *
 * @example
 * ```
 * OrderService -> PricingService -> OrderService
 * ```
 */
export class CyclicDependencyError extends DIError {
  public readonly capability: Capability;

  /**
   * Names along the cycle, starting at the outermost resolution and
   * ending with the revisited capability.
   */
  public readonly cyclePath: string[];

  constructor(capability: Capability, resolutionPath: string[]) {
    const name = getCapabilityName(capability);
    const cyclePath = [...resolutionPath, name];

    super(
      `Cyclic dependency detected: ${cyclePath.join(' -> ')}`,
      'CYCLIC_DEPENDENCY',
      [...resolutionPath, `${name} (CYCLE)`],
    );
    this.capability = capability;
    this.cyclePath = cyclePath;
  }
}

/**
 * Thrown when a longer-lived provider depends on a shorter-lived one
 * (a "captive dependency"), e.g. a Singleton holding a Scoped repository.
 */
export class ScopeMismatchError extends DIError {
  public readonly dependent: Capability;
  public readonly dependency: Capability;
  public readonly dependentLifetime: Lifetime;
  public readonly dependencyLifetime: Lifetime;

  constructor(
    dependent: Capability,
    dependency: Capability,
    dependentLifetime: Lifetime,
    dependencyLifetime: Lifetime,
    resolutionPath: string[] = [],
  ) {
    const dependentName = getCapabilityName(dependent);
    const dependencyName = getCapabilityName(dependency);
    const dependentLifetimeName = getLifetimeName(dependentLifetime);
    const dependencyLifetimeName = getLifetimeName(dependencyLifetime);

    super(
      `Scope mismatch: ${dependentLifetimeName} provider '${dependentName}' ` +
        `cannot depend on ${dependencyLifetimeName} provider '${dependencyName}'.`,
      'SCOPE_MISMATCH',
      [...resolutionPath, `${dependencyName} (${dependencyLifetimeName}) ← SCOPE MISMATCH`],
    );

    this.dependent = dependent;
    this.dependency = dependency;
    this.dependentLifetime = dependentLifetime;
    this.dependencyLifetime = dependencyLifetime;
  }
}

/**
 * Thrown when a Scoped capability is resolved with no Unit of Work scope
 * bound to the current execution context.
 */
export class NoActiveScopeError extends DIError {
  public readonly capability: Capability;

  constructor(capability: Capability, resolutionPath: string[] = []) {
    const name = getCapabilityName(capability);
    super(
      `Cannot resolve Scoped capability '${name}' outside of a Unit of Work. ` +
        `Resolve it from a handler, from unitOfWork.scope, or inside unitOfWorkFactory.run().`,
      'NO_ACTIVE_SCOPE',
      [...resolutionPath, `${name} (NO SCOPE)`],
    );
    this.capability = capability;
  }
}

/**
 * Wraps an error thrown by a constructor or factory.
 */
export class ProviderCreationError extends DIError {
  public readonly capability: Capability;
  public readonly cause: Error;

  constructor(capability: Capability, cause: Error, resolutionPath: string[] = []) {
    const name = getCapabilityName(capability);
    super(`Failed to create provider '${name}': ${cause.message}`, 'PROVIDER_CREATION_FAILED', [
      ...resolutionPath,
      `${name} (CREATION FAILED)`,
    ]);
    this.capability = capability;
    this.cause = cause;
  }
}

/**
 * Thrown when an async factory is reached through synchronous `resolve()`.
 */
export class AsyncProviderError extends DIError {
  public readonly capability: Capability;

  constructor(capability: Capability, resolutionPath: string[] = []) {
    const name = getCapabilityName(capability);
    super(
      `Provider '${name}' is async and cannot be resolved synchronously. Use resolveAsync().`,
      'ASYNC_PROVIDER',
      [...resolutionPath, `${name} (ASYNC)`],
    );
    this.capability = capability;
  }
}

/**
 * Thrown when resolving from a scope that has ended.
 */
export class ScopeDisposedError extends DIError {
  constructor() {
    super(
      'Cannot resolve from a disposed scope. Its Unit of Work has already ended.',
      'SCOPE_DISPOSED',
    );
  }
}

/**
 * Thrown when resolving from a disposed container.
 */
export class ContainerDisposedError extends DIError {
  constructor() {
    super('Cannot resolve from a disposed container.', 'CONTAINER_DISPOSED');
  }
}

/**
 * Thrown when registering after the registry has been built.
 */
export class ContainerSealedError extends DIError {
  constructor() {
    super(
      'Cannot register providers after the container has been built. ' +
        'Register everything before calling build().',
      'CONTAINER_SEALED',
    );
  }
}
