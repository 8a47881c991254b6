/**
 * @fileoverview Domain DI Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Container contracts, capability helpers and error classes. The
 * infrastructure layer implements them.
 *
 * ## Zero-Reflection Pattern
 *
 * Dependencies are declared with static inject properties, not decorators:
 *
 * ```typescript
 * import { createToken } from '@weavearc/core';
 *
 * interface IClock { now(): Date; }
 * const IClock = createToken<IClock>('IClock');
 *
 * class OrderPricing {
 *   static inject = [IClock] as const;
 *   constructor(private clock: IClock) {}
 * }
 * ```
 */

// ============================================================================
// Capability
// ============================================================================

export {
  type Capability,
  type Constructor,
  type IInjectableConstructor,
  isCapability,
  getCapabilityName,
  hasInjectProperty,
  getInjectDependencies,
  createToken,
  CONTAINER_TOKEN,
  SCOPE_FACTORY_TOKEN,
} from './capability';

// ============================================================================
// Lifetime
// ============================================================================

export { Lifetime, isCacheable, getLifetimePriority, canDependOn, getLifetimeName } from './lifetime';

// ============================================================================
// Provider Descriptor
// ============================================================================

export {
  type IProviderDescriptor,
  type IProviderOptions,
  type ProviderFactory,
  type IResolver,
  createClassDescriptor,
  createFactoryDescriptor,
  createInstanceDescriptor,
  validateDescriptor,
} from './provider-descriptor';

// ============================================================================
// Container Interfaces
// ============================================================================

export {
  type IDisposable,
  type ICapabilityRegistry,
  type IContainer,
  type IScope,
  type IScopeFactory,
  type IBuildOptions,
  isDisposable,
  SCOPE_CONTEXT_KEY,
} from './container.interface';

// ============================================================================
// DI Errors
// ============================================================================

export {
  DIError,
  UnregisteredCapabilityError,
  CyclicDependencyError,
  ScopeMismatchError,
  NoActiveScopeError,
  ProviderCreationError,
  AsyncProviderError,
  ScopeDisposedError,
  ContainerDisposedError,
  ContainerSealedError,
} from './di.errors';
