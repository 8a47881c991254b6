/**
 * @fileoverview Infrastructure DI Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Concrete container implementations for the composition root.
 *
 * ```typescript
 * const registry = createCapabilityRegistry();
 * registry
 *   .addSingletonFactory(IClock, () => new SystemClock())
 *   .addScoped(repositoryToken('Order'), SqlOrderRepository)
 *   .addTransient(PlaceOrderHandler);
 *
 * const container = registry.build();
 * ```
 */

export { CapabilityRegistry, createCapabilityRegistry } from './capability-registry';

export { Container, type ContainerOptions, type ResolutionFrame } from './container';

export { ScopedContainer } from './scoped-container';
