/**
 * @fileoverview @weavearc/core - Main Entry Point
 *
 * Domain object registry and use-case dispatch for clean-architecture
 * Node.js services: dependency container, identity map, Unit of Work,
 * command/query dispatcher and commit-invalidated query cache.
 *
 * @packageDocumentation
 * @module @weavearc/core
 * @version 1.0.0
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import {
 *   createApplication,
 *   defineCommand,
 *   defineQuery,
 *   Entity,
 *   InMemoryRepository,
 *   repositoryToken,
 * } from '@weavearc/core';
 *
 * class Order extends Entity<string> {
 *   readonly entityType = 'Order';
 *   constructor(id: string, public quantity: number) {
 *     super(id);
 *   }
 * }
 *
 * const PlaceOrder = defineCommand<{ id: string; quantity: number }, string>('PlaceOrder');
 * const GetOrder = defineQuery<{ id: string }, number | undefined>('GetOrder');
 *
 * const app = createApplication({
 *   services(registry) {
 *     registry.addSingletonInstance(repositoryToken<Order>('Order'), new InMemoryRepository<Order>('Order'));
 *   },
 *   handlers(dispatcher) {
 *     dispatcher
 *       .registerHandler(PlaceOrder, ({ payload }, { unitOfWork }) => {
 *         unitOfWork.registerNew(new Order(payload.id, payload.quantity));
 *         return payload.id;
 *       })
 *       .registerHandler(
 *         GetOrder,
 *         async ({ payload }, { reads }) => (await reads.load<Order>('Order', payload.id))?.quantity,
 *         { cache: true },
 *       );
 *   },
 * });
 *
 * await app.dispatcher.dispatch(PlaceOrder.create({ id: 'o-1', quantity: 2 }));
 * await app.dispatcher.dispatch(GetOrder.create({ id: 'o-1' })); // 2
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Contracts, entities and errors
// ============================================================================
export * from './domain';

// ============================================================================
// Application Layer Exports
// Dispatcher, middleware, composition root
// ============================================================================
export * from './application';

// ============================================================================
// Infrastructure Layer Exports
// Context, container, Unit of Work, cache, adapters
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0';
