/**
 * @fileoverview Infrastructure Layer Exports
 *
 * Implementations of the domain contracts: AsyncLocalStorage context,
 * container, Unit of Work, cache, serializer, in-memory repository,
 * configuration and logging.
 *
 * @module @weavearc/core/infrastructure
 * @license Apache-2.0
 */

// ============================================================================
// Context - AsyncLocalStorage implementation
// ============================================================================
export * from './context';

// ============================================================================
// DI - Registry, container and scopes
// ============================================================================
export * from './di';

// ============================================================================
// Unit of Work
// ============================================================================
export * from './uow';

// ============================================================================
// Cache and Serialization
// ============================================================================
export * from './cache';
export * from './serialization';

// ============================================================================
// Persistence adapters
// ============================================================================
export * from './persistence';

// ============================================================================
// Configuration and Logging
// ============================================================================
export * from './config';
export * from './logging';
