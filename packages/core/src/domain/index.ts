/**
 * @fileoverview Domain Layer Exports
 *
 * Contracts, entities and errors. Nothing here depends on Node.js or on
 * the infrastructure layer.
 *
 * @module @weavearc/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// Common - Error base
// ============================================================================
export * from './common';

// ============================================================================
// Context - Execution context contracts and keys
// ============================================================================
export * from './context';

// ============================================================================
// DI - Capabilities, lifetimes and container contracts
// ============================================================================
export * from './di';

// ============================================================================
// Entities and Repositories
// ============================================================================
export * from './entity';
export * from './repository';

// ============================================================================
// Unit of Work and Identity Map
// ============================================================================
export * from './uow';

// ============================================================================
// Dispatch - Messages, handlers and middleware contracts
// ============================================================================
export * from './dispatch';

// ============================================================================
// Cache and Serialization ports
// ============================================================================
export * from './cache';
export * from './serialization';
