/**
 * @fileoverview Capability - Abstract Contract Identification
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A capability names an abstract contract (a repository, a service, a
 * handler) that the container resolves to a concrete provider. Three forms
 * are accepted:
 *
 * 1. **Token (symbol)**: interface abstraction, the recommended form
 *    ```typescript
 *    const IClock = createToken<IClock>('IClock');
 *    registry.addSingletonFactory(IClock, () => new SystemClock());
 *    ```
 *
 * 2. **Class**: concrete self-registration
 *    ```typescript
 *    registry.addScoped(OrderPricing);
 *    ```
 *
 * 3. **String**: names produced by configuration or code generators
 *    ```typescript
 *    registry.addScopedFactory('repository:Order', () => new OrderRepository());
 *    ```
 *
 * ## Zero-Reflection Dependencies
 *
 * Class providers list their dependencies in a `static inject` array, in
 * constructor parameter order. No decorators, no reflect-metadata.
 *
 * @version 1.0.0
 */

import type { IContainer, IScopeFactory } from './container.interface';

/**
 * Type representing a constructor function.
 *
 * @template T - The instance type created by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = unknown> = new (...args: any[]) => T;

/**
 * Capability - Unified key for registrations in the container.
 *
 * @template T - The instance type the capability resolves to
 *
 * @remarks
 * The type parameter travels with the alias, so a token created with
 * `createToken<IClock>()` resolves to `IClock` without annotations.
 *
 * Tokens compare by identity: two `Symbol('IClock')` are two capabilities.
 * Strings compare by value, classes by reference.
 */
export type Capability<T = unknown> = Constructor<T> | symbol | string;

/**
 * Check if a value is a valid Capability.
 *
 * @example
 * ```typescript
 * isCapability(OrderPricing);        // true
 * isCapability(Symbol('IClock'));    // true
 * isCapability('repository:Order');  // true
 * isCapability(42);                  // false
 * ```
 */
export function isCapability(value: unknown): value is Capability {
  const type = typeof value;
  return type === 'symbol' || type === 'string' || type === 'function';
}

/**
 * Get a human-readable name for a capability, used in error messages.
 *
 * @example
 * ```typescript
 * getCapabilityName(OrderPricing);      // 'OrderPricing'
 * getCapabilityName(Symbol('IClock'));  // 'IClock'
 * getCapabilityName('repository:Order'); // 'repository:Order'
 * ```
 */
export function getCapabilityName(capability: Capability): string {
  if (typeof capability === 'symbol') {
    return capability.description ?? capability.toString();
  }

  if (typeof capability === 'string') {
    return capability;
  }

  return capability.name || 'AnonymousClass';
}

// ============================================================================
// Injectable Constructors (Static Inject Pattern)
// ============================================================================

/**
 * A constructor that declares its dependencies.
 *
 * @example
 * ```typescript
 * class PlaceOrderHandler {
 *   static inject = [IClock, repositoryToken('Order')] as const;
 *
 *   constructor(
 *     private readonly clock: IClock,
 *     private readonly orders: IRepository<Order>,
 *   ) {}
 * }
 * ```
 */
export interface IInjectableConstructor<T = unknown> extends Constructor<T> {
  /**
   * Dependencies, in constructor parameter order.
   */
  inject?: readonly Capability[];
}

export function hasInjectProperty(ctor: Constructor): ctor is IInjectableConstructor {
  return 'inject' in ctor && Array.isArray(ctor.inject);
}

/**
 * Dependencies declared by a constructor, or an empty list.
 */
export function getInjectDependencies(ctor: Constructor): readonly Capability[] {
  if (hasInjectProperty(ctor)) {
    return ctor.inject ?? [];
  }
  return [];
}

// ============================================================================
// Token Creation Helpers
// ============================================================================

/**
 * Create a typed capability token for an interface.
 *
 * @template T - The contract the token stands for
 *
 * @example
 * ```typescript
 * interface IClock {
 *   now(): Date;
 * }
 *
 * const IClock = createToken<IClock>('IClock');
 *
 * registry.addSingletonFactory(IClock, () => ({ now: () => new Date() }));
 * const clock = container.resolve(IClock); // IClock
 * ```
 */
export function createToken<T>(description: string): Capability<T> {
  const token: Capability<T> = Symbol(description);
  return token;
}

// ============================================================================
// Pre-defined Core Tokens
// ============================================================================

/**
 * Resolves to the root container.
 */
export const CONTAINER_TOKEN = createToken<IContainer>('IContainer');

/**
 * Resolves to the scope factory (`{ createScope() }`).
 */
export const SCOPE_FACTORY_TOKEN = createToken<IScopeFactory>('IScopeFactory');
