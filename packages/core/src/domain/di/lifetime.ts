/**
 * @fileoverview Lifetime - Provider Instance Lifecycle
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Lifetimes decide when the container builds a new instance and how long
 * it keeps it.
 *
 * @version 1.0.0
 */

/**
 * Lifetime - When provider instances are created and released.
 *
 * @remarks
 * | Lifetime  | Created                      | Shared               | Released             |
 * |-----------|------------------------------|----------------------|----------------------|
 * | Singleton | First resolution             | Whole process        | `container.dispose()` |
 * | Scoped    | First resolution in the scope | One Unit of Work     | Unit of Work ends    |
 * | Transient | Every resolution             | Never                | Garbage collection   |
 *
 * **Dependency Rules** (checked when `validateScopes` is on):
 *
 * - Singleton may depend on: Singleton
 * - Scoped may depend on: Singleton, Scoped
 * - Transient may depend on: anything
 *
 * A singleton holding a scoped repository would keep the first Unit of
 * Work's identity map alive for every later dispatch.
 *
 * @example
 * ```typescript
 * registry.register(IClock, () => new SystemClock(), Lifetime.Singleton);
 * registry.register(repositoryToken('Order'), (r) => new SqlOrders(r.resolve(IDb)), Lifetime.Scoped);
 * registry.register(PlaceOrderHandler, (r) => new PlaceOrderHandler(r.resolve(IClock)), Lifetime.Transient);
 * ```
 */
export enum Lifetime {
  /**
   * One instance for the whole process. Must not hold per-dispatch state.
   */
  Singleton = 'singleton',

  /**
   * One instance per Unit of Work. Instances implementing IDisposable are
   * disposed when the Unit of Work commits or rolls back.
   */
  Scoped = 'scoped',

  /**
   * A fresh instance on every resolution.
   */
  Transient = 'transient',
}

/**
 * Whether instances of this lifetime are cached.
 *
 * @internal
 */
export function isCacheable(lifetime: Lifetime): boolean {
  return lifetime === Lifetime.Singleton || lifetime === Lifetime.Scoped;
}

/**
 * Priority of a lifetime: higher means shorter-lived.
 *
 * @internal
 */
export function getLifetimePriority(lifetime: Lifetime): number {
  switch (lifetime) {
    case Lifetime.Singleton:
      return 0;
    case Lifetime.Scoped:
      return 1;
    case Lifetime.Transient:
      return 2;
  }
}

/**
 * Check if a provider with `from` lifetime can depend on one with `to`.
 *
 * @example
 * ```typescript
 * canDependOn(Lifetime.Scoped, Lifetime.Singleton); // true
 * canDependOn(Lifetime.Singleton, Lifetime.Scoped); // false
 * ```
 */
export function canDependOn(from: Lifetime, to: Lifetime): boolean {
  return getLifetimePriority(from) >= getLifetimePriority(to);
}

export function getLifetimeName(lifetime: Lifetime): string {
  switch (lifetime) {
    case Lifetime.Singleton:
      return 'Singleton';
    case Lifetime.Scoped:
      return 'Scoped';
    case Lifetime.Transient:
      return 'Transient';
  }
}
