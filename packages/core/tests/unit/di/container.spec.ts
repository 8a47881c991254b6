/**
 * @fileoverview Container Unit Tests
 *
 * Tests for the capability resolution engine.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import {
  AsyncProviderError,
  CONTAINER_TOKEN,
  ContainerDisposedError,
  CyclicDependencyError,
  NoActiveScopeError,
  ProviderCreationError,
  SCOPE_CONTEXT_KEY,
  SCOPE_FACTORY_TOKEN,
  ScopeMismatchError,
  UnregisteredCapabilityError,
  createToken,
  type IDisposable,
} from '../../../src/domain/di';
import { ExecutionContext } from '../../../src/infrastructure/context';
import { CapabilityRegistry } from '../../../src/infrastructure/di';

// ============================================================================
// Test Fixtures
// ============================================================================

interface IClock {
  now(): number;
}

interface IDatabase {
  query(sql: string): Promise<string[]>;
}

const IClock = createToken<IClock>('IClock');
const IDatabase = createToken<IDatabase>('IDatabase');

class FixedClock implements IClock {
  now(): number {
    return 1_000;
  }
}

class MemoryDatabase implements IDatabase {
  async query(sql: string): Promise<string[]> {
    return [sql];
  }
}

class OrderPricing {
  static inject = [IClock] as const;

  constructor(public readonly clock: IClock) {}
}

class PlaceOrderHandler {
  static inject = [OrderPricing, IDatabase] as const;

  constructor(
    public readonly pricing: OrderPricing,
    public readonly db: IDatabase,
  ) {}
}

class Ping {
  static inject = [] as const;
}

class NeedsMissing {
  static inject = [createToken<unknown>('IMissing')] as const;

  constructor(public readonly missing: unknown) {}
}

describe('Container', () => {
  let registry: CapabilityRegistry;

  beforeEach(() => {
    registry = new CapabilityRegistry();
  });

  // ============================================================================
  // Lifetimes
  // ============================================================================

  describe('lifetimes', () => {
    it('should cache singletons', () => {
      registry.addSingleton(IClock, FixedClock);
      const container = registry.build();

      expect(container.resolve(IClock)).toBe(container.resolve(IClock));
    });

    it('should create transients on every resolution', () => {
      registry.addSingleton(IClock, FixedClock).addTransient(OrderPricing);
      const container = registry.build();

      const first = container.resolve(OrderPricing);
      const second = container.resolve(OrderPricing);

      expect(first).not.toBe(second);
      expect(first.clock).toBe(second.clock);
    });

    it('should refuse a scoped capability with no active scope', () => {
      registry.addSingleton(IClock, FixedClock).addScoped(OrderPricing);
      const container = registry.build();

      expect(() => container.resolve(OrderPricing)).toThrow(NoActiveScopeError);
    });

    it('should cache scoped instances per scope', () => {
      registry.addSingleton(IClock, FixedClock).addScoped(OrderPricing);
      const container = registry.build();
      const scopeA = container.createScope();
      const scopeB = container.createScope();

      const a1 = scopeA.resolve(OrderPricing);
      const a2 = scopeA.resolve(OrderPricing);
      const b1 = scopeB.resolve(OrderPricing);

      expect(a1).toBe(a2);
      expect(a1).not.toBe(b1);
      expect(a1.clock).toBe(b1.clock);
    });

    it('should resolve scoped capabilities from the scope bound to the execution context', () => {
      registry.addSingleton(IClock, FixedClock).addScoped(OrderPricing);
      const container = registry.build();
      const scope = container.createScope();

      const resolved = ExecutionContext.run({}, () => {
        ExecutionContext.require().set(SCOPE_CONTEXT_KEY, scope);
        return container.resolve(OrderPricing);
      });

      expect(resolved).toBe(scope.resolve(OrderPricing));
    });

    it('should ignore a bound scope that belongs to another container', () => {
      registry.addSingleton(IClock, FixedClock).addScoped(OrderPricing);
      const container = registry.build();
      const other = new CapabilityRegistry().build();

      ExecutionContext.run({}, () => {
        ExecutionContext.require().set(SCOPE_CONTEXT_KEY, other.createScope());

        expect(() => container.resolve(OrderPricing)).toThrow(NoActiveScopeError);
      });
    });
  });

  // ============================================================================
  // Dependencies
  // ============================================================================

  describe('dependencies', () => {
    it('should inject static inject dependencies in order', () => {
      registry
        .addSingleton(IClock, FixedClock)
        .addSingletonFactory(IDatabase, () => new MemoryDatabase())
        .addTransient(OrderPricing)
        .addTransient(PlaceOrderHandler);
      const container = registry.build();

      const handler = container.resolve(PlaceOrderHandler);

      expect(handler.pricing).toBeInstanceOf(OrderPricing);
      expect(handler.pricing.clock.now()).toBe(1_000);
      expect(handler.db).toBeInstanceOf(MemoryDatabase);
    });

    it('should construct a class with an empty inject list', () => {
      registry.addTransient(Ping);

      expect(registry.build().resolve(Ping)).toBeInstanceOf(Ping);
    });

    it('should hand factories a resolver', () => {
      registry
        .addSingleton(IClock, FixedClock)
        .addTransientFactory('timestamp', (resolver) => resolver.resolve(IClock).now());

      expect(registry.build().resolve<number>('timestamp')).toBe(1_000);
    });

    it('should resolve the container and scope factory tokens', () => {
      const container = registry.build();

      expect(container.resolve(CONTAINER_TOKEN)).toBe(container);
      expect(container.resolve(SCOPE_FACTORY_TOKEN).createScope().isDisposed()).toBe(false);
    });

    it('should return undefined from tryResolve only for unregistered capabilities', () => {
      registry.addSingleton(IClock, FixedClock);
      const container = registry.build();

      expect(container.tryResolve(IDatabase)).toBeUndefined();
      expect(container.tryResolve(IClock)).toBeInstanceOf(FixedClock);
    });
  });

  // ============================================================================
  // Errors
  // ============================================================================

  describe('errors', () => {
    it('should report an unregistered dependency with its resolution path', () => {
      registry.addTransient(OrderPricing);
      const container = registry.build();

      try {
        container.resolve(OrderPricing);
        expect.fail('expected resolution to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(UnregisteredCapabilityError);
        if (error instanceof UnregisteredCapabilityError) {
          expect(error.code).toBe('UNREGISTERED_CAPABILITY');
          expect(error.resolutionPath).toEqual(['OrderPricing', 'IClock (UNREGISTERED)']);
          expect(error.dependencyGraph).toBe('OrderPricing\n  └─ IClock (UNREGISTERED)');
        }
      }
    });

    it('should detect a cycle', () => {
      const IFirst = createToken<unknown>('First');
      const ISecond = createToken<unknown>('Second');
      registry
        .addTransientFactory(IFirst, (resolver) => resolver.resolve(ISecond))
        .addTransientFactory(ISecond, (resolver) => resolver.resolve(IFirst));
      const container = registry.build();

      expect(() => container.resolve(IFirst)).toThrow(CyclicDependencyError);
      expect(() => container.resolve(IFirst)).toThrow(
        'Cyclic dependency detected: First -> Second -> First',
      );
    });

    it('should detect a cycle through async resolution', async () => {
      const IFirst = createToken<unknown>('First');
      const ISecond = createToken<unknown>('Second');
      registry
        .addTransientFactory(IFirst, (resolver) => resolver.resolveAsync(ISecond))
        .addTransientFactory(ISecond, (resolver) => resolver.resolveAsync(IFirst));
      const container = registry.build();

      await expect(container.resolveAsync(IFirst)).rejects.toBeInstanceOf(CyclicDependencyError);
    });

    it('should reject a singleton class depending on a scoped one at build time', () => {
      class CachedPricing {
        static inject = [OrderPricing] as const;
        constructor(public readonly pricing: OrderPricing) {}
      }
      registry.addSingleton(IClock, FixedClock).addScoped(OrderPricing).addSingleton(CachedPricing);

      expect(() => registry.build()).toThrow(
        "Scope mismatch: Singleton provider 'CachedPricing' cannot depend on Scoped provider 'OrderPricing'.",
      );
    });

    it('should reject a singleton factory resolving a scoped capability', () => {
      registry
        .addSingleton(IClock, FixedClock)
        .addScoped(OrderPricing)
        .addSingletonFactory('pricing:cached', (resolver) => resolver.resolve(OrderPricing));
      const container = registry.build();

      expect(() => container.createScope().resolve('pricing:cached')).toThrow(ScopeMismatchError);
    });

    it('should allow captive dependencies when scope validation is off', () => {
      registry
        .addSingleton(IClock, FixedClock)
        .addScoped(OrderPricing)
        .addSingletonFactory('pricing:cached', (resolver) => resolver.resolve(OrderPricing));
      const container = registry.build({ validateScopes: false });
      const scope = container.createScope();

      const cached = ExecutionContext.run({}, () => {
        ExecutionContext.require().set(SCOPE_CONTEXT_KEY, scope);
        return container.resolve('pricing:cached');
      });

      expect(cached).toBe(scope.resolve(OrderPricing));
    });

    it('should wrap factory failures', () => {
      registry.addSingletonFactory(IDatabase, () => {
        throw new Error('db down');
      });
      const container = registry.build();

      expect(() => container.resolve(IDatabase)).toThrow(ProviderCreationError);
      expect(() => container.resolve(IDatabase)).toThrow(
        "Failed to create provider 'IDatabase': db down",
      );
    });

    it('should not wrap container errors raised by dependencies', () => {
      registry.addTransient(NeedsMissing);

      expect(() => registry.build().resolve(NeedsMissing)).toThrow(UnregisteredCapabilityError);
    });
  });

  // ============================================================================
  // Async Providers
  // ============================================================================

  describe('async providers', () => {
    it('should refuse an async factory through resolve()', () => {
      registry.addSingletonFactory(IDatabase, async () => new MemoryDatabase());

      expect(() => registry.build().resolve(IDatabase)).toThrow(AsyncProviderError);
    });

    it('should resolve an async factory through resolveAsync()', async () => {
      registry.addSingletonFactory(IDatabase, async () => new MemoryDatabase());
      const container = registry.build();

      const db = await container.resolveAsync(IDatabase);

      expect(await db.query('select 1')).toEqual(['select 1']);
      expect(container.resolve(IDatabase)).toBe(db);
    });

    it('should share the first construction of an async singleton', async () => {
      const factory = vi.fn(async () => new MemoryDatabase());
      registry.addSingletonFactory(IDatabase, factory);
      const container = registry.build();

      const [first, second] = await Promise.all([
        container.resolveAsync(IDatabase),
        container.resolveAsync(IDatabase),
      ]);

      expect(first).toBe(second);
      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('should resolve class dependencies asynchronously', async () => {
      registry
        .addSingleton(IClock, FixedClock)
        .addSingletonFactory(IDatabase, async () => new MemoryDatabase())
        .addTransient(OrderPricing)
        .addTransient(PlaceOrderHandler);

      const handler = await registry.build().resolveAsync(PlaceOrderHandler);

      expect(handler.db).toBeInstanceOf(MemoryDatabase);
    });

    it('should reject async singletons whose constructions wait on each other', async () => {
      const IFirst = createToken<unknown>('First');
      const ISecond = createToken<unknown>('Second');
      const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));
      registry
        .addSingletonFactory(IFirst, async (resolver) => {
          await tick();
          return resolver.resolveAsync(ISecond);
        })
        .addSingletonFactory(ISecond, async (resolver) => {
          await tick();
          return resolver.resolveAsync(IFirst);
        });
      const container = registry.build();

      const [first, second] = await Promise.allSettled([
        container.resolveAsync(IFirst),
        container.resolveAsync(ISecond),
      ]);

      expect(first.status).toBe('rejected');
      expect(second.status).toBe('rejected');
      if (first.status === 'rejected' && second.status === 'rejected') {
        expect(first.reason).toBeInstanceOf(CyclicDependencyError);
        expect(second.reason).toBe(first.reason);
        expect(first.reason).toMatchObject({
          message: 'Cyclic dependency detected: Second -> First',
        });
      }
    });

    it('should let a later resolution join a settled construction again', async () => {
      const IFirst = createToken<string>('First');
      const ISecond = createToken<string>('Second');
      registry
        .addSingletonFactory(IFirst, async () => 'first')
        .addSingletonFactory(ISecond, async (resolver) => `${await resolver.resolveAsync(IFirst)}+second`);
      const container = registry.build();

      const [first, second] = await Promise.all([
        container.resolveAsync(IFirst),
        container.resolveAsync(ISecond),
      ]);

      expect(first).toBe('first');
      expect(second).toBe('first+second');
    });
  });

  // ============================================================================
  // Build Options and Disposal
  // ============================================================================

  describe('eagerSingletons', () => {
    it('should construct singletons during build', () => {
      const factory = vi.fn(() => new FixedClock());
      registry.addSingletonFactory(IClock, factory);

      registry.build({ eagerSingletons: true });

      expect(factory).toHaveBeenCalledTimes(1);
    });
  });

  describe('dispose', () => {
    it('should dispose singletons in reverse creation order', async () => {
      const order: string[] = [];
      const disposable = (name: string): IDisposable => ({
        dispose: () => {
          order.push(name);
        },
      });
      registry
        .addSingletonFactory('first', () => disposable('first'))
        .addSingletonFactory('second', () => disposable('second'));
      const container = registry.build();
      container.resolve('first');
      container.resolve('second');

      await container.dispose();
      await container.dispose();

      expect(order).toEqual(['second', 'first']);
    });

    it('should keep disposing after a failure', async () => {
      const disposed = vi.fn();
      registry
        .addSingletonFactory('ok', () => ({ dispose: disposed }))
        .addSingletonFactory('broken', () => ({
          dispose: (): void => {
            throw new Error('dispose failed');
          },
        }));
      const container = registry.build();
      container.resolve('ok');
      container.resolve('broken');

      await expect(container.dispose()).resolves.toBeUndefined();
      expect(disposed).toHaveBeenCalledTimes(1);
    });

    it('should refuse resolution after disposal', async () => {
      registry.addSingleton(IClock, FixedClock);
      const container = registry.build();

      await container.dispose();

      expect(() => container.resolve(IClock)).toThrow(ContainerDisposedError);
    });
  });
});
