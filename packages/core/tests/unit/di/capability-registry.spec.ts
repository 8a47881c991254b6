/**
 * @fileoverview CapabilityRegistry Unit Tests
 *
 * Tests for the registration phase of the container.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  ContainerSealedError,
  Lifetime,
  createToken,
  getCapabilityName,
  isCapability,
} from '../../../src/domain/di';
import { CapabilityRegistry, createCapabilityRegistry } from '../../../src/infrastructure/di';

// ============================================================================
// Test Fixtures
// ============================================================================

interface IClock {
  now(): number;
}

const IClock = createToken<IClock>('IClock');

class FixedClock implements IClock {
  now(): number {
    return 1_000;
  }
}

class OrderPricing {}

describe('CapabilityRegistry', () => {
  let registry: CapabilityRegistry;

  beforeEach(() => {
    registry = createCapabilityRegistry();
  });

  // ============================================================================
  // Registration
  // ============================================================================

  describe('registration', () => {
    it('should register a class under itself', () => {
      registry.addScoped(OrderPricing);

      const descriptor = registry.getDescriptor(OrderPricing);
      expect(descriptor?.lifetime).toBe(Lifetime.Scoped);
      expect(descriptor?.implementationType).toBe(OrderPricing);
    });

    it('should register a class under a token', () => {
      registry.addSingleton(IClock, FixedClock);

      const descriptor = registry.getDescriptor(IClock);
      expect(descriptor?.lifetime).toBe(Lifetime.Singleton);
      expect(descriptor?.implementationType).toBe(FixedClock);
    });

    it('should register factories with each lifetime', () => {
      registry
        .addSingletonFactory('clock:singleton', () => new FixedClock())
        .addScopedFactory('clock:scoped', () => new FixedClock())
        .addTransientFactory('clock:transient', () => new FixedClock())
        .register('clock:explicit', () => new FixedClock(), Lifetime.Scoped);

      expect(registry.getDescriptors().map((d) => d.lifetime)).toEqual([
        Lifetime.Singleton,
        Lifetime.Scoped,
        Lifetime.Transient,
        Lifetime.Scoped,
      ]);
    });

    it('should register an instance as a singleton', () => {
      const clock = new FixedClock();
      registry.addSingletonInstance(IClock, clock);

      const descriptor = registry.getDescriptor(IClock);
      expect(descriptor?.lifetime).toBe(Lifetime.Singleton);
      expect(registry.build().resolve(IClock)).toBe(clock);
    });

    it('should keep registration options on the descriptor', () => {
      registry.addTransient(OrderPricing, { name: 'pricing', tags: ['orders'] });

      const descriptor = registry.getDescriptor(OrderPricing);
      expect(descriptor?.name).toBe('pricing');
      expect(descriptor?.tags).toEqual(['orders']);
    });

    it('should replace an earlier binding for the same capability', () => {
      registry.addSingletonFactory(IClock, () => ({ now: () => 1 }));
      registry.addTransientFactory(IClock, () => ({ now: () => 2 }));

      expect(registry.getDescriptors()).toHaveLength(1);
      expect(registry.build().resolve(IClock).now()).toBe(2);
    });
  });

  // ============================================================================
  // Sealing
  // ============================================================================

  describe('build', () => {
    it('should seal the registry', () => {
      registry.addSingleton(IClock, FixedClock);
      registry.build();

      expect(registry.isSealed()).toBe(true);
      expect(() => registry.addScoped(OrderPricing)).toThrow(ContainerSealedError);
    });

    it('should report registered capabilities through has()', () => {
      registry.addScoped(OrderPricing);

      expect(registry.has(OrderPricing)).toBe(true);
      expect(registry.has(IClock)).toBe(false);
    });
  });
});

describe('capability helpers', () => {
  it('should name each capability form', () => {
    expect(getCapabilityName(OrderPricing)).toBe('OrderPricing');
    expect(getCapabilityName(IClock)).toBe('IClock');
    expect(getCapabilityName('repository:Order')).toBe('repository:Order');
  });

  it('should recognise capabilities', () => {
    expect(isCapability(OrderPricing)).toBe(true);
    expect(isCapability(IClock)).toBe(true);
    expect(isCapability('repository:Order')).toBe(true);
    expect(isCapability(42)).toBe(false);
  });

  it('should create distinct tokens for the same description', () => {
    expect(createToken<IClock>('IClock')).not.toBe(IClock);
  });
});
