/**
 * @fileoverview ContextKey Unit Tests
 *
 * Tests for the type-safe context key implementation.
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import {
  ContextKey,
  DISPATCH_ID_KEY,
  MESSAGE_TYPE_KEY,
  TIMESTAMP_KEY,
  TRACE_ID_KEY,
  USER_ID_KEY,
} from '../../../src/domain/context';
import { READ_SCOPE_KEY, UNIT_OF_WORK_KEY } from '../../../src/domain/uow';
import { SCOPE_CONTEXT_KEY } from '../../../src/domain/di';

describe('ContextKey', () => {
  // ============================================================================
  // Construction Tests
  // ============================================================================

  describe('constructor', () => {
    it('should create a key with only id', () => {
      const key = new ContextKey<string>('testKey');

      expect(key.id).toBe('testKey');
      expect(key.description).toBeUndefined();
      expect(key.defaultValue).toBeUndefined();
    });

    it('should create a key with all options', () => {
      const key = new ContextKey<boolean>('enabled', {
        description: 'Feature flag',
        defaultValue: false,
      });

      expect(key.id).toBe('enabled');
      expect(key.description).toBe('Feature flag');
      expect(key.defaultValue).toBe(false);
    });

    it('should support null as defaultValue', () => {
      const key = new ContextKey<string | null>('nullable', { defaultValue: null });

      expect(key.defaultValue).toBeNull();
    });

    it('should be frozen', () => {
      const key = new ContextKey<number>('attempt', { defaultValue: 1 });

      expect(Object.isFrozen(key)).toBe(true);
    });
  });

  // ============================================================================
  // toString Tests
  // ============================================================================

  describe('toString', () => {
    it('should return formatted string representation', () => {
      const key = new ContextKey<string>('myKey');

      expect(`Key: ${key}`).toBe('Key: ContextKey(myKey)');
    });
  });

  // ============================================================================
  // isContextKey Tests
  // ============================================================================

  describe('isContextKey', () => {
    it('should return true for ContextKey instances', () => {
      expect(ContextKey.isContextKey(new ContextKey<string>('test'))).toBe(true);
    });

    it('should return false for primitives', () => {
      expect(ContextKey.isContextKey('test')).toBe(false);
      expect(ContextKey.isContextKey(123)).toBe(false);
      expect(ContextKey.isContextKey(null)).toBe(false);
      expect(ContextKey.isContextKey(undefined)).toBe(false);
    });

    it('should return false for objects with matching shape but no brand', () => {
      const fake = { id: 'test', description: 'fake key', defaultValue: 'default' };

      expect(ContextKey.isContextKey(fake)).toBe(false);
    });
  });

  // ============================================================================
  // Pre-defined Keys Tests
  // ============================================================================

  describe('pre-defined keys', () => {
    it('should share ids with the string fields of the context data', () => {
      expect(TRACE_ID_KEY.id).toBe('traceId');
      expect(DISPATCH_ID_KEY.id).toBe('dispatchId');
      expect(MESSAGE_TYPE_KEY.id).toBe('messageType');
      expect(USER_ID_KEY.id).toBe('userId');
      expect(TIMESTAMP_KEY.id).toBe('timestamp');
    });

    it('should give every framework slot a distinct id', () => {
      const ids = [
        TRACE_ID_KEY,
        DISPATCH_ID_KEY,
        MESSAGE_TYPE_KEY,
        USER_ID_KEY,
        TIMESTAMP_KEY,
        SCOPE_CONTEXT_KEY,
        UNIT_OF_WORK_KEY,
        READ_SCOPE_KEY,
      ].map((key) => key.id);

      expect(new Set(ids).size).toBe(ids.length);
    });
  });
});
