/**
 * @fileoverview Vitest Test Setup
 *
 * Global test configuration for @weavearc/core.
 * This file is loaded before each test file runs.
 *
 * @license Apache-2.0
 */

import { afterEach, vi } from 'vitest';

// ============================================================================
// Environment
// ============================================================================

// The default logger reads these when its module is first imported.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';

// ============================================================================
// Per-Test Cleanup
// ============================================================================

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});
