/**
 * @fileoverview ConfigurationError
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/config
 * @license Apache-2.0
 */

import { type ZodIssue } from 'zod';

import { FrameworkError } from '../../domain/common';

/**
 * Raised when environment variables or overrides fail validation. The
 * message lists one `path: message` line per zod issue.
 */
export class ConfigurationError extends FrameworkError {
  public readonly issues: ZodIssue[];

  constructor(source: string, issues: ZodIssue[]) {
    const details = issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    super(`Invalid ${source}:\n${details}`, 'INVALID_CONFIGURATION');
    this.issues = issues;
  }
}
