/**
 * @fileoverview Dispatch Errors
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/dispatch
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * @version 1.0.0
 */

import { type ZodIssue } from 'zod';

import { FrameworkError } from '../common/framework-error';

export abstract class DispatchError extends FrameworkError {
  public readonly messageType: string;

  constructor(message: string, code: string, messageType: string) {
    super(message, code);
    this.messageType = messageType;
  }
}

/**
 * Thrown by a second `registerHandler` for the same message type.
 */
export class DuplicateHandlerError extends DispatchError {
  constructor(messageType: string) {
    super(`A handler is already registered for '${messageType}'`, 'DUPLICATE_HANDLER', messageType);
  }
}

export class UnregisteredHandlerError extends DispatchError {
  constructor(messageType: string) {
    super(`No handler is registered for '${messageType}'`, 'UNREGISTERED_HANDLER', messageType);
  }
}

/**
 * Thrown by validationMiddleware before the handler runs.
 */
export class ValidationError extends DispatchError {
  public readonly issues: ZodIssue[];

  constructor(messageType: string, issues: ZodIssue[]) {
    const summary = issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    super(`Invalid payload for '${messageType}': ${summary}`, 'VALIDATION_FAILED', messageType);
    this.issues = issues;
  }
}

export class DispatchCancelledError extends DispatchError {
  public readonly dispatchId: string;
  public readonly reason: unknown;

  constructor(messageType: string, dispatchId: string, reason?: unknown) {
    super(`Dispatch of '${messageType}' (${dispatchId}) was cancelled`, 'DISPATCH_CANCELLED', messageType);
    this.dispatchId = dispatchId;
    this.reason = reason;
  }
}
