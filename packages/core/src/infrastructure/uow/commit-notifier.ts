/**
 * @fileoverview CommitNotifier - Fan-out of Commit Results
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/uow
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * @version 1.0.0
 */

import { type CommitListener, type CommitResult, type ICommitNotifier } from '../../domain/uow';
import { type Logger, logger as defaultLogger } from '../logging';

/**
 * CommitNotifier - Calls listeners in subscription order.
 *
 * @remarks
 * A failing listener is logged and does not stop the others; the commit it
 * reports has already happened.
 *
 * @example
 * ```typescript
 * const notifier = new CommitNotifier();
 * notifier.subscribe((result) => cache.invalidateTags(result.mutatedTypes));
 * ```
 */
export class CommitNotifier implements ICommitNotifier {
  private readonly listeners = new Set<CommitListener>();

  private readonly log: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.log = logger.child({ component: 'commit-notifier' });
  }

  subscribe(listener: CommitListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async notify(result: CommitResult): Promise<void> {
    for (const listener of Array.from(this.listeners)) {
      try {
        await listener(result);
      } catch (error) {
        this.log.error({ err: error, unitOfWorkId: result.unitOfWorkId }, 'Commit listener failed');
      }
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
