/**
 * @fileoverview UnitOfWorkFactory - Begins Scopes in the Execution Context
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/uow
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ```
 * ExecutionContext
 *   ├─ weavearc:unitOfWork -> UnitOfWork   (begin)
 *   ├─ weavearc:readScope  -> ReadScope    (beginRead)
 *   └─ weavearc:di:scope   -> the DI scope of whichever is active
 * ```
 *
 * At most one of them is active per execution context.
 *
 * @version 1.0.0
 */

import { randomUUID } from 'crypto';

import { type IContext } from '../../domain/context';
import { type IContainer } from '../../domain/di';
import {
  type CommitListener,
  type IClosableReadScope,
  type ICommitNotifier,
  type IUnitOfWork,
  type IUnitOfWorkFactory,
  MissingExecutionContextError,
  NestedScopeError,
  READ_SCOPE_KEY,
  UNIT_OF_WORK_KEY,
} from '../../domain/uow';
import { ExecutionContext } from '../context';
import { type Logger, logger as defaultLogger, withContext } from '../logging';

import { CommitNotifier } from './commit-notifier';
import { ReadScope } from './read-scope';
import { UnitOfWork } from './unit-of-work';

export interface UnitOfWorkFactoryOptions {
  container: IContainer;
  /** Shared by every Unit of Work; defaults to a private notifier */
  notifier?: ICommitNotifier;
  logger?: Logger;
}

/**
 * UnitOfWorkFactory - IUnitOfWorkFactory implementation.
 *
 * @example
 * ```typescript
 * const factory = new UnitOfWorkFactory({ container });
 *
 * const orderId = await factory.run(async (uow) => {
 *   const order = Order.place(input);
 *   uow.registerNew(order);
 *   return order.id;
 * });
 * ```
 */
export class UnitOfWorkFactory implements IUnitOfWorkFactory {
  private readonly container: IContainer;

  private readonly notifier: ICommitNotifier;

  private readonly log: Logger;

  constructor(options: UnitOfWorkFactoryOptions) {
    this.container = options.container;
    this.log = (options.logger ?? defaultLogger).child({ component: 'unit-of-work' });
    this.notifier = options.notifier ?? new CommitNotifier(this.log);
  }

  begin(): IUnitOfWork {
    const context = this.requireFreeContext();
    const unitOfWork = new UnitOfWork({
      id: `uow-${randomUUID()}`,
      scope: this.container.createScope(),
      context,
      notifier: this.notifier,
      logger: withContext(this.log, context),
    });

    this.log.debug({ unitOfWorkId: unitOfWork.id }, 'Unit of Work begun');
    return unitOfWork;
  }

  beginRead(): IClosableReadScope {
    const context = this.requireFreeContext();
    return new ReadScope({
      id: `read-${randomUUID()}`,
      scope: this.container.createScope(),
      context,
      logger: withContext(this.log, context),
    });
  }

  async run<R>(work: (unitOfWork: IUnitOfWork) => R | Promise<R>): Promise<R> {
    if (ExecutionContext.hasContext()) {
      return this.runInContext(work);
    }

    return ExecutionContext.run({ traceId: randomUUID(), timestamp: Date.now() }, () =>
      this.runInContext(work),
    );
  }

  onCommit(listener: CommitListener): () => void {
    return this.notifier.subscribe(listener);
  }

  private async runInContext<R>(work: (unitOfWork: IUnitOfWork) => R | Promise<R>): Promise<R> {
    const unitOfWork = this.begin();

    let result: R;
    try {
      result = await work(unitOfWork);
    } catch (error) {
      if (unitOfWork.isActive()) {
        await unitOfWork.rollback();
      }
      throw error;
    }

    if (unitOfWork.isActive()) {
      await unitOfWork.commit();
    }
    return result;
  }

  private requireFreeContext(): IContext {
    const context = ExecutionContext.current();
    if (!context) {
      throw new MissingExecutionContextError();
    }

    const active = context.get(UNIT_OF_WORK_KEY) ?? context.get(READ_SCOPE_KEY);
    if (active?.isActive()) {
      throw new NestedScopeError(active.id);
    }

    return context;
  }
}
