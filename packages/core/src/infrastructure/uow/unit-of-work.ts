/**
 * @fileoverview UnitOfWork - Change Log and Ordered Flush
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/uow
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ## Commit
 *
 * ```
 * commit()
 *   1. resolve one repository per entity type from the scope
 *   2. delete stage  ─┐
 *   3. update stage   ├─ each in registration order
 *   4. insert stage  ─┘
 *   5. advance entity revisions, release the scope, notify listeners
 *
 * stage failure
 *   ├─ every involved repository compensates -> undo applied, newest first
 *   └─ rollback, then PartialCommitError
 * ```
 *
 * @version 1.0.0
 */

import { toError } from '../../domain/common';
import { type EntityIdentity, type IEntity, Entity, identityOf } from '../../domain/entity';
import {
  type CommitStage,
  type IRepository,
  repositoryToken,
  supportsCompensation,
} from '../../domain/repository';
import {
  type ChangeKind,
  type CommitResult,
  type ICommitNotifier,
  type IUnitOfWork,
  type PendingChange,
  InvalidEntityStateError,
  IdentityConflictError,
  PartialCommitError,
  UNIT_OF_WORK_KEY,
  UnitOfWorkClosedError,
  UnitOfWorkState,
} from '../../domain/uow';

import { type TrackingScopeOptions, TrackingScope } from './tracking-scope';

export interface UnitOfWorkOptions extends TrackingScopeOptions {
  readonly notifier: ICommitNotifier;
}

interface FlushStep {
  readonly stage: CommitStage;
  readonly entity: IEntity;
  readonly repository: IRepository;
}

const STAGE_OF: Record<ChangeKind, CommitStage> = {
  deleted: 'delete',
  dirty: 'update',
  new: 'insert',
};

const FLUSH_ORDER: readonly ChangeKind[] = ['deleted', 'dirty', 'new'];

/**
 * UnitOfWork - IUnitOfWork implementation.
 *
 * @remarks
 * Created by UnitOfWorkFactory. Binds itself and its DI scope to the
 * execution context and rolls back when that context is cancelled.
 */
export class UnitOfWork extends TrackingScope implements IUnitOfWork {
  private currentState = UnitOfWorkState.Active;

  /**
   * Pending changes by identity key, in registration order.
   */
  private readonly changes = new Map<string, PendingChange>();

  private readonly notifier: ICommitNotifier;

  private unsubscribeCancel: () => void = () => {};

  /**
   * Release of the scope once finished; a repeated rollback waits on it.
   */
  private ended: Promise<void> = Promise.resolve();

  constructor(options: UnitOfWorkOptions) {
    super(options);
    this.notifier = options.notifier;

    this.context.set(UNIT_OF_WORK_KEY, this);
    this.bindScope();

    this.unsubscribeCancel = this.context.onCancel(() => this.rollbackOnCancel());
  }

  get state(): UnitOfWorkState {
    return this.currentState;
  }

  isActive(): boolean {
    return this.currentState === UnitOfWorkState.Active;
  }

  // ============================================================================
  // Registration
  // ============================================================================

  registerNew(entity: IEntity): void {
    const { identity, key, current } = this.prepare(entity, 'registerNew');

    switch (current) {
      case undefined:
        this.record(key, 'new', entity);
        return;
      case 'new':
        return;
      case 'dirty':
      case 'deleted':
        throw new InvalidEntityStateError(identity, current, 'new');
    }
  }

  registerDirty(entity: IEntity): void {
    const { identity, key, current } = this.prepare(entity, 'registerDirty');

    switch (current) {
      case undefined:
        this.record(key, 'dirty', entity);
        return;
      case 'new':
      case 'dirty':
        return;
      case 'deleted':
        throw new InvalidEntityStateError(identity, current, 'dirty');
    }
  }

  registerDeleted(entity: IEntity): void {
    const { identity, key, current } = this.prepare(entity, 'registerDeleted');

    switch (current) {
      case undefined:
      case 'dirty':
        this.changes.delete(key);
        this.record(key, 'deleted', entity);
        return;
      case 'new':
        // Never persisted: nothing to flush
        this.changes.delete(key);
        this.identityMap.untrack(identity);
        return;
      case 'deleted':
        return;
    }
  }

  pendingChanges(): PendingChange[] {
    const changes = Array.from(this.changes.values());
    return FLUSH_ORDER.flatMap((kind) => changes.filter((change) => change.kind === kind));
  }

  // ============================================================================
  // Commit / Rollback
  // ============================================================================

  async commit(): Promise<CommitResult> {
    this.ensureActive('commit');
    this.currentState = UnitOfWorkState.Committing;

    let steps: FlushStep[];
    try {
      steps = await this.plan();
    } catch (error) {
      await this.finish(UnitOfWorkState.RolledBack);
      throw error;
    }

    const versioned = steps.flatMap(({ stage, entity }) =>
      stage !== 'delete' && entity instanceof Entity ? [entity] : [],
    );
    for (const entity of versioned) {
      entity.advanceRevision();
    }

    const applied: FlushStep[] = [];
    for (const step of steps) {
      try {
        await this.apply(step);
      } catch (error) {
        for (const entity of versioned) {
          entity.revertRevision();
        }
        throw await this.fail(step, applied, toError(error));
      }
      applied.push(step);
    }

    const result = this.summarize(steps);
    await this.finish(UnitOfWorkState.Committed);

    this.log.debug(
      {
        unitOfWorkId: this.id,
        deleted: result.deleted,
        updated: result.updated,
        inserted: result.inserted,
      },
      'Unit of Work committed',
    );

    await this.notifier.notify(result);
    return result;
  }

  async rollback(): Promise<void> {
    if (this.currentState === UnitOfWorkState.RolledBack) {
      return this.ended;
    }
    this.ensureActive('rollback');

    const discarded = this.changes.size;
    await this.finish(UnitOfWorkState.RolledBack);
    this.log.debug({ unitOfWorkId: this.id, discarded }, 'Unit of Work rolled back');
  }

  // ============================================================================
  // Internals
  // ============================================================================

  protected ensureActive(operation: string): void {
    if (this.currentState !== UnitOfWorkState.Active) {
      throw new UnitOfWorkClosedError(this.id, this.currentState, operation);
    }
  }

  protected isHidden(identity: EntityIdentity): boolean {
    return this.changes.get(this.keyOf(identity))?.kind === 'deleted';
  }

  private prepare(
    entity: IEntity,
    operation: string,
  ): { identity: EntityIdentity; key: string; current: ChangeKind | undefined } {
    this.ensureActive(operation);

    const identity = identityOf(entity);
    const tracked = this.identityMap.get(identity);
    if (tracked !== undefined && tracked !== entity) {
      throw new IdentityConflictError(identity);
    }

    const key = this.keyOf(identity);
    return { identity, key, current: this.changes.get(key)?.kind };
  }

  private record(key: string, kind: ChangeKind, entity: IEntity): void {
    this.identityMap.track(entity);
    this.changes.set(key, { kind, entity });
  }

  /**
   * Resolve every repository before anything is applied.
   */
  private async plan(): Promise<FlushStep[]> {
    const repositories = new Map<string, IRepository>();
    const steps: FlushStep[] = [];

    for (const { kind, entity } of this.pendingChanges()) {
      let repository = repositories.get(entity.entityType);
      if (!repository) {
        repository = await this.scope.resolveAsync(repositoryToken(entity.entityType));
        repositories.set(entity.entityType, repository);
      }
      steps.push({ stage: STAGE_OF[kind], entity, repository });
    }

    return steps;
  }

  private async apply({ stage, entity, repository }: FlushStep): Promise<void> {
    switch (stage) {
      case 'delete':
        return repository.delete(entity);
      case 'update':
        return repository.update(entity);
      case 'insert':
        return repository.add(entity);
    }
  }

  /**
   * Undo what can be undone, roll back and build the error to throw.
   */
  private async fail(step: FlushStep, applied: FlushStep[], cause: Error): Promise<PartialCommitError> {
    const compensationErrors: Error[] = [];
    let compensated = applied.length === 0;

    if (!compensated && applied.every(({ repository }) => supportsCompensation(repository))) {
      for (const change of [...applied].reverse()) {
        const { repository } = change;
        if (!supportsCompensation(repository)) {
          continue;
        }
        try {
          await repository.compensate({ stage: change.stage, entity: change.entity });
        } catch (error) {
          compensationErrors.push(toError(error));
        }
      }
      compensated = compensationErrors.length === 0;
    }

    await this.finish(UnitOfWorkState.RolledBack);

    const error = new PartialCommitError({
      stage: step.stage,
      entityType: step.entity.entityType,
      entityId: step.entity.id,
      appliedCount: applied.length,
      compensated,
      compensationErrors,
      cause,
    });

    this.log.error(
      {
        err: cause,
        unitOfWorkId: this.id,
        stage: step.stage,
        entityType: step.entity.entityType,
        appliedCount: applied.length,
        compensated,
      },
      'Unit of Work commit failed',
    );

    return error;
  }

  private summarize(steps: FlushStep[]): CommitResult {
    const count = (stage: CommitStage): number => steps.filter((step) => step.stage === stage).length;

    return {
      unitOfWorkId: this.id,
      deleted: count('delete'),
      updated: count('update'),
      inserted: count('insert'),
      mutatedTypes: new Set(steps.map((step) => step.entity.entityType)),
    };
  }

  private finish(state: UnitOfWorkState): Promise<void> {
    this.currentState = state;
    this.changes.clear();
    this.unsubscribeCancel();

    if (this.context.get(UNIT_OF_WORK_KEY) === this) {
      this.context.delete(UNIT_OF_WORK_KEY);
    }
    this.ended = this.release();
    return this.ended;
  }

  private async rollbackOnCancel(): Promise<void> {
    if (this.currentState !== UnitOfWorkState.Active) {
      return;
    }
    this.log.info({ unitOfWorkId: this.id }, 'Execution context cancelled; rolling back');
    await this.rollback();
  }
}
