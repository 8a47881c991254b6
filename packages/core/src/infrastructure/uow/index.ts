/**
 * @fileoverview Infrastructure Unit of Work Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/uow
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 */

export { IdentityMap } from './identity-map';

export { ReadScope } from './read-scope';

export { UnitOfWork, type UnitOfWorkOptions } from './unit-of-work';

export { CommitNotifier } from './commit-notifier';

export { UnitOfWorkFactory, type UnitOfWorkFactoryOptions } from './unit-of-work-factory';
