/**
 * @fileoverview createApplication - Composition Root
 *
 * @packageDocumentation
 * @module @weavearc/core/application/bootstrap
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * ```
 * config ─> logger ─> registry ─> container ─> cache ─> commit notifier
 *                                                 └──> unit-of-work factory ─> dispatcher
 * ```
 *
 * Middleware order: logging, validation, custom middleware, caching.
 *
 * @version 1.0.0
 */

import { type IQueryCache, QUERY_CACHE_TOKEN } from '../../domain/cache';
import { CONTEXT_PROVIDER_TOKEN } from '../../domain/context';
import { type IContainer, CONTAINER_TOKEN } from '../../domain/di';
import { type IUseCaseDispatcher, type Middleware, DISPATCHER_TOKEN } from '../../domain/dispatch';
import { type IPayloadSerializer, PAYLOAD_SERIALIZER_TOKEN } from '../../domain/serialization';
import {
  type IUnitOfWorkFactory,
  COMMIT_NOTIFIER_TOKEN,
  UNIT_OF_WORK_FACTORY_TOKEN,
} from '../../domain/uow';
import { QueryCache, invalidateOnCommit } from '../../infrastructure/cache';
import { type WeavearcConfig, CONFIG_TOKEN, loadConfig } from '../../infrastructure/config';
import { ExecutionContextProvider } from '../../infrastructure/context';
import { CapabilityRegistry } from '../../infrastructure/di';
import { type Logger, createLogger } from '../../infrastructure/logging';
import { type SerializableClass, SuperJsonSerializer } from '../../infrastructure/serialization';
import { CommitNotifier, UnitOfWorkFactory } from '../../infrastructure/uow';
import { UseCaseDispatcher } from '../dispatch';
import { cachingMiddleware, loggingMiddleware, validationMiddleware } from '../middleware';

export interface ApplicationSetup {
  /**
   * Register repositories, services and handler classes. Runs after the
   * framework defaults, so a registration here replaces a default (for
   * example PAYLOAD_SERIALIZER_TOKEN).
   */
  services?(registry: CapabilityRegistry, config: WeavearcConfig): void;

  /** Register message handlers */
  handlers?(dispatcher: IUseCaseDispatcher): void;

  /** Placed between validation and caching */
  middleware?: Middleware[];

  /**
   * Classes the default serializer restores with their prototype, such
   * as entities returned from cached queries.
   */
  serializableClasses?: SerializableClass[];

  /** Defaults to a logger built from the configuration */
  logger?: Logger;
}

export interface Application {
  readonly config: WeavearcConfig;
  readonly logger: Logger;
  readonly container: IContainer;
  readonly unitOfWorkFactory: IUnitOfWorkFactory;
  readonly dispatcher: IUseCaseDispatcher;
  readonly serializer: IPayloadSerializer;
  /** Undefined when `cache.enabled` is false */
  readonly cache: IQueryCache<string> | undefined;

  /**
   * Detach the cache from commits and dispose the container.
   */
  dispose(): Promise<void>;
}

/**
 * Wire the framework together.
 *
 * @example
 * ```typescript
 * const app = createApplication({
 *   services(registry) {
 *     registry.addSingletonInstance(repositoryToken<Order>('Order'), new InMemoryRepository<Order>('Order'));
 *   },
 *   handlers(dispatcher) {
 *     dispatcher.registerHandler(PlaceOrder, placeOrder, { schema: PlaceOrderSchema });
 *   },
 * });
 *
 * await app.dispatcher.dispatch(PlaceOrder.create({ sku: 'A-1', quantity: 2 }));
 * ```
 */
export function createApplication(
  setup: ApplicationSetup = {},
  config: WeavearcConfig = loadConfig(),
): Application {
  const logger =
    setup.logger ?? createLogger({ level: config.logLevel, serviceName: config.serviceName });

  const registry = new CapabilityRegistry()
    .addSingletonInstance(CONFIG_TOKEN, config)
    .addSingletonInstance(CONTEXT_PROVIDER_TOKEN, new ExecutionContextProvider())
    .addSingletonFactory(PAYLOAD_SERIALIZER_TOKEN, () => {
      const serializer = new SuperJsonSerializer();
      for (const type of setup.serializableClasses ?? []) {
        serializer.registerClass(type);
      }
      return serializer;
    })
    .addSingletonFactory(COMMIT_NOTIFIER_TOKEN, () => new CommitNotifier(logger))
    .addSingletonFactory(
      UNIT_OF_WORK_FACTORY_TOKEN,
      (r) =>
        new UnitOfWorkFactory({
          container: r.resolve(CONTAINER_TOKEN),
          notifier: r.resolve(COMMIT_NOTIFIER_TOKEN),
          logger,
        }),
    )
    .addSingletonFactory(
      DISPATCHER_TOKEN,
      (r) => new UseCaseDispatcher({ unitOfWorkFactory: r.resolve(UNIT_OF_WORK_FACTORY_TOKEN), logger }),
    );

  if (config.cache.enabled) {
    registry.addSingletonInstance(
      QUERY_CACHE_TOKEN,
      new QueryCache<string>({
        ttlMs: config.cache.ttlMs,
        maxEntries: config.cache.maxEntries,
        logger,
      }),
    );
  }

  setup.services?.(registry, config);

  const container = registry.build({ ...config.container, logger });

  const serializer = container.resolve(PAYLOAD_SERIALIZER_TOKEN);
  const notifier = container.resolve(COMMIT_NOTIFIER_TOKEN);
  const unitOfWorkFactory = container.resolve(UNIT_OF_WORK_FACTORY_TOKEN);
  const dispatcher = container.resolve(DISPATCHER_TOKEN);
  const cache = container.tryResolve(QUERY_CACHE_TOKEN);

  dispatcher.use(loggingMiddleware(logger)).use(validationMiddleware());
  for (const middleware of setup.middleware ?? []) {
    dispatcher.use(middleware);
  }

  const detachCache = cache ? invalidateOnCommit(notifier, cache) : undefined;
  if (cache) {
    dispatcher.use(cachingMiddleware(cache, serializer, { logger }));
  }

  setup.handlers?.(dispatcher);

  logger.info(
    { service: config.serviceName, cache: config.cache.enabled },
    'Application created',
  );

  return {
    config,
    logger,
    container,
    unitOfWorkFactory,
    dispatcher,
    serializer,
    cache,
    async dispose() {
      detachCache?.();
      await container.dispose();
    },
  };
}
