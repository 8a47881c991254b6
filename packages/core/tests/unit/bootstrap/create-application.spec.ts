/**
 * @fileoverview createApplication Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, afterEach } from 'vitest';
import { z } from 'zod';

import { QUERY_CACHE_TOKEN } from '../../../src/domain/cache';
import { CONTEXT_PROVIDER_TOKEN } from '../../../src/domain/context';
import { CONTAINER_TOKEN, ContainerDisposedError } from '../../../src/domain/di';
import { DISPATCHER_TOKEN, ValidationError, defineCommand, defineQuery } from '../../../src/domain/dispatch';
import { type IPayloadSerializer, PAYLOAD_SERIALIZER_TOKEN } from '../../../src/domain/serialization';
import { UNIT_OF_WORK_FACTORY_TOKEN } from '../../../src/domain/uow';
import { type Application, createApplication } from '../../../src/application/bootstrap';
import { type ConfigOverrides, CONFIG_TOKEN, loadConfig } from '../../../src/infrastructure/config';
import { InMemoryRepository } from '../../../src/infrastructure/persistence';
import { SuperJsonSerializer } from '../../../src/infrastructure/serialization';
import { captureLogs } from '../../fixtures/logs';
import { ORDER_REPOSITORY, Order } from '../../fixtures/orders';

const PlaceOrder = defineCommand<{ id: string; total: number }, string>('PlaceOrder');
const GetOrderTotal = defineQuery<{ id: string }, number | undefined>('GetOrderTotal');

function build(
  orders: InMemoryRepository<Order>,
  trail: string[],
  overrides: ConfigOverrides = {},
): Application {
  return createApplication(
    {
      services(registry) {
        registry.addSingletonInstance(ORDER_REPOSITORY, orders);
      },
      handlers(dispatcher) {
        dispatcher
          .registerHandler(
            PlaceOrder,
            async ({ payload }, { unitOfWork }) => {
              unitOfWork.registerNew(new Order(payload.id, payload.total));
              return payload.id;
            },
            { schema: z.object({ id: z.string().min(1), total: z.number().positive() }) },
          )
          .registerHandler(
            GetOrderTotal,
            async ({ payload }, { reads }) => {
              trail.push(`GetOrderTotal:${payload.id}`);
              return (await reads.load<Order>('Order', payload.id))?.total;
            },
            { cache: true },
          );
      },
    },
    loadConfig({}, { logLevel: 'silent', ...overrides }),
  );
}

describe('createApplication', () => {
  let app: Application | undefined;

  afterEach(async () => {
    await app?.dispose();
    app = undefined;
  });

  it('should register the framework capabilities', () => {
    app = build(new InMemoryRepository<Order>('Order'), []);
    const { container } = app;

    expect(container.resolve(CONFIG_TOKEN)).toBe(app.config);
    expect(container.resolve(DISPATCHER_TOKEN)).toBe(app.dispatcher);
    expect(container.resolve(UNIT_OF_WORK_FACTORY_TOKEN)).toBe(app.unitOfWorkFactory);
    expect(container.resolve(PAYLOAD_SERIALIZER_TOKEN)).toBe(app.serializer);
    expect(container.resolve(QUERY_CACHE_TOKEN)).toBe(app.cache);
    expect(container.resolve(CONTAINER_TOKEN)).toBe(container);
    expect(container.isRegistered(CONTEXT_PROVIDER_TOKEN)).toBe(true);
    expect(app.serializer).toBeInstanceOf(SuperJsonSerializer);
  });

  it('should dispatch commands through validation into the repository', async () => {
    const orders = new InMemoryRepository<Order>('Order');
    app = build(orders, []);

    await expect(app.dispatcher.dispatch(PlaceOrder.create({ id: 'o-1', total: 30 }))).resolves.toBe('o-1');
    await expect(app.dispatcher.dispatch(PlaceOrder.create({ id: '', total: 30 }))).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(orders.all().map((order) => order.id)).toEqual(['o-1']);
  });

  it('should invalidate cached queries when a command commits', async () => {
    const trail: string[] = [];
    app = build(new InMemoryRepository<Order>('Order'), trail);
    const { dispatcher } = app;

    await expect(dispatcher.dispatch(GetOrderTotal.create({ id: 'o-1' }))).resolves.toBeUndefined();
    await expect(dispatcher.dispatch(GetOrderTotal.create({ id: 'o-1' }))).resolves.toBeUndefined();
    await dispatcher.dispatch(PlaceOrder.create({ id: 'o-1', total: 30 }));
    await expect(dispatcher.dispatch(GetOrderTotal.create({ id: 'o-1' }))).resolves.toBe(30);

    expect(trail).toEqual(['GetOrderTotal:o-1', 'GetOrderTotal:o-1']);
  });

  it('should run without a cache when caching is disabled', async () => {
    const trail: string[] = [];
    app = build(new InMemoryRepository<Order>('Order'), trail, { cache: { enabled: false } });

    expect(app.cache).toBeUndefined();
    expect(app.container.isRegistered(QUERY_CACHE_TOKEN)).toBe(false);

    await app.dispatcher.dispatch(GetOrderTotal.create({ id: 'o-1' }));
    await app.dispatcher.dispatch(GetOrderTotal.create({ id: 'o-1' }));

    expect(trail).toEqual(['GetOrderTotal:o-1', 'GetOrderTotal:o-1']);
  });

  it('should let services replace a framework default', () => {
    const custom: IPayloadSerializer = new SuperJsonSerializer();
    app = createApplication(
      {
        services(registry) {
          registry.addSingletonInstance(PAYLOAD_SERIALIZER_TOKEN, custom);
        },
      },
      loadConfig({}, { logLevel: 'silent' }),
    );

    expect(app.serializer).toBe(custom);
  });

  it('should register serializable classes with the default serializer', () => {
    app = createApplication({ serializableClasses: [Order] }, loadConfig({}, { logLevel: 'silent' }));

    const restored = app.serializer.deserialize(app.serializer.serialize(new Order('o-1', 30)));

    expect(restored).toBeInstanceOf(Order);
    expect(
      restored instanceof Order ? [restored.id, restored.total, restored.version] : undefined,
    ).toEqual(['o-1', 30, 0]);
  });

  it('should place custom middleware between validation and caching', async () => {
    const seen: string[] = [];
    app = createApplication(
      {
        middleware: [
          async (message, _context, next) => {
            seen.push(message.type);
            return next(message);
          },
        ],
        handlers(dispatcher) {
          dispatcher.registerHandler(PlaceOrder, async ({ payload }) => payload.id, {
            schema: z.object({ id: z.string().min(1), total: z.number() }),
          });
        },
      },
      loadConfig({}, { logLevel: 'silent' }),
    );

    await app.dispatcher.dispatch(PlaceOrder.create({ id: 'o-1', total: 1 }));
    await expect(app.dispatcher.dispatch(PlaceOrder.create({ id: '', total: 1 }))).rejects.toThrow(ValidationError);

    expect(seen).toEqual(['PlaceOrder']);
  });

  it('should log through the given logger', () => {
    const { logger, lines } = captureLogs('info');
    app = createApplication({ logger }, loadConfig({}, { serviceName: 'orders' }));

    expect(app.logger).toBe(logger);
    expect(lines).toEqual([{ level: 'info', service: 'orders', cache: true, msg: 'Application created' }]);
  });

  it('should dispose the container', async () => {
    const created = build(new InMemoryRepository<Order>('Order'), []);

    await created.dispose();

    expect(() => created.container.resolve(CONFIG_TOKEN)).toThrow(ContainerDisposedError);
  });
});
