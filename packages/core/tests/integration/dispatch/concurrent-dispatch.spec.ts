/**
 * @fileoverview Concurrent Dispatch Integration Tests
 *
 * Several dispatches in flight at once through a fully wired application:
 * each gets its own execution context, Unit of Work and scoped services.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { TRACE_ID_KEY } from '../../../src/domain/context';
import { defineCommand, defineQuery } from '../../../src/domain/dispatch';
import { PartialCommitError } from '../../../src/domain/uow';
import { type Application, createApplication } from '../../../src/application/bootstrap';
import { loadConfig } from '../../../src/infrastructure/config';
import { ExecutionContext } from '../../../src/infrastructure/context';
import { InMemoryRepository } from '../../../src/infrastructure/persistence';
import { AuditTrail, ORDER_REPOSITORY, Order } from '../../fixtures/orders';

const PlaceOrder = defineCommand<{ id: string; total: number; fail?: boolean }, string>('PlaceOrder');
const PlaceOrders = defineCommand<{ ids: string[] }>('PlaceOrders');
const GetOrderTotal = defineQuery<{ id: string }, number | undefined>('GetOrderTotal');
const Checkout = defineCommand<{ id: string }, string[]>('Checkout');

function storedIds(orders: InMemoryRepository<Order>): string[] {
  return orders
    .all()
    .map((order) => order.id)
    .sort();
}

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('Concurrent dispatch', () => {
  let orders: InMemoryRepository<Order>;
  let app: Application;
  let seen: Map<string, { unitOfWorkId: string; audit: AuditTrail; traceId: string }>;
  let traces: string[];

  beforeEach(() => {
    orders = new InMemoryRepository<Order>('Order');
    seen = new Map();
    traces = [];
    AuditTrail.disposed = 0;

    app = createApplication(
      {
        services(registry) {
          registry.addSingletonInstance(ORDER_REPOSITORY, orders).addScoped(AuditTrail);
        },
        handlers(dispatcher) {
          dispatcher
            .registerHandler(PlaceOrder, async ({ payload }, { unitOfWork, services, traceId }) => {
              const audit = services.resolve(AuditTrail);
              audit.entries.push(payload.id);
              await nextTurn();
              unitOfWork.registerNew(new Order(payload.id, payload.total));
              await nextTurn();
              seen.set(payload.id, { unitOfWorkId: unitOfWork.id, audit: services.resolve(AuditTrail), traceId });
              if (payload.fail) {
                throw new Error(`${payload.id} failed`);
              }
              return payload.id;
            })
            .registerHandler(PlaceOrders, async ({ payload }, { unitOfWork }) => {
              for (const id of payload.ids) {
                unitOfWork.registerNew(new Order(id, 1));
              }
            })
            .registerHandler(GetOrderTotal, async ({ payload }, { reads, traceId }) => {
              traces.push(`GetOrderTotal:${traceId}`);
              return (await reads.load<Order>('Order', payload.id))?.total;
            })
            .registerHandler(Checkout, async ({ payload }, { traceId }) => {
              traces.push(`Checkout:${traceId}`);
              const total = await app.dispatcher.dispatch(GetOrderTotal.create({ id: payload.id }));
              return [String(total), String(ExecutionContext.current()?.get(TRACE_ID_KEY))];
            });
        },
      },
      loadConfig({}, { logLevel: 'silent' }),
    );
  });

  afterEach(async () => {
    await app.dispose();
  });

  it('should isolate interleaved commands', async () => {
    const ids = ['o-1', 'o-2', 'o-3', 'o-4', 'o-5'];

    const results = await Promise.all(
      ids.map((id, index) => app.dispatcher.dispatch(PlaceOrder.create({ id, total: (index + 1) * 10 }))),
    );

    expect(results).toEqual(ids);
    expect(storedIds(orders)).toEqual(ids);
    expect(orders.all().reduce((sum, order) => sum + order.total, 0)).toBe(150);

    const entries = ids.map((id) => seen.get(id));
    expect(new Set(entries.map((entry) => entry?.unitOfWorkId)).size).toBe(5);
    expect(new Set(entries.map((entry) => entry?.audit)).size).toBe(5);
    expect(new Set(entries.map((entry) => entry?.traceId)).size).toBe(5);
    expect(entries.map((entry) => entry?.audit.entries)).toEqual(ids.map((id) => [id]));
    expect(AuditTrail.disposed).toBe(5);
  });

  it('should roll back only the failing command', async () => {
    const outcomes = await Promise.allSettled([
      app.dispatcher.dispatch(PlaceOrder.create({ id: 'o-1', total: 10 })),
      app.dispatcher.dispatch(PlaceOrder.create({ id: 'o-2', total: 20, fail: true })),
      app.dispatcher.dispatch(PlaceOrder.create({ id: 'o-3', total: 30 })),
    ]);

    expect(outcomes.map((outcome) => outcome.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
    expect(storedIds(orders)).toEqual(['o-1', 'o-3']);
    expect(AuditTrail.disposed).toBe(3);
  });

  it('should compensate a commit that fails half-way', async () => {
    orders.seed(new Order('o-2', 99));

    const pending = app.dispatcher.dispatch(PlaceOrders.create({ ids: ['o-1', 'o-2', 'o-3'] }));

    await expect(pending).rejects.toBeInstanceOf(PartialCommitError);
    await expect(pending).rejects.toMatchObject({
      stage: 'insert',
      entityId: 'o-2',
      appliedCount: 1,
      compensated: true,
    });
    expect(orders.all().map((order) => [order.id, order.total])).toEqual([['o-2', 99]]);
  });

  it('should carry the caller trace id into nested dispatches', async () => {
    orders.seed(new Order('o-1', 40));

    const result = await ExecutionContext.run({ traceId: 'request-1' }, () =>
      app.dispatcher.dispatch(Checkout.create({ id: 'o-1' })),
    );

    expect(result).toEqual(['40', 'request-1']);
    expect(traces).toEqual(['Checkout:request-1', 'GetOrderTotal:request-1']);
  });

  it('should keep separate requests on separate traces', async () => {
    orders.seed(new Order('o-1', 40));

    await Promise.all([
      ExecutionContext.run({ traceId: 'request-a' }, () => app.dispatcher.dispatch(GetOrderTotal.create({ id: 'o-1' }))),
      ExecutionContext.run({ traceId: 'request-b' }, () => app.dispatcher.dispatch(GetOrderTotal.create({ id: 'o-1' }))),
    ]);

    expect([...traces].sort()).toEqual(['GetOrderTotal:request-a', 'GetOrderTotal:request-b']);
  });
});
