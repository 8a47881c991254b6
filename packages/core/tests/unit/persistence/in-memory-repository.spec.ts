/**
 * @fileoverview InMemoryRepository Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import { InMemoryRepository } from '../../../src/infrastructure/persistence';
import { Order } from '../../fixtures/orders';

describe('InMemoryRepository', () => {
  it('should store copies of entities', async () => {
    const orders = new InMemoryRepository<Order>('Order');
    const order = new Order('o-1', 10);

    await orders.add(order);
    order.total = 50;

    const stored = await orders.getById('o-1');
    expect(stored).toBeInstanceOf(Order);
    expect(stored?.total).toBe(10);
    expect(stored).not.toBe(await orders.getById('o-1'));
  });

  it('should reject rows of another entity type', async () => {
    const orders = new InMemoryRepository<Order>('Invoice');

    await expect(orders.add(new Order('o-1', 10))).rejects.toMatchObject({
      code: 'WRONG_ENTITY_TYPE',
      message: 'Repository of Invoice cannot store Order',
    });
  });

  it('should refuse to update a missing row', async () => {
    const orders = new InMemoryRepository<Order>('Order');

    await expect(orders.update(new Order('o-1', 10))).rejects.toMatchObject({
      code: 'ENTITY_MISSING',
      message: "Order 'o-1' does not exist",
    });
  });

  it('should restore the prior row when an update is compensated', async () => {
    const orders = new InMemoryRepository<Order>('Order').seed(new Order('o-1', 10));
    const changed = new Order('o-1', 25);

    await orders.update(changed);
    await orders.compensate({ stage: 'update', entity: changed });

    expect((await orders.getById('o-1'))?.total).toBe(10);
    await expect(orders.compensate({ stage: 'update', entity: changed })).rejects.toMatchObject({
      code: 'NOTHING_TO_COMPENSATE',
    });
  });

  it('should keep the pre-image of each change to the same row apart', async () => {
    const orders = new InMemoryRepository<Order>('Order').seed(new Order('o-1', 10));
    const first = new Order('o-1', 11);
    const second = new Order('o-1', 12);

    await orders.update(first);
    await orders.update(second);

    await orders.compensate({ stage: 'update', entity: second });
    expect((await orders.getById('o-1'))?.total).toBe(11);

    await orders.compensate({ stage: 'update', entity: first });
    expect((await orders.getById('o-1'))?.total).toBe(10);
  });

  it('should restore a deleted row for the entity it was deleted with', async () => {
    const orders = new InMemoryRepository<Order>('Order').seed(new Order('o-1', 10));
    const removed = new Order('o-1', 10);

    await orders.delete(removed);
    await expect(
      orders.compensate({ stage: 'delete', entity: new Order('o-1', 10) }),
    ).rejects.toMatchObject({ code: 'NOTHING_TO_COMPENSATE' });
    await orders.compensate({ stage: 'delete', entity: removed });

    expect(orders.all().map((order) => [order.id, order.total])).toEqual([['o-1', 10]]);
  });

  it('should remove an inserted row when the insert is compensated', async () => {
    const orders = new InMemoryRepository<Order>('Order');
    const order = new Order('o-1', 10);

    await orders.add(order);
    await orders.compensate({ stage: 'insert', entity: order });

    expect(orders.count).toBe(0);
  });
});
