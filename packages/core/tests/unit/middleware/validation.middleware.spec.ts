/**
 * @fileoverview validationMiddleware Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { z } from 'zod';

import { type Message, ValidationError, defineCommand } from '../../../src/domain/dispatch';
import { UseCaseDispatcher } from '../../../src/application/dispatch';
import { validationMiddleware } from '../../../src/application/middleware';
import { type OrderHarness, Order, createOrderHarness } from '../../fixtures/orders';

const PlaceOrder = defineCommand<{ id: string; total: number }, string>('PlaceOrder');

const PlaceOrderSchema = z.object({
  id: z.string().trim().min(1),
  total: z.number().positive(),
});

describe('validationMiddleware', () => {
  let harness: OrderHarness;
  let dispatcher: UseCaseDispatcher;

  beforeEach(() => {
    harness = createOrderHarness();
    dispatcher = new UseCaseDispatcher({ unitOfWorkFactory: harness.factory }).use(validationMiddleware());
  });

  it('should reject an invalid payload before the handler runs', async () => {
    const handler = vi.fn(async () => 'never');
    dispatcher.registerHandler(PlaceOrder, handler, { schema: PlaceOrderSchema });

    const pending = dispatcher.dispatch(PlaceOrder.create({ id: '  ', total: -1 }));

    await expect(pending).rejects.toBeInstanceOf(ValidationError);
    await expect(pending).rejects.toMatchObject({
      code: 'VALIDATION_FAILED',
      messageType: 'PlaceOrder',
      issues: [
        expect.objectContaining({ path: ['id'], code: 'too_small' }),
        expect.objectContaining({ path: ['total'], code: 'too_small' }),
      ],
    });
    await expect(pending).rejects.toThrow(/^Invalid payload for 'PlaceOrder': id: .+; total: .+$/);
    expect(handler).not.toHaveBeenCalled();
  });

  it('should hand the handler the parsed payload', async () => {
    dispatcher.registerHandler(
      PlaceOrder,
      async ({ payload }, { unitOfWork }) => {
        unitOfWork.registerNew(new Order(payload.id, payload.total));
        return payload.id;
      },
      { schema: PlaceOrderSchema },
    );

    await expect(dispatcher.dispatch(PlaceOrder.create({ id: '  o-1 ', total: 12 }))).resolves.toBe('o-1');
    expect(harness.orders.all().map((order) => order.id)).toEqual(['o-1']);
  });

  it('should pass messages without a schema through untouched', async () => {
    let received: Message | undefined;
    dispatcher.registerHandler(PlaceOrder, async (message) => {
      received = message;
      return message.payload.id;
    });
    const message = PlaceOrder.create({ id: '', total: -1 });

    await expect(dispatcher.dispatch(message)).resolves.toBe('');
    expect(received).toBe(message);
  });

  it('should leave the rejected command without changes', async () => {
    dispatcher.registerHandler(PlaceOrder, async ({ payload }) => payload.id, { schema: PlaceOrderSchema });

    await expect(dispatcher.dispatch(PlaceOrder.create({ id: 'o-1', total: 0 }))).rejects.toThrow(ValidationError);
    expect(harness.orders.count).toBe(0);
  });
});
