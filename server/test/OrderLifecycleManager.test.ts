import { describe, expect, it } from 'vitest';
import { OrderLifecycleManager } from '../execution/OrderLifecycleManager';
import type { OrderLifecycleParams } from '../config/engineConfig';
import { PositionManager } from '../position/PositionManager';
import { FakeGateway } from './helpers/fixtures';

function setup(params: Partial<OrderLifecycleParams> = {}) {
  const gateway = new FakeGateway();
  const position = new PositionManager();
  let now = 1_000;
  const manager = new OrderLifecycleManager('test', gateway, position, params, () => now);
  const advance = (ms: number) => {
    now += ms;
  };
  return { gateway, position, manager, advance };
}

describe('OrderLifecycleManager', () => {
  it('assigns ids from the step and the orders-sent counter', () => {
    const { gateway, position, manager } = setup();
    const result = manager.submit({ side: 'BUY', price: 100, qty: 200 }, 1);
    expect(result.status).toBe('SENT');
    expect(result.order?.id).toBe('ORD_test_1_0');
    expect(gateway.sent).toEqual([{ order_id: 'ORD_test_1_0', side: 'BUY', price: 100, qty: 200 }]);
    expect(position.getOrdersSent()).toBe(1);
    expect(manager.submit({ side: 'BUY', price: 99.9, qty: 100 }, 2).order?.id).toBe('ORD_test_2_1');
  });

  it('cancels its own resting orders that the new order would cross', () => {
    const { gateway, manager } = setup();
    manager.submit({ side: 'SELL', price: 100.2, qty: 100 }, 1);
    manager.submit({ side: 'SELL', price: 100.4, qty: 100 }, 2);

    const result = manager.submit({ side: 'BUY', price: 100.2, qty: 100 }, 3);
    expect(result.crossCancelled).toEqual(['ORD_test_1_0']);
    expect(gateway.sent.slice(2)).toEqual([
      { action: 'CANCEL', order_id: 'ORD_test_1_0' },
      { order_id: 'ORD_test_3_2', side: 'BUY', price: 100.2, qty: 100 },
    ]);
    expect(manager.openOrders('SELL').map((o) => o.id)).toEqual(['ORD_test_2_1']);

    const sell = manager.submit({ side: 'SELL', price: 100.1, qty: 100 }, 4);
    expect(sell.crossCancelled).toEqual(['ORD_test_3_2']);
  });

  it('defers the order and cancels the oldest batch at the open-order cap', () => {
    const { gateway, position, manager } = setup({ maxOpenOrders: 3, cancelBatch: 2 });
    manager.submit({ side: 'BUY', price: 99, qty: 100 }, 1);
    manager.submit({ side: 'BUY', price: 99, qty: 100 }, 2);
    manager.submit({ side: 'BUY', price: 99, qty: 100 }, 3);

    const deferred = manager.submit({ side: 'BUY', price: 99, qty: 100 }, 4);
    expect(deferred.status).toBe('DEFERRED');
    expect(deferred.order).toBeNull();
    expect(deferred.capCancelled).toEqual(['ORD_test_1_0', 'ORD_test_2_1']);
    expect(manager.openCount()).toBe(1);
    expect(position.getOrdersSent()).toBe(3);
    expect(gateway.cancels()).toHaveLength(2);

    expect(manager.submit({ side: 'BUY', price: 99, qty: 100 }, 5).order?.id).toBe('ORD_test_5_3');
  });

  it('expires stale orders on the check interval, sooner in HFT', () => {
    const { manager } = setup();
    manager.submit({ side: 'BUY', price: 99, qty: 100 }, 5);
    expect(manager.expireStale(60, 'NORMAL')).toEqual([]);
    expect(manager.expireStale(65, 'NORMAL')).toEqual([]);
    expect(manager.expireStale(70, 'NORMAL')).toEqual(['ORD_test_5_0']);

    manager.submit({ side: 'SELL', price: 101, qty: 100 }, 5);
    expect(manager.expireStale(30, 'HFT')).toEqual(['ORD_test_5_1']);
    expect(manager.openCount()).toBe(0);
  });

  it('applies fills for known and unknown ids alike', () => {
    const { manager, advance } = setup();
    manager.submit({ side: 'BUY', price: 100, qty: 200 }, 1);
    advance(40);

    const known = manager.onFill({ orderId: 'ORD_test_1_0', side: 'BUY', price: 100, qty: 200 });
    expect(known.known).toBe(true);
    expect(known.record?.sentAt).toBe(1_000);
    expect(known.position.inventory).toBe(200);
    expect(manager.hasOrder('ORD_test_1_0')).toBe(false);

    const unknown = manager.onFill({ orderId: 'ORD_elsewhere', side: 'SELL', price: 101, qty: 100 });
    expect(unknown.known).toBe(false);
    expect(unknown.record).toBeNull();
    expect(unknown.position.inventory).toBe(100);
    expect(unknown.position.cashFlow).toBe(-9900);
  });

  it('still applies a fill that races its cancel', () => {
    const { manager } = setup();
    manager.submit({ side: 'SELL', price: 101, qty: 300 }, 1);
    manager.expireStale(70, 'NORMAL');
    const result = manager.onFill({ orderId: 'ORD_test_1_0', side: 'SELL', price: 101, qty: 300 });
    expect(result.known).toBe(false);
    expect(result.position.inventory).toBe(-300);
  });

  it('reports a send failure without recording the order', () => {
    const { gateway, position, manager } = setup();
    gateway.accept = false;
    const result = manager.submit({ side: 'BUY', price: 100, qty: 100 }, 1);
    expect(result.status).toBe('SEND_FAILED');
    expect(manager.openCount()).toBe(0);
    expect(position.getOrdersSent()).toBe(0);
  });
});
