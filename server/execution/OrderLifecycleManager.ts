import type { OrderLifecycleParams } from '../config/engineConfig';
import { DEFAULT_ENGINE_CONFIG } from '../config/engineConfig';
import type { Fill, IPositionManager, PositionSnapshot } from '../position/types';
import type { Regime } from '../regime/types';
import type { OrderIntent, Side } from '../strategy/types';
import { log } from '../utils/logger';
import type { OrderGateway, OrderRecord, SubmitResult } from './types';

export type CancelReason = 'SELF_CROSS' | 'CAPACITY' | 'STALE';

export interface FillResult {
  known: boolean;
  record: OrderRecord | null;
  position: PositionSnapshot;
}

interface RestingOrder extends OrderRecord {
  sequence: number;
}

/**
 * Owns the local view of resting orders. Cancels are fire-and-forget: the
 * record leaves the book when the cancel is sent, and a fill that races the
 * cancel is still applied to the position because the exchange is
 * authoritative.
 */
export class OrderLifecycleManager {
  private readonly buys = new Map<string, RestingOrder>();
  private readonly sells = new Map<string, RestingOrder>();
  private readonly params: OrderLifecycleParams;
  private sequence = 0;
  private cancelsSent = 0;

  constructor(
    private readonly clientName: string,
    private readonly gateway: OrderGateway,
    private readonly position: IPositionManager,
    params: Partial<OrderLifecycleParams> = {},
    private readonly clock: () => number = Date.now
  ) {
    this.params = { ...DEFAULT_ENGINE_CONFIG.orders, ...params };
  }

  submit(intent: OrderIntent, step: number): SubmitResult {
    const crossCancelled = this.cancelCrossed(intent.side, intent.price);

    if (this.openCount() >= this.params.maxOpenOrders) {
      const capCancelled = this.cancelOldest(this.params.cancelBatch);
      log('ORDER_DEFERRED', { step, reason: 'open_order_cap', open: this.openCount(), cancelled: capCancelled.length });
      return { status: 'DEFERRED', order: null, crossCancelled, capCancelled };
    }

    const id = `ORD_${this.clientName}_${step}_${this.position.getOrdersSent()}`;
    const sent = this.gateway.send({ order_id: id, side: intent.side, price: intent.price, qty: intent.qty });
    if (!sent) {
      log('ORDER_SEND_FAILED', { step, orderId: id });
      return { status: 'SEND_FAILED', order: null, crossCancelled, capCancelled: [] };
    }

    this.position.recordOrderSent();
    const record: RestingOrder = {
      id,
      side: intent.side,
      price: intent.price,
      qty: intent.qty,
      submittedStep: step,
      sentAt: this.clock(),
      sequence: this.sequence++,
    };
    this.bookFor(intent.side).set(id, record);
    return { status: 'SENT', order: toRecord(record), crossCancelled, capCancelled: [] };
  }

  /** Runs on every `staleCheckInterval`-th step; HFT uses the shorter age limit. */
  expireStale(step: number, regime: Regime): string[] {
    if (step % this.params.staleCheckInterval !== 0) return [];
    const maxAge = regime === 'HFT' ? this.params.hftMaxOrderAgeSteps : this.params.maxOrderAgeSteps;
    const stale = this.restingOrders().filter((order) => step - order.submittedStep > maxAge);
    return stale.map((order) => this.cancel(order, 'STALE'));
  }

  onFill(fill: Fill): FillResult {
    const resting = this.buys.get(fill.orderId) ?? this.sells.get(fill.orderId) ?? null;
    if (resting) {
      this.buys.delete(fill.orderId);
      this.sells.delete(fill.orderId);
    }
    const position = this.position.applyFill(fill);
    return { known: resting !== null, record: resting ? toRecord(resting) : null, position };
  }

  openCount(): number {
    return this.buys.size + this.sells.size;
  }

  openOrders(side?: Side): OrderRecord[] {
    return this.restingOrders()
      .filter((order) => !side || order.side === side)
      .map(toRecord);
  }

  hasOrder(orderId: string): boolean {
    return this.buys.has(orderId) || this.sells.has(orderId);
  }

  getCancelsSent(): number {
    return this.cancelsSent;
  }

  private cancelCrossed(side: Side, price: number): string[] {
    const opposite = side === 'BUY' ? this.sells : this.buys;
    const crossed = [...opposite.values()].filter((order) => (
      side === 'BUY' ? order.price <= price : order.price >= price
    ));
    return crossed.map((order) => this.cancel(order, 'SELF_CROSS'));
  }

  private cancelOldest(count: number): string[] {
    return this.restingOrders()
      .slice(0, Math.max(0, count))
      .map((order) => this.cancel(order, 'CAPACITY'));
  }

  private cancel(order: RestingOrder, reason: CancelReason): string {
    this.bookFor(order.side).delete(order.id);
    this.cancelsSent += 1;
    const sent = this.gateway.send({ action: 'CANCEL', order_id: order.id });
    log('CANCEL_SENT', { orderId: order.id, reason, side: order.side, price: order.price, sent });
    return order.id;
  }

  // Oldest first: by submission step, then by submission order.
  private restingOrders(): RestingOrder[] {
    return [...this.buys.values(), ...this.sells.values()].sort((a, b) => (
      a.submittedStep - b.submittedStep || a.sequence - b.sequence
    ));
  }

  private bookFor(side: Side): Map<string, RestingOrder> {
    return side === 'BUY' ? this.buys : this.sells;
  }
}

function toRecord(order: RestingOrder): OrderRecord {
  return {
    id: order.id,
    side: order.side,
    price: order.price,
    qty: order.qty,
    submittedStep: order.submittedStep,
    sentAt: order.sentAt,
  };
}
