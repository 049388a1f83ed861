import type { RiskParams } from '../config/engineConfig';
import { DEFAULT_ENGINE_CONFIG } from '../config/engineConfig';
import { normalizeQuantity, roundTo } from '../strategy/quoting';
import type { OrderIntent, Side } from '../strategy/types';

export type RiskAction =
  | 'NONE'
  | 'PASS'
  | 'EMERGENCY_UNWIND'
  | 'LIMIT_UNWIND'
  | 'BLOCKED';

export interface RiskDecision {
  action: RiskAction;
  order: OrderIntent | null;
  reason?: string;
}

const signedQty = (side: Side, qty: number): number => (side === 'BUY' ? qty : -qty);

/**
 * Last check before an order leaves the engine. Enforces the hard inventory
 * limit and the 100..500 lot grid whatever the strategy proposed.
 */
export class RiskOverlay {
  private readonly params: RiskParams;

  constructor(params: Partial<RiskParams> = {}) {
    this.params = { ...DEFAULT_ENGINE_CONFIG.risk, ...params };
  }

  getHardLimit(): number {
    return this.params.hardLimit;
  }

  adjust(candidate: OrderIntent | null, bid: number, ask: number, inventory: number): RiskDecision {
    const { hardLimit, safetyBuffer, emergencyQty, emergencyOffset } = this.params;

    if (!candidate) {
      if (inventory >= hardLimit) {
        return {
          action: 'EMERGENCY_UNWIND',
          order: { side: 'SELL', price: roundTo(bid - emergencyOffset, 2), qty: normalizeQuantity(emergencyQty) },
        };
      }
      if (inventory <= -hardLimit) {
        return {
          action: 'EMERGENCY_UNWIND',
          order: { side: 'BUY', price: roundTo(ask + emergencyOffset, 2), qty: normalizeQuantity(emergencyQty) },
        };
      }
      return { action: 'NONE', order: null };
    }

    if (!Number.isFinite(candidate.price) || candidate.price <= 0) {
      return { action: 'BLOCKED', order: null, reason: 'invalid_price' };
    }

    const resulting = inventory + signedQty(candidate.side, candidate.qty);

    if (Math.abs(resulting) >= hardLimit) {
      const excess = Math.abs(inventory) - safetyBuffer;
      if (excess <= 0 || inventory === 0) {
        return { action: 'BLOCKED', order: null, reason: 'hard_limit' };
      }
      const unwind: OrderIntent = inventory > 0
        ? { side: 'SELL', price: roundTo(bid, 2), qty: normalizeQuantity(excess) }
        : { side: 'BUY', price: roundTo(ask, 2), qty: normalizeQuantity(excess) };
      return { action: 'LIMIT_UNWIND', order: unwind, reason: 'hard_limit' };
    }

    const order: OrderIntent = { ...candidate, qty: normalizeQuantity(candidate.qty) };
    return this.verify({ action: 'PASS', order }, inventory);
  }

  // Rounding up to the lot floor can push a passed order over the limit.
  private verify(decision: RiskDecision, inventory: number): RiskDecision {
    const order = decision.order;
    if (!order) return decision;
    const resulting = inventory + signedQty(order.side, order.qty);
    if (Math.abs(resulting) >= this.params.hardLimit && Math.abs(resulting) >= Math.abs(inventory)) {
      return { action: 'BLOCKED', order: null, reason: 'hard_limit' };
    }
    return decision;
  }
}
