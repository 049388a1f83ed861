import type { MeanReversionParams } from '../config/engineConfig';
import { DEFAULT_ENGINE_CONFIG } from '../config/engineConfig';
import { normalizeQuantity, roundTo, TICK } from './quoting';
import type { OrderIntent, Strategy, StrategyContext } from './types';

/**
 * Fades z-score extremes with passive near-touch orders and scales out at
 * the touch once price is back near its window mean.
 */
export class MeanReversionStrategy implements Strategy {
  readonly kind = 'mean_reversion' as const;
  private readonly params: MeanReversionParams;

  constructor(readonly name: string = 'mean_reversion', params: Partial<MeanReversionParams> = {}) {
    this.params = { ...DEFAULT_ENGINE_CONFIG.strategies.meanReversion, ...params };
  }

  decide(ctx: StrategyContext): OrderIntent | null {
    const p = this.params;
    const { bid, ask, inventory } = ctx;
    if (Math.abs(inventory) >= p.maxInventory) return null;

    const z = ctx.metrics.zScore;

    if (z < -p.entryZ) {
      return { side: 'BUY', price: roundTo(Math.min(bid, ask - TICK), 1), qty: p.qty };
    }
    if (z > p.entryZ) {
      return { side: 'SELL', price: roundTo(Math.max(ask, bid + TICK), 1), qty: p.qty };
    }

    if (Math.abs(z) < p.exitZ) {
      if (inventory > p.exitInventoryThreshold) {
        return { side: 'SELL', price: roundTo(bid, 2), qty: normalizeQuantity(Math.min(p.qty, inventory)) };
      }
      if (inventory < -p.exitInventoryThreshold) {
        return { side: 'BUY', price: roundTo(ask, 2), qty: normalizeQuantity(Math.min(p.qty, -inventory)) };
      }
    }
    return null;
  }
}
