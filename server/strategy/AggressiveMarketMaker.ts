import type { AggressiveMakerParams } from '../config/engineConfig';
import { DEFAULT_ENGINE_CONFIG } from '../config/engineConfig';
import { inventorySkew, quoteInsideSpread, roundTo } from './quoting';
import type { OrderIntent, Strategy, StrategyContext } from './types';

export class AggressiveMarketMaker implements Strategy {
  readonly kind = 'aggressive_mm' as const;
  private readonly params: AggressiveMakerParams;

  constructor(readonly name: string = 'aggressive_mm', params: Partial<AggressiveMakerParams> = {}) {
    this.params = { ...DEFAULT_ENGINE_CONFIG.strategies.aggressive, ...params };
  }

  decide(ctx: StrategyContext): OrderIntent | null {
    const p = this.params;
    const { bid, ask, inventory, step } = ctx;

    // Over the limit: unwind at the touch regardless of the trading cadence.
    if (inventory >= p.maxInventory) {
      return { side: 'SELL', price: roundTo(bid, 2), qty: p.forcedUnwindQty };
    }
    if (inventory <= -p.maxInventory) {
      return { side: 'BUY', price: roundTo(ask, 2), qty: p.forcedUnwindQty };
    }

    if (step % p.tradeFreq !== 0) return null;

    if (inventory > p.flattenBiasInventory) {
      return { side: 'SELL', price: roundTo(bid + 0.01, 2), qty: p.qty };
    }
    if (inventory < -p.flattenBiasInventory) {
      return { side: 'BUY', price: roundTo(ask - 0.01, 2), qty: p.qty };
    }

    const skew = inventorySkew(p.skewFactor, inventory);
    return quoteInsideSpread(bid, ask, step, p.tradeFreq, skew, p.qty);
  }
}
