import type { PassiveMakerParams } from '../config/engineConfig';
import { DEFAULT_ENGINE_CONFIG } from '../config/engineConfig';
import { inventorySkew, quoteInsideSpread } from './quoting';
import type { OrderIntent, Strategy, StrategyContext } from './types';

/**
 * Quotes one side per trading slot at or one tick inside the touch,
 * skewed against inventory so fills tend to flatten the book.
 */
export class PassiveMarketMaker implements Strategy {
  readonly kind = 'passive_mm' as const;
  private readonly params: PassiveMakerParams;

  constructor(readonly name: string = 'passive_mm', params: Partial<PassiveMakerParams> = {}) {
    this.params = { ...DEFAULT_ENGINE_CONFIG.strategies.passiveNormal, ...params };
  }

  decide(ctx: StrategyContext): OrderIntent | null {
    const { skewFactor, maxInventory, qty, tradeFreq } = this.params;
    if (ctx.step % tradeFreq !== 0) return null;
    if (Math.abs(ctx.inventory) >= maxInventory) return null;

    const skew = inventorySkew(skewFactor, ctx.inventory);
    return quoteInsideSpread(ctx.bid, ctx.ask, ctx.step, tradeFreq, skew, qty);
  }
}
