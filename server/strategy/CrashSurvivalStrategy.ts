import type { CrashSurvivalParams } from '../config/engineConfig';
import { DEFAULT_ENGINE_CONFIG } from '../config/engineConfig';
import { normalizeQuantity, roundTo } from './quoting';
import type { OrderIntent, Strategy, StrategyContext } from './types';

const THROUGH_TOUCH = 0.10;

/** Never opens risk. Flattens through the touch while inventory is above threshold. */
export class CrashSurvivalStrategy implements Strategy {
  readonly kind = 'crash_survival' as const;
  private readonly params: CrashSurvivalParams;

  constructor(readonly name: string = 'crash_survival', params: Partial<CrashSurvivalParams> = {}) {
    this.params = { ...DEFAULT_ENGINE_CONFIG.strategies.crashSurvival, ...params };
  }

  decide(ctx: StrategyContext): OrderIntent | null {
    const { bid, ask, inventory } = ctx;
    if (Math.abs(inventory) <= this.params.flattenThreshold) return null;

    const qty = normalizeQuantity(Math.min(this.params.qty, Math.abs(inventory)));
    if (inventory > 0) {
      return { side: 'SELL', price: roundTo(bid - THROUGH_TOUCH, 2), qty };
    }
    return { side: 'BUY', price: roundTo(ask + THROUGH_TOUCH, 2), qty };
  }
}
