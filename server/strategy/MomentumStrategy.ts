import type { MomentumParams } from '../config/engineConfig';
import { DEFAULT_ENGINE_CONFIG } from '../config/engineConfig';
import { roundTo } from './quoting';
import type { OrderIntent, Strategy, StrategyContext } from './types';

export class MomentumStrategy implements Strategy {
  readonly kind = 'momentum' as const;
  private readonly params: MomentumParams;

  constructor(readonly name: string = 'momentum', params: Partial<MomentumParams> = {}) {
    this.params = { ...DEFAULT_ENGINE_CONFIG.strategies.momentum, ...params };
  }

  decide(ctx: StrategyContext): OrderIntent | null {
    const p = this.params;
    if (ctx.step % p.tradeFreq !== 0) return null;
    if (Math.abs(ctx.inventory) >= p.maxInventory) return null;

    const momentum = ctx.metrics.momentum;
    if (Math.abs(momentum) < p.minMomentum) return null;

    // join the touch on the side the market is moving toward
    if (momentum > 0) {
      return { side: 'BUY', price: roundTo(ctx.bid, 2), qty: p.qty };
    }
    return { side: 'SELL', price: roundTo(ctx.ask, 2), qty: p.qty };
  }
}
