import type { MarketSignals } from '../metrics/MarketMetricsEngine';

export type Side = 'BUY' | 'SELL';

export interface OrderIntent {
  side: Side;
  price: number;
  qty: number;
}

export interface StrategyContext {
  bid: number;
  ask: number;
  mid: number;
  inventory: number;
  step: number;
  metrics: MarketSignals;
}

export type StrategyKind =
  | 'passive_mm'
  | 'aggressive_mm'
  | 'mean_reversion'
  | 'crash_survival'
  | 'momentum';

export interface Strategy {
  readonly kind: StrategyKind;
  readonly name: string;
  decide(ctx: StrategyContext): OrderIntent | null;
}
