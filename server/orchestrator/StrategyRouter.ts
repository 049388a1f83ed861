import type { EngineConfig } from '../config/engineConfig';
import { DEFAULT_ENGINE_CONFIG } from '../config/engineConfig';
import { MarketMetricsEngine } from '../metrics/MarketMetricsEngine';
import type { MarketSignals } from '../metrics/MarketMetricsEngine';
import type { MarketSnapshot } from '../metrics/types';
import { RegimeClassifier } from '../regime/RegimeClassifier';
import type { Regime, RegimeState, RegimeTransition } from '../regime/types';
import { RiskOverlay } from '../risk/RiskOverlay';
import type { RiskDecision } from '../risk/RiskOverlay';
import { AggressiveMarketMaker } from '../strategy/AggressiveMarketMaker';
import { CrashSurvivalStrategy } from '../strategy/CrashSurvivalStrategy';
import { MeanReversionStrategy } from '../strategy/MeanReversionStrategy';
import { MomentumStrategy } from '../strategy/MomentumStrategy';
import { PassiveMarketMaker } from '../strategy/PassiveMarketMaker';
import type { OrderIntent, Strategy } from '../strategy/types';
import { log } from '../utils/logger';

export interface RegimeBinding {
  primary: Strategy | null;
  // takes over from `primary` when |z| exceeds the strong-signal threshold
  strongSignal?: Strategy;
}

export type RegimeBindings = Record<Regime, RegimeBinding>;

export type RouterQuote = Pick<MarketSnapshot, 'step' | 'bid' | 'ask' | 'mid' | 'bidDepth' | 'askDepth'>;

export interface RouterDecision {
  regime: Regime;
  transition: RegimeTransition | null;
  strategy: string | null;
  candidate: OrderIntent | null;
  risk: RiskDecision;
  order: OrderIntent | null;
  signals: MarketSignals;
}

export type RouterConfig = Pick<EngineConfig, 'metrics' | 'regime' | 'strategies' | 'risk'>;

export function createDefaultBindings(cfg: RouterConfig['strategies']): RegimeBindings {
  const passiveNormal = new PassiveMarketMaker('passive_mm_normal', cfg.passiveNormal);
  const normalFallback = cfg.normalStyle === 'momentum'
    ? new MomentumStrategy('momentum', cfg.momentum)
    : new AggressiveMarketMaker('aggressive_mm', cfg.aggressive);

  return {
    CALIBRATING: { primary: null },
    CRASH: { primary: new CrashSurvivalStrategy('crash_survival', cfg.crashSurvival) },
    RECOVERY: { primary: passiveNormal },
    STRESSED: { primary: passiveNormal },
    HFT: { primary: new PassiveMarketMaker('passive_mm_hft', cfg.passiveHft) },
    NORMAL: {
      primary: normalFallback,
      strongSignal: new MeanReversionStrategy('mean_reversion', cfg.meanReversion),
    },
  };
}

/**
 * Per-step decision pipeline: metrics, regime, strategy, risk. Holds the
 * metrics window and classifier state for one engine instance.
 */
export class StrategyRouter {
  private readonly metrics: MarketMetricsEngine;
  private readonly classifier: RegimeClassifier;
  private readonly risk: RiskOverlay;
  private readonly bindings: RegimeBindings;
  private readonly strongSignalZ: number;

  constructor(config: RouterConfig = DEFAULT_ENGINE_CONFIG, bindings?: RegimeBindings) {
    this.metrics = new MarketMetricsEngine(config.metrics);
    this.classifier = new RegimeClassifier(config.regime);
    this.risk = new RiskOverlay(config.risk);
    this.bindings = bindings ?? createDefaultBindings(config.strategies);
    this.strongSignalZ = config.strategies.strongSignalZ;
  }

  /** Returns null, without touching any state, when the quote is unusable. */
  decide(quote: RouterQuote, inventory: number): RouterDecision | null {
    const { bid, ask, mid, step } = quote;
    if (!(bid > 0) || !(ask > 0) || !(mid > 0)) return null;

    const signals = this.metrics.update(mid, ask - bid, quote.bidDepth, quote.askDepth);
    const regime = this.classifier.classify(signals);
    const transition = this.classifier.lastTransition();
    if (transition) {
      log('REGIME_CHANGE', { step, from: transition.from, to: transition.to, spreadRatio: signals.spreadRatio });
    }

    const strategy = this.select(regime, signals);
    const candidate = strategy ? strategy.decide({ bid, ask, mid, inventory, step, metrics: signals }) : null;
    const risk = this.risk.adjust(candidate, bid, ask, inventory);
    if (risk.action !== 'PASS' && risk.action !== 'NONE') {
      log('RISK_OVERRIDE', { step, action: risk.action, reason: risk.reason ?? null, inventory, candidate });
    }

    return {
      regime,
      transition,
      strategy: strategy ? strategy.name : null,
      candidate,
      risk,
      order: risk.order,
      signals,
    };
  }

  getRegimeState(): RegimeState {
    return this.classifier.getState();
  }

  getSignals(): MarketSignals {
    return this.metrics.snapshot();
  }

  private select(regime: Regime, signals: MarketSignals): Strategy | null {
    const binding = this.bindings[regime];
    if (binding.strongSignal && Math.abs(signals.zScore) > this.strongSignalZ) {
      return binding.strongSignal;
    }
    return binding.primary;
  }
}
