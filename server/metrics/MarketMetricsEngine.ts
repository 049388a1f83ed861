import type { MetricsParams } from '../config/engineConfig';
import { DEFAULT_ENGINE_CONFIG } from '../config/engineConfig';
import { RingStats, RingSum } from './RollingWindow';

export interface MetricsBaseline {
  spread: number;
  depth: number;
  mid: number;
}

export interface MarketSignals {
  calibrated: boolean;
  sampleCount: number;
  mid: number;
  spread: number;
  totalDepth: number;
  volatility: number;
  zScore: number;
  momentum: number;
  imbalance: number;
  churn: number;
  spreadRatio: number;
  depthRatio: number;
  baseline: MetricsBaseline | null;
}

const finiteOrZero = (value: number): number => (Number.isFinite(value) ? value : 0);

/**
 * Incremental market metrics over a fixed window of quote snapshots.
 * Every update is O(1): window sums are maintained on insert/evict and
 * derived signals are recomputed from those sums.
 */
export class MarketMetricsEngine {
  private readonly mids: RingStats;
  private readonly spreads: RingStats;
  private readonly depths: RingSum;
  private readonly params: MetricsParams;

  private samples = 0;
  private midChanges = 0;
  private lastMid: number | null = null;
  private baseline: MetricsBaseline | null = null;
  private signals: MarketSignals;

  constructor(params: Partial<MetricsParams> = {}) {
    this.params = { ...DEFAULT_ENGINE_CONFIG.metrics, ...params };
    this.mids = new RingStats(this.params.windowSize);
    this.spreads = new RingStats(this.params.windowSize);
    this.depths = new RingSum(this.params.windowSize);
    this.signals = {
      calibrated: false,
      sampleCount: 0,
      mid: 0,
      spread: 0,
      totalDepth: 0,
      volatility: 0,
      zScore: 0,
      momentum: 0,
      imbalance: 0,
      churn: 0,
      spreadRatio: 1,
      depthRatio: 1,
      baseline: null,
    };
  }

  update(mid: number, spread: number, bidDepth: number, askDepth: number): MarketSignals {
    const m = finiteOrZero(mid);
    const s = finiteOrZero(spread);
    const bidQty = Math.max(0, finiteOrZero(bidDepth));
    const askQty = Math.max(0, finiteOrZero(askDepth));
    const totalDepth = bidQty + askQty;

    this.mids.add(m);
    this.spreads.add(s);
    this.depths.add(totalDepth);
    this.samples += 1;

    if (this.lastMid !== null && Math.abs(m - this.lastMid) > this.params.midChangeEpsilon) {
      this.midChanges += 1;
    }
    this.lastMid = m;

    const n = this.mids.count();
    const volatility = this.mids.std();
    const zScore = this.mids.zScore(m, this.params.minVolatility);

    const lookback = this.params.momentumLookback;
    const momentum = n >= lookback ? (m - this.mids.back(lookback - 1)) / lookback : 0;

    const imbalance = totalDepth > 0 ? (bidQty - askQty) / totalDepth : 0;

    // Counted in blocks: the tally restarts every churnWindow samples.
    const churnWindow = this.params.churnWindow;
    let churn = 0;
    if (this.samples >= churnWindow) {
      churn = Math.min(1, this.midChanges / churnWindow);
      if (this.samples % churnWindow === 0) this.midChanges = 0;
    }

    if (this.baseline === null && this.samples >= this.params.calibrationSteps) {
      this.baseline = {
        spread: this.spreads.mean(),
        depth: this.depths.mean(),
        mid: this.mids.mean(),
      };
    }

    let spreadRatio = 1;
    let depthRatio = 1;
    if (this.baseline) {
      spreadRatio = this.baseline.spread > 0 ? s / this.baseline.spread : 1;
      depthRatio = this.baseline.depth > 0 ? totalDepth / this.baseline.depth : 1;
    }

    this.signals = {
      calibrated: this.baseline !== null,
      sampleCount: this.samples,
      mid: m,
      spread: s,
      totalDepth,
      volatility,
      zScore,
      momentum,
      imbalance,
      churn,
      spreadRatio,
      depthRatio,
      baseline: this.baseline ? { ...this.baseline } : null,
    };
    return this.snapshot();
  }

  snapshot(): MarketSignals {
    return {
      ...this.signals,
      baseline: this.signals.baseline ? { ...this.signals.baseline } : null,
    };
  }

  isCalibrated(): boolean {
    return this.baseline !== null;
  }

  sampleCount(): number {
    return this.samples;
  }

  windowLength(): number {
    return this.mids.count();
  }

  meanMid(): number {
    return this.mids.mean();
  }

  meanSpread(): number {
    return this.spreads.mean();
  }

  meanDepth(): number {
    return this.depths.mean();
  }

  windowMids(): number[] {
    return this.mids.toArray();
  }
}
