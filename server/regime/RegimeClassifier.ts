import type { RegimeParams } from '../config/engineConfig';
import { DEFAULT_ENGINE_CONFIG } from '../config/engineConfig';
import type { MarketSignals } from '../metrics/MarketMetricsEngine';
import type { Regime, RegimeState, RegimeTransition } from './types';
import { createRegimeState } from './types';

export type RegimeInputs = Pick<
  MarketSignals,
  'calibrated' | 'spreadRatio' | 'depthRatio' | 'momentum' | 'imbalance' | 'churn'
>;

interface ClampedInputs {
  spreadRatio: number;
  depthRatio: number;
  absMomentum: number;
  absImbalance: number;
  churn: number;
}

const orDefault = (value: number, fallback: number): number => (Number.isNaN(value) ? fallback : value);

function clampInputs(inputs: RegimeInputs): ClampedInputs {
  return {
    spreadRatio: Math.max(0, orDefault(inputs.spreadRatio, 1)),
    depthRatio: Math.max(0, orDefault(inputs.depthRatio, 1)),
    absMomentum: Math.abs(orDefault(inputs.momentum, 0)),
    absImbalance: Math.min(1, Math.abs(orDefault(inputs.imbalance, 0))),
    churn: Math.min(1, Math.max(0, orDefault(inputs.churn, 0))),
  };
}

function isCrash(x: ClampedInputs, params: RegimeParams): boolean {
  const crash = params.crash;
  if (x.spreadRatio > crash.spreadRatio || x.absMomentum > crash.momentum || x.absImbalance > crash.imbalance) {
    return true;
  }
  const pair = crash.compound;
  if (!pair) return false;
  return (
    (x.spreadRatio > pair.spreadRatio && x.absMomentum > pair.momentumWithSpread)
    || (x.spreadRatio > pair.spreadRatio && x.absImbalance > pair.imbalanceWithSpread)
    || (x.absMomentum > pair.momentum && x.absImbalance > pair.imbalanceWithMomentum)
  );
}

/**
 * One classification step. Pure: takes the prior state and returns the next
 * one, so independent engines never share classifier state.
 *
 * Priority: CALIBRATING, CRASH, RECOVERY, STRESSED (hysteresis), HFT
 * (hysteresis), NORMAL.
 */
export function classifyRegime(prior: RegimeState, inputs: RegimeInputs, params: RegimeParams): RegimeState {
  const previousRegime = prior.currentRegime;

  if (!inputs.calibrated) {
    return { ...prior, previousRegime, currentRegime: 'CALIBRATING' };
  }

  const x = clampInputs(inputs);
  let currentRegime: Regime = previousRegime;
  let crashCooldown = prior.crashCooldown;

  if (isCrash(x, params)) {
    currentRegime = 'CRASH';
    crashCooldown = 0;
  } else if (previousRegime === 'CRASH' && x.spreadRatio < params.recovery.exitSpreadRatio) {
    currentRegime = 'RECOVERY';
    crashCooldown = params.recovery.cooldownSteps;
  } else if (previousRegime === 'RECOVERY') {
    crashCooldown -= 1;
    if (crashCooldown <= 0 && x.spreadRatio < params.recovery.normalSpreadRatio) {
      currentRegime = 'NORMAL';
    }
  } else if (previousRegime === 'STRESSED') {
    const s = params.stressed;
    const stillStressed = x.spreadRatio > s.exitSpreadRatio
      || x.absImbalance > s.exitImbalance
      || x.depthRatio < s.exitDepthRatio;
    currentRegime = stillStressed ? 'STRESSED' : 'NORMAL';
  } else if (
    x.spreadRatio > params.stressed.enterSpreadRatio
    || x.absImbalance > params.stressed.enterImbalance
    || x.depthRatio < params.stressed.enterDepthRatio
  ) {
    currentRegime = 'STRESSED';
  } else {
    const h = params.hft;
    const stable = x.spreadRatio < h.maxSpreadRatio && x.depthRatio > h.minDepthRatio && x.absMomentum < h.maxMomentum;
    const churnFloor = previousRegime === 'HFT' ? h.exitChurn : h.enterChurn;
    currentRegime = stable && x.churn >= churnFloor ? 'HFT' : 'NORMAL';
  }

  return {
    currentRegime,
    previousRegime,
    crashCooldown,
    regimeDuration: currentRegime === previousRegime ? prior.regimeDuration + 1 : 0,
  };
}

export class RegimeClassifier {
  private state: RegimeState = createRegimeState();
  private readonly params: RegimeParams;

  constructor(params: RegimeParams = DEFAULT_ENGINE_CONFIG.regime) {
    this.params = params;
  }

  classify(inputs: RegimeInputs): Regime {
    this.state = classifyRegime(this.state, inputs, this.params);
    return this.state.currentRegime;
  }

  /** The transition made by the last `classify` call, if the label changed. */
  lastTransition(): RegimeTransition | null {
    if (this.state.currentRegime === this.state.previousRegime) return null;
    return { from: this.state.previousRegime, to: this.state.currentRegime };
  }

  getState(): RegimeState {
    return { ...this.state };
  }
}
