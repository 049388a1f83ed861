export const REGIMES = ['CALIBRATING', 'NORMAL', 'STRESSED', 'CRASH', 'HFT', 'RECOVERY'] as const;

export type Regime = typeof REGIMES[number];

export interface RegimeState {
  currentRegime: Regime;
  previousRegime: Regime;
  regimeDuration: number;
  crashCooldown: number;
}

export interface RegimeTransition {
  from: Regime;
  to: Regime;
}

export function createRegimeState(): RegimeState {
  return {
    currentRegime: 'CALIBRATING',
    previousRegime: 'CALIBRATING',
    regimeDuration: 0,
    crashCooldown: 0,
  };
}

export function isRegime(value: unknown): value is Regime {
  return typeof value === 'string' && (REGIMES as readonly string[]).includes(value);
}
