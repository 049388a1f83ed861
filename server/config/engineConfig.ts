export interface MetricsParams {
  windowSize: number;
  calibrationSteps: number;
  churnWindow: number;
  momentumLookback: number;
  minVolatility: number; // below this the z-score is pinned to 0
  midChangeEpsilon: number;
}

export type RegimePreset = 'compound' | 'simple';

export interface CompoundCrashParams {
  spreadRatio: number;
  momentumWithSpread: number;
  imbalanceWithSpread: number;
  momentum: number;
  imbalanceWithMomentum: number;
}

export interface CrashParams {
  spreadRatio: number;
  momentum: number;
  imbalance: number;
  compound: CompoundCrashParams | null;
}

export interface RecoveryParams {
  exitSpreadRatio: number;
  normalSpreadRatio: number;
  cooldownSteps: number;
}

export interface StressedParams {
  enterSpreadRatio: number;
  enterImbalance: number;
  enterDepthRatio: number;
  exitSpreadRatio: number;
  exitImbalance: number;
  exitDepthRatio: number;
}

export interface HftParams {
  enterChurn: number;
  exitChurn: number;
  maxSpreadRatio: number;
  minDepthRatio: number;
  maxMomentum: number;
}

export interface RegimeParams {
  preset: RegimePreset;
  crash: CrashParams;
  recovery: RecoveryParams;
  stressed: StressedParams;
  hft: HftParams;
}

export interface PassiveMakerParams {
  skewFactor: number;
  maxInventory: number;
  qty: number;
  tradeFreq: number;
}

export interface AggressiveMakerParams {
  maxInventory: number;
  qty: number;
  tradeFreq: number;
  skewFactor: number;
  flattenBiasInventory: number;
  forcedUnwindQty: number;
}

export interface MeanReversionParams {
  entryZ: number;
  exitZ: number;
  maxInventory: number;
  qty: number;
  exitInventoryThreshold: number;
}

export interface CrashSurvivalParams {
  flattenThreshold: number;
  qty: number;
}

export interface MomentumParams {
  minMomentum: number;
  maxInventory: number;
  qty: number;
  tradeFreq: number;
}

export type NormalStyle = 'aggressive' | 'momentum';

export interface StrategyParams {
  passiveNormal: PassiveMakerParams;
  passiveHft: PassiveMakerParams;
  aggressive: AggressiveMakerParams;
  meanReversion: MeanReversionParams;
  crashSurvival: CrashSurvivalParams;
  momentum: MomentumParams;
  strongSignalZ: number;
  normalStyle: NormalStyle;
}

export interface RiskParams {
  hardLimit: number;
  safetyBuffer: number;
  emergencyQty: number;
  emergencyOffset: number;
}

export interface OrderLifecycleParams {
  maxOpenOrders: number;
  cancelBatch: number;
  staleCheckInterval: number;
  maxOrderAgeSteps: number;
  hftMaxOrderAgeSteps: number;
}

export interface TransportParams {
  host: string;
  scenario: string;
  name: string;
  password: string;
  secure: boolean;
  registrationTimeoutMs: number;
}

export interface JournalParams {
  enabled: boolean;
  dir: string;
  experiment: string;
  bookLevels: number;
}

export interface HealthParams {
  enabled: boolean;
  port: number;
}

/** `passive` observes and journals the market without sending orders. */
export type RunMode = 'active' | 'passive';

export interface EngineParams {
  mode: RunMode;
  progressLogInterval: number;
  maxQueueSize: number;
}

export interface EngineConfig {
  metrics: MetricsParams;
  regime: RegimeParams;
  strategies: StrategyParams;
  risk: RiskParams;
  orders: OrderLifecycleParams;
  transport: TransportParams;
  journal: JournalParams;
  health: HealthParams;
  engine: EngineParams;
}

export const COMPOUND_CRASH_PARAMS: CrashParams = {
  spreadRatio: 2.0,
  momentum: 0.10,
  imbalance: 0.5,
  compound: {
    spreadRatio: 1.8,
    momentumWithSpread: 0.06,
    imbalanceWithSpread: 0.4,
    momentum: 0.08,
    imbalanceWithMomentum: 0.45,
  },
};

export const SIMPLE_CRASH_PARAMS: CrashParams = {
  spreadRatio: 2.5,
  momentum: 0.15,
  imbalance: 0.6,
  compound: null,
};

export function crashParamsForPreset(preset: RegimePreset): CrashParams {
  const source = preset === 'simple' ? SIMPLE_CRASH_PARAMS : COMPOUND_CRASH_PARAMS;
  return {
    ...source,
    compound: source.compound ? { ...source.compound } : null,
  };
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  metrics: {
    windowSize: 100,
    calibrationSteps: 100,
    churnWindow: 20,
    momentumLookback: 10,
    minVolatility: 0.001,
    midChangeEpsilon: 0.001,
  },
  regime: {
    preset: 'compound',
    crash: crashParamsForPreset('compound'),
    recovery: {
      exitSpreadRatio: 1.8,
      normalSpreadRatio: 1.5,
      cooldownSteps: 100,
    },
    stressed: {
      enterSpreadRatio: 1.5,
      enterImbalance: 0.4,
      enterDepthRatio: 0.5,
      exitSpreadRatio: 1.2,
      exitImbalance: 0.3,
      exitDepthRatio: 0.6,
    },
    hft: {
      enterChurn: 0.20,
      exitChurn: 0.12,
      maxSpreadRatio: 1.6,
      minDepthRatio: 0.4,
      maxMomentum: 0.08,
    },
  },
  strategies: {
    // slower refresh, slightly larger size
    passiveNormal: { skewFactor: 0.0002, maxInventory: 3000, qty: 200, tradeFreq: 5 },
    // high churn: refresh every step, smallest size
    passiveHft: { skewFactor: 0.0001, maxInventory: 3000, qty: 100, tradeFreq: 1 },
    aggressive: {
      maxInventory: 3500,
      qty: 200,
      tradeFreq: 2,
      skewFactor: 0.008,
      flattenBiasInventory: 1000,
      forcedUnwindQty: 300,
    },
    meanReversion: { entryZ: 1.5, exitZ: 0.5, maxInventory: 2500, qty: 200, exitInventoryThreshold: 300 },
    crashSurvival: { flattenThreshold: 200, qty: 500 },
    momentum: { minMomentum: 0.02, maxInventory: 2000, qty: 200, tradeFreq: 5 },
    strongSignalZ: 1.5,
    normalStyle: 'aggressive',
  },
  risk: {
    hardLimit: 4500,
    safetyBuffer: 3000,
    emergencyQty: 500,
    emergencyOffset: 0.05,
  },
  orders: {
    maxOpenOrders: 20,
    cancelBatch: 5,
    staleCheckInterval: 10,
    maxOrderAgeSteps: 60,
    hftMaxOrderAgeSteps: 20,
  },
  transport: {
    host: 'localhost:8080',
    scenario: 'normal_market',
    name: '',
    password: '',
    secure: false,
    registrationTimeoutMs: 10_000,
  },
  journal: {
    enabled: true,
    dir: 'data/raw',
    experiment: 'regime_router',
    bookLevels: 10,
  },
  health: {
    enabled: false,
    port: 8788,
  },
  engine: {
    mode: 'active',
    progressLogInterval: 500,
    maxQueueSize: 5000,
  },
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string, fallback: string): string {
  const raw = String(env[key] ?? '').trim();
  return raw || fallback;
}

function readNumber(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = String(env[key] ?? '').trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, value));
}

function readInt(env: Env, key: string, fallback: number, min: number, max: number): number {
  return Math.trunc(readNumber(env, key, fallback, min, max));
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = String(env[key] ?? '').trim().toLowerCase();
  if (!raw) return fallback;
  return raw === '1' || raw === 'true' || raw === 'yes' || raw === 'on';
}

function readPreset(env: Env, fallback: RegimePreset): RegimePreset {
  const raw = String(env.BOT_REGIME_PRESET ?? '').trim().toLowerCase();
  if (raw === 'simple' || raw === 'compound') return raw;
  return fallback;
}

function readMode(env: Env, fallback: RunMode): RunMode {
  const raw = String(env.BOT_MODE ?? '').trim().toLowerCase();
  if (raw === 'active' || raw === 'passive') return raw;
  return fallback;
}

function readNormalStyle(env: Env, fallback: NormalStyle): NormalStyle {
  const raw = String(env.BOT_NORMAL_STYLE ?? '').trim().toLowerCase();
  if (raw === 'aggressive' || raw === 'momentum') return raw;
  return fallback;
}

/**
 * Builds the run configuration from defaults plus `BOT_*` environment
 * overrides. Out-of-range numbers are clamped, unparseable ones ignored.
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const base = DEFAULT_ENGINE_CONFIG;
  const preset = readPreset(env, base.regime.preset);
  const hardLimit = readInt(env, 'BOT_HARD_LIMIT', base.risk.hardLimit, 500, 1_000_000);
  const safetyBuffer = Math.min(
    readInt(env, 'BOT_SAFETY_BUFFER', base.risk.safetyBuffer, 0, 1_000_000),
    hardLimit - 500,
  );

  return {
    metrics: {
      ...base.metrics,
      windowSize: readInt(env, 'BOT_WINDOW_SIZE', base.metrics.windowSize, 10, 100_000),
      calibrationSteps: readInt(env, 'BOT_CALIBRATION_STEPS', base.metrics.calibrationSteps, 1, 100_000),
    },
    regime: {
      ...base.regime,
      preset,
      crash: crashParamsForPreset(preset),
      recovery: {
        ...base.regime.recovery,
        cooldownSteps: readInt(env, 'BOT_RECOVERY_COOLDOWN', base.regime.recovery.cooldownSteps, 0, 100_000),
      },
      stressed: { ...base.regime.stressed },
      hft: { ...base.regime.hft },
    },
    strategies: {
      ...base.strategies,
      passiveNormal: { ...base.strategies.passiveNormal },
      passiveHft: { ...base.strategies.passiveHft },
      aggressive: { ...base.strategies.aggressive },
      meanReversion: { ...base.strategies.meanReversion },
      crashSurvival: {
        ...base.strategies.crashSurvival,
        flattenThreshold: readInt(env, 'BOT_FLATTEN_THRESHOLD', base.strategies.crashSurvival.flattenThreshold, 0, 1_000_000),
      },
      momentum: { ...base.strategies.momentum },
      normalStyle: readNormalStyle(env, base.strategies.normalStyle),
    },
    risk: {
      ...base.risk,
      hardLimit,
      safetyBuffer: Math.max(0, safetyBuffer),
    },
    orders: {
      ...base.orders,
      maxOpenOrders: readInt(env, 'BOT_MAX_OPEN_ORDERS', base.orders.maxOpenOrders, 1, 10_000),
      cancelBatch: readInt(env, 'BOT_CANCEL_BATCH', base.orders.cancelBatch, 1, 10_000),
      maxOrderAgeSteps: readInt(env, 'BOT_MAX_ORDER_AGE', base.orders.maxOrderAgeSteps, 1, 100_000),
      hftMaxOrderAgeSteps: readInt(env, 'BOT_HFT_MAX_ORDER_AGE', base.orders.hftMaxOrderAgeSteps, 1, 100_000),
    },
    transport: {
      ...base.transport,
      host: readString(env, 'BOT_HOST', base.transport.host),
      scenario: readString(env, 'BOT_SCENARIO', base.transport.scenario),
      name: readString(env, 'BOT_NAME', base.transport.name),
      password: readString(env, 'BOT_PASSWORD', base.transport.password),
      secure: readBool(env, 'BOT_SECURE', base.transport.secure),
    },
    journal: {
      ...base.journal,
      enabled: readBool(env, 'BOT_JOURNAL_ENABLED', base.journal.enabled),
      dir: readString(env, 'BOT_JOURNAL_DIR', base.journal.dir),
      experiment: readString(env, 'BOT_EXPERIMENT', base.journal.experiment),
    },
    health: {
      enabled: readBool(env, 'BOT_HEALTH_ENABLED', base.health.enabled),
      port: readInt(env, 'BOT_HEALTH_PORT', base.health.port, 1, 65_535),
    },
    engine: {
      mode: readMode(env, base.engine.mode),
      progressLogInterval: readInt(env, 'BOT_PROGRESS_LOG_INTERVAL', base.engine.progressLogInterval, 1, 1_000_000),
      maxQueueSize: readInt(env, 'BOT_QUEUE_MAX', base.engine.maxQueueSize, 100, 1_000_000),
    },
  };
}

/** Credentials are required before anything touches the network. */
export function assertCredentials(transport: TransportParams): void {
  if (!transport.name) throw new ConfigError('BOT_NAME is required');
  if (!transport.password) throw new ConfigError('BOT_PASSWORD is required');
}
