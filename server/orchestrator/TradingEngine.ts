import type { EngineConfig } from '../config/engineConfig';
import { DEFAULT_ENGINE_CONFIG } from '../config/engineConfig';
import { OrderLifecycleManager } from '../execution/OrderLifecycleManager';
import type { OrderGateway } from '../execution/types';
import type { StepAction, StepFill, StepSink } from '../journal/types';
import { LatencyTracker } from '../metrics/LatencyTracker';
import type { LatencySnapshot } from '../metrics/LatencyTracker';
import type { MarketSnapshot } from '../metrics/types';
import { PositionManager } from '../position/PositionManager';
import type { Fill, IPositionManager } from '../position/types';
import type { Regime } from '../regime/types';
import { log, logError } from '../utils/logger';
import { StrategyRouter } from './StrategyRouter';

export type StreamChannel = 'market' | 'orders';

export type EngineEvent =
  | { type: 'connected' }
  | { type: 'snapshot'; snapshot: MarketSnapshot }
  | { type: 'authenticated' }
  | { type: 'fill'; fill: Fill }
  | { type: 'order_error'; message: string }
  | { type: 'closed'; channel: StreamChannel; code: number };

/** Only market snapshots may be shed when the queue is over capacity. */
export const isDroppableEvent = (event: EngineEvent): boolean => event.type === 'snapshot';

export interface EngineState {
  running: boolean;
  step: number;
  stepsProcessed: number;
  regime: Regime;
  regimeDuration: number;
  inventory: number;
  cashFlow: number;
  pnl: number;
  ordersSent: number;
  cancelsSent: number;
  openOrders: number;
  fills: number;
  unknownFills: number;
  skippedSteps: number;
  doneSendFailures: number;
  lastSnapshotAt: number;
  closedChannels: StreamChannel[];
}

export interface FinalResults {
  steps: number;
  finalStep: number;
  inventory: number;
  cashFlow: number;
  pnl: number;
  ordersSent: number;
  cancelsSent: number;
  fills: number;
  regime: Regime;
}

export interface TradingEngineOptions {
  clientName: string;
  gateway: OrderGateway;
  config?: EngineConfig;
  journal?: StepSink | null;
  position?: IPositionManager;
  clock?: () => number;
}

/**
 * Consumes engine events one at a time. Every snapshot is answered with
 * exactly one DONE, after the step's action (if any) has been sent.
 */
export class TradingEngine {
  private readonly config: EngineConfig;
  private readonly gateway: OrderGateway;
  private readonly router: StrategyRouter;
  private readonly position: IPositionManager;
  private readonly orders: OrderLifecycleManager;
  private readonly latency: LatencyTracker;
  private readonly journal: StepSink | null;
  private readonly clock: () => number;

  private pendingFill: StepFill | null = null;
  private lastDoneAt: number | null = null;
  private lastSnapshotAt = 0;
  private step = 0;
  private stepsProcessed = 0;
  private fills = 0;
  private unknownFills = 0;
  private skippedSteps = 0;
  private doneSendFailures = 0;
  private readonly closedChannels = new Set<StreamChannel>();

  constructor(options: TradingEngineOptions) {
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
    this.gateway = options.gateway;
    this.clock = options.clock ?? Date.now;
    this.journal = options.journal ?? null;
    this.position = options.position ?? new PositionManager();
    this.router = new StrategyRouter(this.config);
    this.orders = new OrderLifecycleManager(
      options.clientName,
      this.gateway,
      this.position,
      this.config.orders,
      this.clock
    );
    this.latency = new LatencyTracker(1000, this.clock);
  }

  handle(event: EngineEvent): void {
    switch (event.type) {
      case 'snapshot':
        this.onSnapshot(event.snapshot);
        return;
      case 'fill':
        this.onFill(event.fill);
        return;
      case 'connected':
        log('MARKET_CONNECTED', {});
        return;
      case 'authenticated':
        log('ORDERS_AUTHENTICATED', {});
        return;
      case 'order_error':
        log('ORDER_CHANNEL_ERROR', { message: event.message });
        return;
      case 'closed':
        this.closedChannels.add(event.channel);
        log('STREAM_CLOSED', { channel: event.channel, code: event.code, step: this.step });
        return;
    }
  }

  getState(): EngineState {
    const position = this.position.snapshot();
    const regime = this.router.getRegimeState();
    return {
      running: this.closedChannels.size === 0,
      step: this.step,
      stepsProcessed: this.stepsProcessed,
      regime: regime.currentRegime,
      regimeDuration: regime.regimeDuration,
      inventory: position.inventory,
      cashFlow: position.cashFlow,
      pnl: position.pnl,
      ordersSent: position.ordersSent,
      cancelsSent: this.orders.getCancelsSent(),
      openOrders: this.orders.openCount(),
      fills: this.fills,
      unknownFills: this.unknownFills,
      skippedSteps: this.skippedSteps,
      doneSendFailures: this.doneSendFailures,
      lastSnapshotAt: this.lastSnapshotAt,
      closedChannels: [...this.closedChannels],
    };
  }

  getLatency(): LatencySnapshot {
    return this.latency.snapshot();
  }

  results(): FinalResults {
    const state = this.getState();
    return {
      steps: state.stepsProcessed,
      finalStep: state.step,
      inventory: state.inventory,
      cashFlow: state.cashFlow,
      pnl: state.pnl,
      ordersSent: state.ordersSent,
      cancelsSent: state.cancelsSent,
      fills: state.fills,
      regime: state.regime,
    };
  }

  /** A snapshot shed by the queue still owes the exchange its DONE. */
  skipSnapshot(snapshot: MarketSnapshot): void {
    this.skippedSteps += 1;
    this.sendDone(snapshot.step);
  }

  private sendDone(step: number): void {
    if (!this.gateway.send({ action: 'DONE' })) {
      this.doneSendFailures += 1;
      logError('DONE_SEND_FAILED', 'orders stream not open', { step });
    }
  }

  private onSnapshot(snapshot: MarketSnapshot): void {
    const now = this.clock();
    if (this.lastDoneAt !== null) {
      this.latency.record('step', now - this.lastDoneAt);
    }
    this.lastSnapshotAt = now;
    this.step = snapshot.step;
    this.stepsProcessed += 1;

    this.position.markToMarket(snapshot.mid);
    const decision = this.router.decide(snapshot, this.position.getInventory());
    const regime = decision ? decision.regime : this.router.getRegimeState().currentRegime;

    const active = this.config.engine.mode === 'active';
    if (active) this.orders.expireStale(snapshot.step, regime);

    let action: StepAction | null = null;
    if (active && decision && decision.order) {
      const result = this.orders.submit(decision.order, snapshot.step);
      if (result.status === 'SENT' && result.order) {
        action = {
          orderId: result.order.id,
          side: result.order.side,
          price: result.order.price,
          qty: result.order.qty,
          strategy: decision.strategy,
        };
        log('ORDER_SENT', {
          step: snapshot.step,
          orderId: action.orderId,
          side: action.side,
          price: action.price,
          qty: action.qty,
          regime,
          strategy: decision.strategy,
          risk: decision.risk.action,
        });
      }
    }

    const position = this.position.snapshot();
    if (this.journal) {
      this.journal.record({
        step: snapshot.step,
        bid: snapshot.bid,
        ask: snapshot.ask,
        mid: snapshot.mid,
        spread: snapshot.spread,
        lastTrade: snapshot.lastTrade,
        bids: snapshot.bids,
        asks: snapshot.asks,
        bidDepth: snapshot.bidDepth,
        askDepth: snapshot.askDepth,
        position,
        regime,
        action,
        fill: this.pendingFill,
      });
    }
    this.pendingFill = null;

    if (this.stepsProcessed % this.config.engine.progressLogInterval === 0) {
      log('STEP_PROGRESS', {
        step: snapshot.step,
        regime,
        inventory: position.inventory,
        pnl: Number(position.pnl.toFixed(2)),
        ordersSent: position.ordersSent,
        openOrders: this.orders.openCount(),
        stepLatencyMs: Number(this.latency.recentAverage('step').toFixed(2)),
      });
    }

    this.sendDone(snapshot.step);
    this.lastDoneAt = this.clock();
  }

  private onFill(fill: Fill): void {
    const result = this.orders.onFill(fill);
    this.fills += 1;
    let latencyMs: number | null = null;
    if (result.record) {
      latencyMs = this.clock() - result.record.sentAt;
      this.latency.record('fill', latencyMs);
    } else {
      this.unknownFills += 1;
    }

    log('FILL', {
      orderId: fill.orderId,
      side: fill.side,
      price: fill.price,
      qty: fill.qty,
      known: result.known,
      inventory: result.position.inventory,
      pnl: Number(result.position.pnl.toFixed(2)),
    });

    this.pendingFill = {
      orderId: fill.orderId,
      side: fill.side,
      price: fill.price,
      qty: fill.qty,
      latencyMs,
    };
  }
}
