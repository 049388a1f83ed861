import type { OrderGateway, OutboundMessage } from '../../execution/types';
import type { StepEvent, StepSink } from '../../journal/types';
import type { MarketSignals } from '../../metrics/MarketMetricsEngine';
import type { MarketSnapshot } from '../../metrics/types';
import type { StrategyContext } from '../../strategy/types';

export class FakeGateway implements OrderGateway {
  readonly sent: OutboundMessage[] = [];
  accept = true;

  send(message: OutboundMessage): boolean {
    if (!this.accept) return false;
    this.sent.push(message);
    return true;
  }

  orders(): OutboundMessage[] {
    return this.sent.filter((m) => !('action' in m));
  }

  cancels(): OutboundMessage[] {
    return this.sent.filter((m) => 'action' in m && m.action === 'CANCEL');
  }

  doneCount(): number {
    return this.sent.filter((m) => 'action' in m && m.action === 'DONE').length;
  }
}

export class MemoryJournal implements StepSink {
  readonly events: StepEvent[] = [];
  closed = false;

  record(event: StepEvent): void {
    this.events.push(event);
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }

  getFilePath(): string | null {
    return null;
  }
}

export function makeSignals(overrides: Partial<MarketSignals> = {}): MarketSignals {
  return {
    calibrated: true,
    sampleCount: 100,
    mid: 100,
    spread: 0.2,
    totalDepth: 1000,
    volatility: 0.05,
    zScore: 0,
    momentum: 0,
    imbalance: 0,
    churn: 0,
    spreadRatio: 1,
    depthRatio: 1,
    baseline: { spread: 0.2, depth: 1000, mid: 100 },
    ...overrides,
  };
}

export function makeContext(overrides: Partial<Omit<StrategyContext, 'metrics'>> = {}, metrics: Partial<MarketSignals> = {}): StrategyContext {
  return {
    bid: 99.9,
    ask: 100.1,
    mid: 100,
    inventory: 0,
    step: 0,
    ...overrides,
    metrics: makeSignals(metrics),
  };
}

export function makeSnapshot(step: number, bid: number, ask: number, depth: number = 500): MarketSnapshot {
  return {
    step,
    bid,
    ask,
    mid: (bid + ask) / 2,
    spread: ask - bid,
    bidDepth: depth,
    askDepth: depth,
    lastTrade: (bid + ask) / 2,
    bids: [{ price: bid, qty: depth }],
    asks: [{ price: ask, qty: depth }],
  };
}
