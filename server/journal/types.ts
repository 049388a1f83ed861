import type { RunMode } from '../config/engineConfig';
import type { BookLevel } from '../metrics/types';
import type { PositionSnapshot } from '../position/types';
import type { Regime } from '../regime/types';
import type { Side } from '../strategy/types';

export interface StepAction {
  orderId: string;
  side: Side;
  price: number;
  qty: number;
  strategy: string | null;
}

export interface StepFill {
  orderId: string;
  side: Side;
  price: number;
  qty: number;
  latencyMs: number | null;
}

/** Everything the engine knows about one step once its action is submitted. */
export interface StepEvent {
  step: number;
  bid: number;
  ask: number;
  mid: number;
  spread: number;
  lastTrade: number;
  bids: BookLevel[];
  asks: BookLevel[];
  bidDepth: number;
  askDepth: number;
  position: PositionSnapshot;
  regime: Regime;
  action: StepAction | null;
  fill: StepFill | null;
}

export interface JournalMeta {
  scenario: string;
  runId: string;
  experiment: string;
  mode: RunMode;
}

export interface JournalRecord {
  step: number;
  timestamp: string;
  experiment: string;
  scenario: string;
  run_id: string;
  mode: string;
  market: { bid: number; ask: number; mid: number; spread: number; last_trade: number };
  book: { bids: BookLevel[]; asks: BookLevel[]; bid_depth: number; ask_depth: number };
  state: { inventory: number; cash_flow: number; pnl: number; orders_sent: number };
  regime: Regime;
  action: { order_id: string; side: Side; price: number; qty: number; strategy: string | null } | null;
  fill: { order_id: string; side: Side; price: number; qty: number; latency_ms: number | null } | null;
}

export interface StepSink {
  record(event: StepEvent): void;
  close(): Promise<void>;
  getFilePath(): string | null;
}
