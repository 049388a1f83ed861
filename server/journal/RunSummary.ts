import type { Regime } from '../regime/types';
import { isRegime, REGIMES } from '../regime/types';
import type { Side } from '../strategy/types';
import { log } from '../utils/logger';

/** One journal line, flattened and validated. */
export interface JournalRow {
  step: number;
  timestamp: string;
  scenario: string;
  experiment: string;
  runId: string;
  mode: string;
  regime: Regime | null;
  bid: number;
  ask: number;
  mid: number;
  spread: number;
  lastTrade: number;
  bidDepth: number;
  askDepth: number;
  inventory: number;
  cashFlow: number;
  pnl: number;
  ordersSent: number;
  action: { side: Side; price: number; qty: number } | null;
  fill: { side: Side; price: number; qty: number; latencyMs: number | null } | null;
}

export interface LoadedJournal {
  rows: JournalRow[];
  skipped: number;
}

export interface RunStatistics {
  scenario: string;
  experiment: string;
  runId: string;
  mode: string;
  totalSteps: number;
  firstStep: number;
  lastStep: number;
  minMid: number;
  maxMid: number;
  avgMid: number;
  midRange: number;
  minSpread: number;
  maxSpread: number;
  avgSpread: number;
  minInventory: number;
  maxInventory: number;
  avgInventory: number;
  finalInventory: number;
  minPnl: number;
  maxPnl: number;
  finalPnl: number;
  finalCashFlow: number;
  totalActions: number;
  buyActions: number;
  sellActions: number;
  totalFills: number;
  buyFills: number;
  sellFills: number;
  fillRatePct: number;
  totalFillQty: number;
  avgFillLatencyMs: number;
  regimeSteps: Partial<Record<Regime, number>>;
}

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function num(source: Json, key: string): number {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function str(source: Json, key: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : '';
}

function side(value: unknown): Side | null {
  return value === 'BUY' || value === 'SELL' ? value : null;
}

export function parseJournalLine(line: string): JournalRow | null {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isRecord(data) || typeof data.step !== 'number') return null;
  const step = data.step;
  const market = isRecord(data.market) ? data.market : null;
  const state = isRecord(data.state) ? data.state : null;
  if (!market || !state) return null;
  const book = isRecord(data.book) ? data.book : {};

  let action: JournalRow['action'] = null;
  if (isRecord(data.action)) {
    const actionSide = side(data.action.side);
    if (actionSide) action = { side: actionSide, price: num(data.action, 'price'), qty: num(data.action, 'qty') };
  }

  let fill: JournalRow['fill'] = null;
  if (isRecord(data.fill)) {
    const fillSide = side(data.fill.side);
    const latency = data.fill.latency_ms;
    if (fillSide) {
      fill = {
        side: fillSide,
        price: num(data.fill, 'price'),
        qty: num(data.fill, 'qty'),
        latencyMs: typeof latency === 'number' && Number.isFinite(latency) ? latency : null,
      };
    }
  }

  return {
    step,
    timestamp: str(data, 'timestamp'),
    scenario: str(data, 'scenario'),
    experiment: str(data, 'experiment'),
    runId: str(data, 'run_id'),
    mode: str(data, 'mode'),
    regime: isRegime(data.regime) ? data.regime : null,
    bid: num(market, 'bid'),
    ask: num(market, 'ask'),
    mid: num(market, 'mid'),
    spread: num(market, 'spread'),
    lastTrade: num(market, 'last_trade'),
    bidDepth: num(book, 'bid_depth'),
    askDepth: num(book, 'ask_depth'),
    inventory: num(state, 'inventory'),
    cashFlow: num(state, 'cash_flow'),
    pnl: num(state, 'pnl'),
    ordersSent: num(state, 'orders_sent'),
    action,
    fill,
  };
}

/** Blank lines are ignored; malformed lines are counted and skipped with a warning. */
export function loadJournal(content: string): LoadedJournal {
  const rows: JournalRow[] = [];
  let skipped = 0;
  content.split('\n').forEach((raw, index) => {
    const line = raw.trim();
    if (!line) return;
    const row = parseJournalLine(line);
    if (row) {
      rows.push(row);
    } else {
      skipped += 1;
      log('JOURNAL_LINE_SKIPPED', { line: index + 1 });
    }
  });
  return { rows, skipped };
}

const min = (values: number[]): number => (values.length ? Math.min(...values) : 0);
const max = (values: number[]): number => (values.length ? Math.max(...values) : 0);
const avg = (values: number[]): number => (values.length ? values.reduce((a, b) => a + b, 0) / values.length : 0);

export function summarizeRun(rows: JournalRow[]): RunStatistics | null {
  if (rows.length === 0) return null;
  const first = rows[0];
  const last = rows[rows.length - 1];

  const steps = rows.map((r) => r.step);
  const mids = rows.map((r) => r.mid).filter((v) => v > 0);
  const spreads = rows.map((r) => r.spread).filter((v) => v > 0);
  const inventories = rows.map((r) => r.inventory);
  const pnls = rows.map((r) => r.pnl);
  const actions = rows.flatMap((r) => (r.action ? [r.action] : []));
  const fills = rows.flatMap((r) => (r.fill ? [r.fill] : []));
  const latencies = fills.flatMap((f) => (f.latencyMs === null ? [] : [f.latencyMs]));

  const regimeSteps: Partial<Record<Regime, number>> = {};
  for (const row of rows) {
    if (row.regime) regimeSteps[row.regime] = (regimeSteps[row.regime] ?? 0) + 1;
  }

  return {
    scenario: first.scenario || 'unknown',
    experiment: first.experiment || 'unknown',
    runId: first.runId || 'unknown',
    mode: first.mode || 'unknown',
    totalSteps: rows.length,
    firstStep: min(steps),
    lastStep: max(steps),
    minMid: min(mids),
    maxMid: max(mids),
    avgMid: avg(mids),
    midRange: max(mids) - min(mids),
    minSpread: min(spreads),
    maxSpread: max(spreads),
    avgSpread: avg(spreads),
    minInventory: min(inventories),
    maxInventory: max(inventories),
    avgInventory: avg(inventories),
    finalInventory: last.inventory,
    minPnl: min(pnls),
    maxPnl: max(pnls),
    finalPnl: last.pnl,
    finalCashFlow: last.cashFlow,
    totalActions: actions.length,
    buyActions: actions.filter((a) => a.side === 'BUY').length,
    sellActions: actions.filter((a) => a.side === 'SELL').length,
    totalFills: fills.length,
    buyFills: fills.filter((f) => f.side === 'BUY').length,
    sellFills: fills.filter((f) => f.side === 'SELL').length,
    fillRatePct: actions.length > 0 ? (fills.length / actions.length) * 100 : 0,
    totalFillQty: fills.reduce((acc, f) => acc + f.qty, 0),
    avgFillLatencyMs: avg(latencies),
    regimeSteps,
  };
}

const CSV_COLUMNS = [
  'step', 'timestamp', 'regime', 'bid', 'ask', 'mid', 'spread', 'last_trade', 'bid_depth', 'ask_depth',
  'inventory', 'cash_flow', 'pnl', 'orders_sent', 'action_side', 'action_price', 'action_qty',
  'fill_side', 'fill_price', 'fill_qty', 'fill_latency_ms',
] as const;

function csvCell(value: string | number | null): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function rowsToCsv(rows: JournalRow[]): string {
  const lines: string[] = [CSV_COLUMNS.join(',')];
  for (const r of rows) {
    const cells: Array<string | number | null> = [
      r.step, r.timestamp, r.regime, r.bid, r.ask, r.mid, r.spread, r.lastTrade, r.bidDepth, r.askDepth,
      r.inventory, r.cashFlow, r.pnl, r.ordersSent,
      r.action ? r.action.side : null, r.action ? r.action.price : null, r.action ? r.action.qty : null,
      r.fill ? r.fill.side : null, r.fill ? r.fill.price : null, r.fill ? r.fill.qty : null,
      r.fill ? r.fill.latencyMs : null,
    ];
    lines.push(cells.map(csvCell).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export interface RunReportEntry {
  sourceFile: string;
  stats: RunStatistics;
}

type RunColumn = [header: string, cell: (stats: RunStatistics) => string | number];

const RUN_COLUMNS: RunColumn[] = [
  ['scenario', (s) => s.scenario],
  ['experiment', (s) => s.experiment],
  ['run_id', (s) => s.runId],
  ['mode', (s) => s.mode],
  ['total_steps', (s) => s.totalSteps],
  ['first_step', (s) => s.firstStep],
  ['last_step', (s) => s.lastStep],
  ['min_mid', (s) => s.minMid],
  ['max_mid', (s) => s.maxMid],
  ['avg_mid', (s) => s.avgMid],
  ['mid_range', (s) => s.midRange],
  ['min_spread', (s) => s.minSpread],
  ['max_spread', (s) => s.maxSpread],
  ['avg_spread', (s) => s.avgSpread],
  ['min_inventory', (s) => s.minInventory],
  ['max_inventory', (s) => s.maxInventory],
  ['avg_inventory', (s) => s.avgInventory],
  ['final_inventory', (s) => s.finalInventory],
  ['min_pnl', (s) => s.minPnl],
  ['max_pnl', (s) => s.maxPnl],
  ['final_pnl', (s) => s.finalPnl],
  ['final_cash_flow', (s) => s.finalCashFlow],
  ['total_actions', (s) => s.totalActions],
  ['buy_actions', (s) => s.buyActions],
  ['sell_actions', (s) => s.sellActions],
  ['total_fills', (s) => s.totalFills],
  ['buy_fills', (s) => s.buyFills],
  ['sell_fills', (s) => s.sellFills],
  ['fill_rate_pct', (s) => s.fillRatePct],
  ['total_fill_qty', (s) => s.totalFillQty],
  ['avg_fill_latency_ms', (s) => s.avgFillLatencyMs],
  ...REGIMES.map((regime): RunColumn => [`steps_${regime.toLowerCase()}`, (s) => s.regimeSteps[regime] ?? 0]),
];

/** Cross-run report: one row per journal file. */
export function runsToCsv(entries: RunReportEntry[]): string {
  const lines: string[] = [['source_file', ...RUN_COLUMNS.map(([header]) => header)].join(',')];
  for (const entry of entries) {
    lines.push([csvCell(entry.sourceFile), ...RUN_COLUMNS.map(([, cell]) => csvCell(cell(entry.stats)))].join(','));
  }
  return `${lines.join('\n')}\n`;
}
