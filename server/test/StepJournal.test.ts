import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { journalTimestamp, StepJournal, toJournalRecord } from '../journal/StepJournal';
import type { JournalMeta, StepEvent } from '../journal/types';

const meta: JournalMeta = { scenario: 'normal_market', runId: 'run-1', experiment: 'regime_router', mode: 'active' };

function event(step: number): StepEvent {
  return {
    step,
    bid: 99.9,
    ask: 100.1,
    mid: 100,
    spread: 100.1 - 99.9,
    lastTrade: 100,
    bids: [{ price: 99.9, qty: 300 }, { price: 99.8, qty: 200 }, { price: 99.7, qty: 100 }],
    asks: [{ price: 100.1, qty: 400 }],
    bidDepth: 600,
    askDepth: 400,
    position: { inventory: 200, cashFlow: -20000, pnl: 0, ordersSent: 3, lastMid: 100 },
    regime: 'NORMAL',
    action: { orderId: `ORD_test_${step}_3`, side: 'SELL', price: 100.1, qty: 100, strategy: 'aggressive_mm' },
    fill: null,
  };
}

describe('toJournalRecord', () => {
  it('lays out one step in the journal format', () => {
    const record = toJournalRecord(event(7), meta, 2, new Date('2024-05-01T00:00:00.000Z'));
    expect(record).toEqual({
      step: 7,
      timestamp: '2024-05-01T00:00:00.000Z',
      experiment: 'regime_router',
      scenario: 'normal_market',
      run_id: 'run-1',
      mode: 'active',
      market: { bid: 99.9, ask: 100.1, mid: 100, spread: 0.2, last_trade: 100 },
      book: {
        bids: [{ price: 99.9, qty: 300 }, { price: 99.8, qty: 200 }],
        asks: [{ price: 100.1, qty: 400 }],
        bid_depth: 600,
        ask_depth: 400,
      },
      state: { inventory: 200, cash_flow: -20000, pnl: 0, orders_sent: 3 },
      regime: 'NORMAL',
      action: { order_id: 'ORD_test_7_3', side: 'SELL', price: 100.1, qty: 100, strategy: 'aggressive_mm' },
      fill: null,
    });
  });

  it('formats file timestamps in local time', () => {
    expect(journalTimestamp(new Date(2024, 0, 2, 3, 4, 5))).toBe('20240102_030405');
  });
});

describe('StepJournal', () => {
  const dirs: string[] = [];

  afterEach(() => {
    dirs.splice(0).forEach((dir) => fs.rmSync(dir, { recursive: true, force: true }));
  });

  it('writes one JSON line per step', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'step-journal-'));
    dirs.push(dir);
    const journal = new StepJournal(path.join(dir, 'raw'), meta);
    journal.record(event(1));
    journal.record(event(2));
    await journal.close();

    const file = journal.getFilePath();
    expect(path.basename(file)).toMatch(/^normal_market_regime_router_active_\d{8}_\d{6}\.jsonl$/);
    const lines = fs.readFileSync(file, 'utf8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines.map((line) => JSON.parse(line).step)).toEqual([1, 2]);
  });

  it('holds lines while the file stream is over its buffer and keeps them in order', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'step-journal-'));
    dirs.push(dir);
    const journal = new StepJournal(dir, meta, 10, 16);
    journal.record(event(1));
    journal.record(event(2));
    journal.record(event(3));
    expect(journal.heldCount()).toBe(2);
    await journal.close();

    const lines = fs.readFileSync(journal.getFilePath(), 'utf8').trim().split('\n');
    expect(lines.map((line) => JSON.parse(line).step)).toEqual([1, 2, 3]);
  });
});
