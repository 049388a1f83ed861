import { describe, expect, it } from 'vitest';
import { DEFAULT_ENGINE_CONFIG } from '../config/engineConfig';
import type { EngineConfig } from '../config/engineConfig';
import { TradingEngine, isDroppableEvent } from '../orchestrator/TradingEngine';
import { FakeGateway, MemoryJournal, makeSnapshot } from './helpers/fixtures';

function setup() {
  const gateway = new FakeGateway();
  const journal = new MemoryJournal();
  let now = 1_000;
  const engine = new TradingEngine({ clientName: 'test', gateway, journal, clock: () => now });
  const setNow = (value: number) => {
    now = value;
  };
  return { gateway, journal, engine, setNow };
}

function feedFlat(engine: TradingEngine, from: number, to: number): void {
  for (let step = from; step <= to; step += 1) {
    engine.handle({ type: 'snapshot', snapshot: makeSnapshot(step, 99.9, 100.1) });
  }
}

describe('TradingEngine', () => {
  it('answers every snapshot with exactly one DONE', () => {
    const { gateway, engine } = setup();
    feedFlat(engine, 1, 50);
    expect(gateway.doneCount()).toBe(50);
    expect(gateway.orders()).toHaveLength(0);
  });

  it('sends the step order before its DONE and journals it', () => {
    const { gateway, journal, engine } = setup();
    feedFlat(engine, 1, 100);

    expect(gateway.sent.slice(-2)).toEqual([
      { order_id: 'ORD_test_100_0', side: 'BUY', price: 100, qty: 200 },
      { action: 'DONE' },
    ]);
    const record = journal.events[journal.events.length - 1];
    expect(record.step).toBe(100);
    expect(record.regime).toBe('NORMAL');
    expect(record.action).toEqual({ orderId: 'ORD_test_100_0', side: 'BUY', price: 100, qty: 200, strategy: 'aggressive_mm' });
    expect(record.position.ordersSent).toBe(1);
  });

  it('carries a fill into the next journal record with its latency', () => {
    const { journal, engine, setNow } = setup();
    feedFlat(engine, 1, 100);

    setNow(1_050);
    engine.handle({ type: 'fill', fill: { orderId: 'ORD_test_100_0', side: 'BUY', price: 100, qty: 200 } });
    feedFlat(engine, 101, 101);

    const record = journal.events[journal.events.length - 1];
    expect(record.fill).toEqual({ orderId: 'ORD_test_100_0', side: 'BUY', price: 100, qty: 200, latencyMs: 50 });
    expect(record.position.inventory).toBe(200);
    expect(record.position.cashFlow).toBe(-20000);

    feedFlat(engine, 102, 102);
    expect(journal.events[journal.events.length - 1].fill).toBeNull();
  });

  it('applies fills for orders it does not know', () => {
    const { engine } = setup();
    engine.handle({ type: 'fill', fill: { orderId: 'ORD_other', side: 'SELL', price: 100, qty: 100 } });
    const state = engine.getState();
    expect(state.inventory).toBe(-100);
    expect(state.fills).toBe(1);
    expect(state.unknownFills).toBe(1);
  });

  it('reports state and final results', () => {
    const { engine, setNow } = setup();
    feedFlat(engine, 1, 100);
    setNow(2_000);
    engine.handle({ type: 'closed', channel: 'market', code: 1000 });

    const state = engine.getState();
    expect(state.running).toBe(false);
    expect(state.closedChannels).toEqual(['market']);
    expect(state.lastSnapshotAt).toBe(1_000);
    expect(engine.results()).toEqual({
      steps: 100,
      finalStep: 100,
      inventory: 0,
      cashFlow: 0,
      pnl: 0,
      ordersSent: 1,
      cancelsSent: 0,
      fills: 0,
      regime: 'NORMAL',
    });
  });

  it('records step latency from DONE to the next snapshot', () => {
    const { engine, setNow } = setup();
    feedFlat(engine, 1, 1);
    setNow(1_007);
    feedFlat(engine, 2, 2);
    expect(engine.getLatency().stages.step).toMatchObject({ avgMs: 7, samples: 1 });
  });

  it('only observes and journals in passive mode', () => {
    const gateway = new FakeGateway();
    const journal = new MemoryJournal();
    const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, engine: { ...DEFAULT_ENGINE_CONFIG.engine, mode: 'passive' } };
    const engine = new TradingEngine({ clientName: 'test', gateway, journal, config, clock: () => 1_000 });
    feedFlat(engine, 1, 100);

    expect(gateway.orders()).toHaveLength(0);
    expect(gateway.doneCount()).toBe(100);
    expect(journal.events).toHaveLength(100);
    expect(journal.events[99]).toMatchObject({ step: 100, regime: 'NORMAL', action: null });
  });

  it('still answers a snapshot shed by the queue with its DONE', () => {
    const { gateway, journal, engine } = setup();
    engine.skipSnapshot(makeSnapshot(7, 99.9, 100.1));
    expect(gateway.sent).toEqual([{ action: 'DONE' }]);
    expect(journal.events).toHaveLength(0);
    expect(engine.getState()).toMatchObject({ skippedSteps: 1, stepsProcessed: 0 });
  });

  it('counts DONE messages the orders stream could not take', () => {
    const { gateway, engine } = setup();
    gateway.accept = false;
    feedFlat(engine, 1, 3);
    expect(engine.getState().doneSendFailures).toBe(3);
  });

  it('marks only market snapshots as droppable', () => {
    expect(isDroppableEvent({ type: 'snapshot', snapshot: makeSnapshot(1, 99.9, 100.1) })).toBe(true);
    expect(isDroppableEvent({ type: 'fill', fill: { orderId: 'x', side: 'BUY', price: 1, qty: 100 } })).toBe(false);
    expect(isDroppableEvent({ type: 'closed', channel: 'orders', code: 1006 })).toBe(false);
  });
});
