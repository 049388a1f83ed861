import fs from 'fs';
import path from 'path';
import { log, logError } from '../utils/logger';
import type { JournalMeta, JournalRecord, StepEvent, StepSink } from './types';

const pad = (n: number): string => String(n).padStart(2, '0');

export function journalTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_`
    + `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function toJournalRecord(
  event: StepEvent,
  meta: JournalMeta,
  bookLevels: number = 10,
  now: Date = new Date()
): JournalRecord {
  return {
    step: event.step,
    timestamp: now.toISOString(),
    experiment: meta.experiment,
    scenario: meta.scenario,
    run_id: meta.runId,
    mode: meta.mode,
    market: {
      bid: event.bid,
      ask: event.ask,
      mid: event.mid,
      spread: Number(event.spread.toFixed(4)),
      last_trade: event.lastTrade,
    },
    book: {
      bids: event.bids.slice(0, bookLevels),
      asks: event.asks.slice(0, bookLevels),
      bid_depth: event.bidDepth,
      ask_depth: event.askDepth,
    },
    state: {
      inventory: event.position.inventory,
      cash_flow: event.position.cashFlow,
      pnl: event.position.pnl,
      orders_sent: event.position.ordersSent,
    },
    regime: event.regime,
    action: event.action
      ? {
        order_id: event.action.orderId,
        side: event.action.side,
        price: event.action.price,
        qty: event.action.qty,
        strategy: event.action.strategy,
      }
      : null,
    fill: event.fill
      ? {
        order_id: event.fill.orderId,
        side: event.fill.side,
        price: event.fill.price,
        qty: event.fill.qty,
        latency_ms: event.fill.latencyMs,
      }
      : null,
  };
}

/**
 * Appends one JSON line per step to
 * `<dir>/<scenario>_<experiment>_<mode>_<timestamp>.jsonl`.
 * A write failure disables the journal; trading carries on.
 * While the file stream asks for a drain, lines are held and written as
 * one batch on `drain`.
 */
export class StepJournal implements StepSink {
  private readonly filePath: string;
  private readonly stream: fs.WriteStream;
  private failed = false;
  private closing = false;
  private waitingForDrain = false;
  private held: string[] = [];
  private written = 0;

  constructor(
    dir: string,
    private readonly meta: JournalMeta,
    private readonly bookLevels: number = 10,
    highWaterMark: number = 64 * 1024
  ) {
    fs.mkdirSync(dir, { recursive: true });
    const fileName = `${meta.scenario}_${meta.experiment}_${meta.mode}_${journalTimestamp(new Date())}.jsonl`;
    this.filePath = path.join(dir, fileName);
    this.stream = fs.createWriteStream(this.filePath, { flags: 'w', encoding: 'utf8', highWaterMark });
    this.stream.on('error', (err) => {
      if (!this.failed) logError('JOURNAL_WRITE_ERROR', err, { file: this.filePath });
      this.failed = true;
    });
    log('JOURNAL_OPEN', { file: this.filePath });
  }

  record(event: StepEvent): void {
    if (this.failed || this.closing) return;
    const line = `${JSON.stringify(toJournalRecord(event, this.meta, this.bookLevels))}\n`;
    this.written += 1;
    if (this.waitingForDrain) {
      this.held.push(line);
      return;
    }
    this.write(line);
  }

  /** Lines waiting for the file stream to drain. */
  heldCount(): number {
    return this.held.length;
  }

  close(): Promise<void> {
    this.closing = true;
    if (this.held.length > 0 && !this.failed) this.stream.write(this.held.join(''));
    this.held = [];
    return new Promise((resolve) => {
      this.stream.end(() => {
        log('JOURNAL_CLOSED', { file: this.filePath, records: this.written });
        resolve();
      });
    });
  }

  getFilePath(): string {
    return this.filePath;
  }

  private write(chunk: string): void {
    if (this.stream.write(chunk)) return;
    this.waitingForDrain = true;
    this.stream.once('drain', () => this.releaseHeld());
  }

  private releaseHeld(): void {
    this.waitingForDrain = false;
    if (this.closing || this.failed || this.held.length === 0) return;
    const batch = this.held.join('');
    this.held = [];
    this.write(batch);
  }
}
