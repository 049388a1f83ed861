import type { BookLevel, MarketSnapshot } from '../metrics/types';
import { deriveMid, deriveSpread, sumDepth } from '../metrics/types';
import type { Fill } from '../position/types';

export type MarketMessage =
  | { kind: 'connected' }
  | { kind: 'snapshot'; snapshot: MarketSnapshot };

export type OrderChannelMessage =
  | { kind: 'authenticated' }
  | { kind: 'fill'; fill: Fill }
  | { kind: 'error'; message: string };

export type ParseResult<T> =
  | { ok: true; message: T }
  | { ok: false; reason: string };

const MARKET_TYPES = new Set(['MARKET_DATA', 'SNAPSHOT']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown, fallback = 0): number {
  const n = typeof value === 'string' ? Number(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? n : fallback;
}

function parseJson(raw: string): ParseResult<Record<string, unknown>> {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, reason: 'invalid_json' };
  }
  if (!isRecord(data)) return { ok: false, reason: 'not_an_object' };
  return { ok: true, message: data };
}

function parseLevels(value: unknown): BookLevel[] | null {
  if (!Array.isArray(value)) return null;
  const levels: BookLevel[] = [];
  for (const item of value) {
    if (!isRecord(item)) continue;
    const price = toNumber(item.price, NaN);
    const qty = toNumber(item.qty, NaN);
    if (!Number.isFinite(price) || !Number.isFinite(qty) || price <= 0 || qty < 0) continue;
    levels.push({ price, qty });
  }
  return levels;
}

/** Without book levels the touch stands in as a single level of unknown size. */
function touchLevel(price: number): BookLevel[] {
  return price > 0 ? [{ price, qty: 0 }] : [];
}

export function parseMarketMessage(raw: string): ParseResult<MarketMessage> {
  const parsed = parseJson(raw);
  if (!parsed.ok) return parsed;
  const data = parsed.message;

  if (data.type === 'CONNECTED') return { ok: true, message: { kind: 'connected' } };

  const hasQuote = 'bid' in data || 'ask' in data;
  if (!(typeof data.type === 'string' && MARKET_TYPES.has(data.type)) && !hasQuote) {
    return { ok: false, reason: `unknown_type:${String(data.type)}` };
  }

  const step = toNumber(data.step, NaN);
  if (!Number.isInteger(step) || step < 0) return { ok: false, reason: 'invalid_step' };

  const bid = Math.max(0, toNumber(data.bid));
  const ask = Math.max(0, toNumber(data.ask));
  const bids = parseLevels(data.bids) ?? touchLevel(bid);
  const asks = parseLevels(data.asks) ?? touchLevel(ask);

  return {
    ok: true,
    message: {
      kind: 'snapshot',
      snapshot: {
        step,
        bid,
        ask,
        mid: deriveMid(bid, ask),
        spread: deriveSpread(bid, ask),
        bidDepth: sumDepth(bids),
        askDepth: sumDepth(asks),
        lastTrade: toNumber(data.last_trade),
        bids,
        asks,
      },
    },
  };
}

export function parseOrderMessage(raw: string): ParseResult<OrderChannelMessage> {
  const parsed = parseJson(raw);
  if (!parsed.ok) return parsed;
  const data = parsed.message;

  switch (data.type) {
    case 'AUTHENTICATED':
      return { ok: true, message: { kind: 'authenticated' } };
    case 'ERROR':
      return { ok: true, message: { kind: 'error', message: String(data.message ?? '') } };
    case 'FILL': {
      const orderId = typeof data.order_id === 'string' ? data.order_id : '';
      const side = data.side === 'BUY' || data.side === 'SELL' ? data.side : null;
      const price = toNumber(data.price, NaN);
      const qty = toNumber(data.qty, NaN);
      if (!orderId || !side) return { ok: false, reason: 'invalid_fill_identity' };
      if (!(price > 0) || !Number.isInteger(qty) || qty <= 0) return { ok: false, reason: 'invalid_fill_amount' };
      return { ok: true, message: { kind: 'fill', fill: { orderId, side, price, qty } } };
    }
    default:
      return { ok: false, reason: `unknown_type:${String(data.type)}` };
  }
}
