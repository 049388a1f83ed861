import type { OrderIntent } from './types';

export const TICK = 0.10;
export const MIN_ORDER_QTY = 100;
export const MAX_ORDER_QTY = 500;
export const QTY_STEP = 100;

const MAX_SKEW = 0.2;
// absorbs float noise such as 100.1 - 99.9 = 0.19999999999998863
const PRICE_EPS = 1e-9;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Round down to a multiple of 100, then clamp into [100, 500]. */
export function normalizeQuantity(qty: number): number {
  const whole = Number.isFinite(qty) ? Math.floor(qty / QTY_STEP) * QTY_STEP : 0;
  return clamp(whole, MIN_ORDER_QTY, MAX_ORDER_QTY);
}

export function inventorySkew(skewFactor: number, inventory: number): number {
  return clamp(-skewFactor * inventory, -MAX_SKEW, MAX_SKEW);
}

/**
 * Tick-aware passive quote: improve the inside by one tick when the spread
 * leaves room for it, otherwise join the touch. The side alternates by the
 * parity of `step / tradeFreq`. A BUY never reaches the ask and a SELL never
 * reaches the bid.
 */
export function quoteInsideSpread(
  bid: number,
  ask: number,
  step: number,
  tradeFreq: number,
  skew: number,
  qty: number
): OrderIntent {
  const spread = ask - bid;
  const improve = spread + PRICE_EPS >= 2 * TICK ? TICK : 0;
  const buyBase = bid + improve;
  const sellBase = ask - improve;

  if (Math.floor(step / Math.max(1, tradeFreq)) % 2 === 0) {
    let price = Math.max(bid, Math.min(ask - TICK, buyBase + skew));
    price = Math.max(TICK, price);
    return { side: 'BUY', price: roundTo(price, 1), qty };
  }
  const price = Math.min(ask, Math.max(bid + TICK, sellBase + skew));
  return { side: 'SELL', price: roundTo(price, 1), qty };
}
