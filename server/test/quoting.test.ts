import { describe, expect, it } from 'vitest';
import { inventorySkew, normalizeQuantity, quoteInsideSpread } from '../strategy/quoting';

describe('normalizeQuantity', () => {
  it('floors to the lot size and clamps into 100..500', () => {
    expect(normalizeQuantity(150)).toBe(100);
    expect(normalizeQuantity(250)).toBe(200);
    expect(normalizeQuantity(499)).toBe(400);
    expect(normalizeQuantity(1000)).toBe(500);
    expect(normalizeQuantity(50)).toBe(100);
    expect(normalizeQuantity(Number.NaN)).toBe(100);
  });
});

describe('inventorySkew', () => {
  it('leans against inventory and saturates', () => {
    expect(inventorySkew(0.0002, 500)).toBeCloseTo(-0.1, 12);
    expect(inventorySkew(0.0002, 3000)).toBe(-0.2);
    expect(inventorySkew(0.0002, -3000)).toBe(0.2);
  });
});

describe('quoteInsideSpread', () => {
  it('improves by a tick when the spread is two ticks wide', () => {
    expect(quoteInsideSpread(99.9, 100.1, 0, 5, 0, 200)).toEqual({ side: 'BUY', price: 100, qty: 200 });
    expect(quoteInsideSpread(99.9, 100.1, 5, 5, 0, 200)).toEqual({ side: 'SELL', price: 100, qty: 200 });
  });

  it('joins the touch on a one-tick spread', () => {
    expect(quoteInsideSpread(100, 100.1, 0, 5, 0, 100)).toEqual({ side: 'BUY', price: 100, qty: 100 });
    expect(quoteInsideSpread(100, 100.1, 5, 5, 0, 100)).toEqual({ side: 'SELL', price: 100.1, qty: 100 });
  });

  it('applies skew but never leaves the touch', () => {
    expect(quoteInsideSpread(99, 101, 0, 1, 0, 200)).toEqual({ side: 'BUY', price: 99.1, qty: 200 });
    expect(quoteInsideSpread(99, 101, 0, 1, -0.2, 200)).toEqual({ side: 'BUY', price: 99, qty: 200 });
    expect(quoteInsideSpread(99, 101, 1, 1, 0.2, 200)).toEqual({ side: 'SELL', price: 101, qty: 200 });
  });
});
