export interface BookLevel {
  price: number;
  qty: number;
}

export interface MarketSnapshot {
  step: number;
  bid: number;
  ask: number;
  mid: number;
  spread: number;
  bidDepth: number;
  askDepth: number;
  lastTrade: number;
  bids: BookLevel[];
  asks: BookLevel[];
}

/** (bid+ask)/2 with both sides, else whichever side is quoted, else 0. */
export function deriveMid(bid: number, ask: number): number {
  if (bid > 0 && ask > 0) return (bid + ask) / 2;
  if (bid > 0) return bid;
  if (ask > 0) return ask;
  return 0;
}

export function deriveSpread(bid: number, ask: number): number {
  return bid > 0 && ask > 0 ? ask - bid : 0;
}

export function sumDepth(levels: BookLevel[]): number {
  return levels.reduce((acc, level) => acc + (Number.isFinite(level.qty) && level.qty > 0 ? level.qty : 0), 0);
}
