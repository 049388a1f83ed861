import type { Side } from '../strategy/types';

export interface Fill {
  orderId: string;
  side: Side;
  price: number;
  qty: number;
}

export interface PositionSnapshot {
  inventory: number;
  cashFlow: number;
  pnl: number;
  ordersSent: number;
  lastMid: number;
}

export interface IPositionManager {
  applyFill(fill: Fill): PositionSnapshot;
  markToMarket(mid: number): void;
  recordOrderSent(): number;
  getInventory(): number;
  getOrdersSent(): number;
  snapshot(): PositionSnapshot;
}
