import { decimalFromNumber, decimalToNumber, mulDecimal } from '../utils/decimal';
import type { Decimal } from '../utils/decimal';
import type { Fill, IPositionManager, PositionSnapshot } from './types';

/**
 * Inventory and cash ledger. Only confirmed fills move inventory or cash;
 * the mark price only feeds the mark-to-market pnl.
 */
export class PositionManager implements IPositionManager {
  private inventory = 0;
  private cashFlow: Decimal = 0n;
  private ordersSent = 0;
  private lastMid = 0;

  applyFill(fill: Fill): PositionSnapshot {
    const qty = Math.trunc(fill.qty);
    if (!Number.isFinite(fill.price) || qty <= 0) return this.snapshot();

    const notional = mulDecimal(decimalFromNumber(fill.price), decimalFromNumber(qty));
    if (fill.side === 'BUY') {
      this.inventory += qty;
      this.cashFlow -= notional;
    } else {
      this.inventory -= qty;
      this.cashFlow += notional;
    }
    return this.snapshot();
  }

  markToMarket(mid: number): void {
    if (Number.isFinite(mid) && mid > 0) {
      this.lastMid = mid;
    }
  }

  recordOrderSent(): number {
    this.ordersSent += 1;
    return this.ordersSent;
  }

  getInventory(): number {
    return this.inventory;
  }

  getOrdersSent(): number {
    return this.ordersSent;
  }

  snapshot(): PositionSnapshot {
    const cashFlow = decimalToNumber(this.cashFlow);
    return {
      inventory: this.inventory,
      cashFlow,
      pnl: cashFlow + this.inventory * this.lastMid,
      ordersSent: this.ordersSent,
      lastMid: this.lastMid,
    };
  }
}
