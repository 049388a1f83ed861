import type { Side } from '../strategy/types';

export interface OutboundOrder {
  order_id: string;
  side: Side;
  price: number;
  qty: number;
}

export interface OutboundCancel {
  action: 'CANCEL';
  order_id: string;
}

export interface OutboundDone {
  action: 'DONE';
}

export type OutboundMessage = OutboundOrder | OutboundCancel | OutboundDone;

/**
 * Outbound half of the order-entry channel. Implementations return false
 * when the message could not be handed to the transport.
 */
export interface OrderGateway {
  send(message: OutboundMessage): boolean;
}

export interface OrderRecord {
  id: string;
  side: Side;
  price: number;
  qty: number;
  submittedStep: number;
  sentAt: number;
}

export type SubmitStatus = 'SENT' | 'DEFERRED' | 'SEND_FAILED';

export interface SubmitResult {
  status: SubmitStatus;
  order: OrderRecord | null;
  crossCancelled: string[];
  capCancelled: string[];
}
