export type Party = string;

export type OrderSide = "buy" | "sell";

export interface Order {
  id: number;
  side: OrderSide;
  buyer: Party | null;   // null until a sell order is matched
  seller: Party | null;  // null until a buy order is matched
  quantity: number;
  price: number;
  matched: boolean;
  executed: boolean;
  matchedOrderId: number | null;
}

/**
 * Read-only projection of an order, as exposed to callers outside the book.
 */
export interface OrderView {
  buyer: Party | null;
  seller: Party | null;
  quantity: number;
  price: number;
  executed: boolean;
}

export interface Installation {
  id: number;
  owner: Party;
  capacity: number;
  installed: boolean;
}

export interface MatchConfirmed {
  type: "match-confirmed";
  buyer: Party;
  seller: Party;
  quantity: number;
  price: number;
}

export interface PaymentSent {
  type: "payment-sent";
  recipient: Party;
  amount: number;
}

export interface PaymentReceived {
  type: "payment-received";
  payer: Party;
  amount: number;
}

export type NotificationPayload = MatchConfirmed | PaymentSent | PaymentReceived;

/**
 * Notification as stored in the log and sent over the wire.
 * seq is the dedup key for consumers.
 */
export type Notification = NotificationPayload & { seq: number };
