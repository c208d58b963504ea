import type { CustodyLedger } from "./custody.js";
import { StateConflictError, TransferError, ValidationError } from "./errors.js";
import { logger } from "./logger.js";
import type { NotificationLog } from "./notifications.js";
import type { SettlementGateway } from "./settlement.js";
import type { Order, OrderSide, OrderView, Party } from "./types.js";

export interface OrderBookDeps {
  custody: CustodyLedger;
  gateway: SettlementGateway;
  notifications: NotificationLog;
}

/**
 * OrderBook: the single authority over orders and their lifecycle.
 *
 * Orders live in an append-only arena indexed by id; ids are never reused and
 * orders are never removed. Linked orders point at each other by id.
 *
 * Lifecycle per order: Placed -> Matched -> Executed, with no way back.
 * Two linked orders are always executed together.
 *
 * Every operation is synchronous and validates before it mutates, so a thrown
 * error leaves the book exactly as it was.
 */
export class OrderBook {
  private readonly orders: Order[] = [];

  constructor(private readonly deps: OrderBookDeps) {}

  place(side: OrderSide, quantity: number, price: number, initiator: Party): number {
    if (side !== "buy" && side !== "sell") {
      throw new ValidationError("INVALID_INPUT", `side must be "buy" or "sell"`);
    }
    if (!Number.isSafeInteger(quantity) || quantity <= 0) {
      throw new ValidationError("INVALID_INPUT", `quantity must be a positive integer, got ${quantity}`);
    }
    if (!Number.isSafeInteger(price) || price < 0) {
      throw new ValidationError("INVALID_INPUT", `price must be a non-negative integer, got ${price}`);
    }
    if (initiator.length === 0) {
      throw new ValidationError("INVALID_INPUT", "initiator is required");
    }

    const id = this.orders.length;
    this.orders.push({
      id,
      side,
      buyer: side === "buy" ? initiator : null,
      seller: side === "sell" ? initiator : null,
      quantity,
      price,
      matched: false,
      executed: false,
      matchedOrderId: null,
    });

    logger.market(`Order ${id} placed: ${side} ${quantity} @ ${price} by ${initiator}`);
    return id;
  }

  /**
   * First-fit match for a buy order.
   *
   * Takes the lowest-id unmatched sell order with the same quantity and a price
   * at or below the bid. The buy order adopts the sell price as settlement price.
   * Returns the matched sell order id, or null when nothing fits (not an error).
   */
  match(buyOrderId: number): number | null {
    const buy = this.require(buyOrderId);

    if (buy.side !== "buy") {
      throw new ValidationError("NOT_A_BUY_ORDER", `Order ${buyOrderId} is a sell order`);
    }
    if (buy.executed) {
      throw new StateConflictError("ALREADY_EXECUTED", `Order ${buyOrderId} is already executed`);
    }
    if (buy.matched || buy.seller !== null) {
      throw new StateConflictError("ALREADY_MATCHED", `Order ${buyOrderId} is already matched`);
    }

    const sell = this.orders.find(
      (o) =>
        o.side === "sell" &&
        !o.matched &&
        o.buyer === null &&
        o.quantity === buy.quantity &&
        o.price <= buy.price,
    );
    const buyer = buy.buyer;
    const seller = sell?.seller ?? null;
    if (!sell || seller === null || buyer === null) {
      logger.debug(`No sell order fits buy order ${buyOrderId}`);
      return null;
    }

    buy.seller = seller;
    buy.matchedOrderId = sell.id;
    buy.matched = true;
    buy.price = sell.price;

    sell.buyer = buyer;
    sell.matchedOrderId = buy.id;
    sell.matched = true;

    logger.market(`Order ${buy.id} matched with ${sell.id} at ${sell.price}`);
    this.deps.notifications.publish({
      type: "match-confirmed",
      buyer,
      seller,
      quantity: buy.quantity,
      price: buy.price,
    });
    return sell.id;
  }

  /**
   * Settle a matched order: take the caller's payment into custody, pay the
   * seller quantity x price, then mark both linked orders executed.
   *
   * Known gaps, kept on purpose because settlement semantics depend on them:
   * the payment stays in custody when the transfer fails, and anything above
   * the settlement amount is never refunded.
   *
   * payment-received and payment-sent are published together, only once the
   * transfer succeeds. A deposit stranded by a failed transfer is reported
   * through the TransferError details and the log, never as a notification.
   */
  execute(orderId: number, payment: number, caller: Party): void {
    const order = this.require(orderId);

    if (!order.matched || order.matchedOrderId === null) {
      throw new StateConflictError("NOT_MATCHED", `Order ${orderId} is not matched`);
    }
    if (order.executed) {
      throw new StateConflictError("ALREADY_EXECUTED", `Order ${orderId} is already executed`);
    }
    if (order.buyer === null || caller !== order.buyer) {
      throw new ValidationError("NOT_AUTHORIZED", `Only the buyer may execute order ${orderId}`, { caller });
    }

    const amount = settlementAmount(order);
    if (!Number.isSafeInteger(payment) || payment <= amount) {
      throw new ValidationError("INSUFFICIENT_PAYMENT", `Payment must exceed ${amount}`, { payment, amount });
    }

    const counterpart = this.require(order.matchedOrderId);
    const seller = order.seller;
    if (seller === null) {
      throw new StateConflictError("NOT_MATCHED", `Order ${orderId} has no seller`);
    }

    this.deps.custody.deposit(caller, payment);

    if (!this.deps.gateway.transfer(seller, amount)) {
      logger.warn(`Settlement of order ${orderId} failed; payment of ${payment} from ${caller} stays in custody`);
      throw new TransferError(`Transfer of ${amount} to ${seller} failed`, {
        orderId,
        amount,
        payment,
        stranded: payment,
      });
    }

    order.executed = true;
    counterpart.executed = true;

    logger.warn(`Order ${orderId}: excess of ${payment - amount} retained in custody`);
    logger.success(`Order ${orderId} and ${counterpart.id} executed, ${amount} paid to ${seller}`);
    this.deps.notifications.publish({ type: "payment-received", payer: caller, amount: payment });
    this.deps.notifications.publish({ type: "payment-sent", recipient: seller, amount });
  }

  count(): number {
    return this.orders.length;
  }

  get(orderId: number): Order {
    return { ...this.require(orderId) };
  }

  view(orderId: number): OrderView {
    const { buyer, seller, quantity, price, executed } = this.require(orderId);
    return { buyer, seller, quantity, price, executed };
  }

  private require(orderId: number): Order {
    const order = Number.isInteger(orderId) ? this.orders[orderId] : undefined;
    if (!order) {
      throw new ValidationError("INVALID_REFERENCE", `Order ${orderId} does not exist`);
    }
    return order;
  }
}

export function settlementAmount(order: Pick<Order, "quantity" | "price">): number {
  return order.quantity * order.price;
}
