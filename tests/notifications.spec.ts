import { describe, it, expect, vi } from "vitest";
import { NotificationLog } from "../src/notifications.js";
import { TradeFeed } from "../src/tradeFeed.js";

describe("NotificationLog", () => {
  it("appends with increasing seq even with no subscribers", () => {
    const log = new NotificationLog();

    const first = log.publish({ type: "payment-received", payer: "alice", amount: 10 });
    const second = log.publish({ type: "payment-sent", recipient: "bob", amount: 9 });

    expect(first.seq).toBe(1);
    expect(second.seq).toBe(2);
    expect(log.size).toBe(2);
    expect(log.since(1)).toEqual([{ type: "payment-sent", recipient: "bob", amount: 9, seq: 2 }]);
  });

  it("pushes to subscribers until they unsubscribe", () => {
    const log = new NotificationLog();
    const listener = vi.fn();
    const unsubscribe = log.subscribe(listener);

    log.publish({ type: "payment-received", payer: "alice", amount: 10 });
    unsubscribe();
    log.publish({ type: "payment-received", payer: "alice", amount: 20 });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ type: "payment-received", payer: "alice", amount: 10, seq: 1 });
  });

  it("keeps publishing when a subscriber throws", () => {
    const log = new NotificationLog();
    const healthy = vi.fn();
    log.subscribe(() => {
      throw new Error("observer down");
    });
    log.subscribe(healthy);

    expect(() => log.publish({ type: "payment-sent", recipient: "bob", amount: 5 })).not.toThrow();
    expect(healthy).toHaveBeenCalledTimes(1);
    expect(log.size).toBe(1);
  });
});

describe("TradeFeed", () => {
  it("projects matches and payments per party", () => {
    const feed = new TradeFeed();

    feed.apply({ type: "match-confirmed", buyer: "alice", seller: "bob", quantity: 100, price: 40, seq: 1 });
    feed.apply({ type: "payment-received", payer: "alice", amount: 4_001, seq: 2 });
    feed.apply({ type: "payment-sent", recipient: "bob", amount: 4_000, seq: 3 });

    expect(feed.matchCount()).toBe(1);
    expect(feed.activityOf("alice")).toEqual({ bought: 100, sold: 0, paid: 4_001, received: 0 });
    expect(feed.activityOf("bob")).toEqual({ bought: 0, sold: 100, paid: 0, received: 4_000 });
  });

  it("ignores a notification it has already applied", () => {
    const feed = new TradeFeed();
    const notification = { type: "payment-sent", recipient: "bob", amount: 10, seq: 7 } as const;

    expect(feed.apply(notification)).toEqual({ applied: true });
    expect(feed.apply(notification)).toEqual({ applied: false, reason: "duplicate_notification" });
    expect(feed.activityOf("bob").received).toBe(10);
    expect(feed.getSeenSequences()).toEqual(new Set([7]));
  });
});
