import type { Notification, Party } from "./types.js";

export interface ApplyResult {
  applied: boolean;
  reason?: "duplicate_notification" | "unsupported_notification";
}

export interface PartyActivity {
  bought: number;  // units matched as buyer
  sold: number;    // units matched as seller
  paid: number;    // value sent into custody
  received: number; // value received from settlement
}

/**
 * TradeFeed: read-side projection of market notifications.
 *
 * Consumers may see the same notification twice (reconnects, replays);
 * seq is the idempotency key, so each one is counted at most once.
 */
export class TradeFeed {
  private readonly seen = new Set<number>();
  private readonly activity = new Map<Party, PartyActivity>();
  private matches = 0;

  apply(notification: Notification): ApplyResult {
    if (this.seen.has(notification.seq)) {
      return { applied: false, reason: "duplicate_notification" };
    }

    switch (notification.type) {
      case "match-confirmed":
        this.entry(notification.buyer).bought += notification.quantity;
        this.entry(notification.seller).sold += notification.quantity;
        this.matches += 1;
        break;
      case "payment-received":
        this.entry(notification.payer).paid += notification.amount;
        break;
      case "payment-sent":
        this.entry(notification.recipient).received += notification.amount;
        break;
      default:
        return { applied: false, reason: "unsupported_notification" };
    }

    this.seen.add(notification.seq);
    return { applied: true };
  }

  activityOf(party: Party): PartyActivity {
    return { ...this.entry(party) };
  }

  matchCount(): number {
    return this.matches;
  }

  getSeenSequences(): Set<number> {
    return new Set(this.seen);
  }

  private entry(party: Party): PartyActivity {
    let current = this.activity.get(party);
    if (!current) {
      current = { bought: 0, sold: 0, paid: 0, received: 0 };
      this.activity.set(party, current);
    }
    return current;
  }
}
