import { logger } from "./logger.js";
import type { Notification, NotificationPayload } from "./types.js";

type Listener = (notification: Notification) => void;

/**
 * Append-only notification log with push subscribers.
 *
 * Publishing never fails: a throwing subscriber is logged and skipped,
 * and publishing with no subscribers only appends.
 */
export class NotificationLog {
  private readonly log: Notification[] = [];
  private readonly listeners = new Set<Listener>();

  publish(payload: NotificationPayload): Notification {
    const notification: Notification = { ...payload, seq: this.log.length + 1 };
    this.log.push(notification);

    for (const listener of this.listeners) {
      try {
        listener(notification);
      } catch (error) {
        logger.error(`Notification listener failed for ${notification.type}`, error);
      }
    }
    return notification;
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  entries(): readonly Notification[] {
    return [...this.log];
  }

  /**
   * Notifications with seq strictly greater than the given one, for polling observers.
   */
  since(seq: number): readonly Notification[] {
    return this.log.filter((n) => n.seq > seq);
  }

  get size(): number {
    return this.log.length;
  }
}
