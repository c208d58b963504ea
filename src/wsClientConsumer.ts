import WebSocket from "ws";
import { logger } from "./logger.js";
import type { TradeFeed } from "./tradeFeed.js";
import type { Notification } from "./types.js";

type Fields = Record<string, unknown>;

function isParty(value: unknown): boolean {
  return typeof value === "string" && value.length > 0;
}

function isUnits(value: unknown): boolean {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Checks the payload of each notification kind, not only its tag,
 * so a partial message never reaches the feed's running totals.
 */
function isNotification(value: unknown): value is Notification {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const fields: Fields = Object.fromEntries(Object.entries(value));
  if (typeof fields.seq !== "number" || !Number.isSafeInteger(fields.seq) || fields.seq < 1) return false;

  switch (fields.type) {
    case "match-confirmed":
      return (
        isParty(fields.buyer) &&
        isParty(fields.seller) &&
        isUnits(fields.quantity) &&
        fields.quantity !== 0 &&
        isUnits(fields.price)
      );
    case "payment-sent":
      return isParty(fields.recipient) && isUnits(fields.amount);
    case "payment-received":
      return isParty(fields.payer) && isUnits(fields.amount);
    default:
      return false;
  }
}

/**
 * WebSocket client feeding market notifications into a TradeFeed.
 * Malformed messages are logged and dropped.
 */
export function connectAndConsume(url: string, feed: TradeFeed) {
  const ws = new WebSocket(url);

  ws.on("message", (data) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data.toString());
    } catch (error) {
      logger.warn("Dropping malformed notification", error);
      return;
    }
    if (!isNotification(parsed)) {
      logger.warn("Dropping unknown message");
      return;
    }
    const result = feed.apply(parsed);
    if (!result.applied) {
      logger.debug(`Notification ${parsed.seq} skipped: ${result.reason}`);
    }
  });

  function waitOpen() {
    return new Promise<void>((resolve, reject) => {
      ws.once("open", () => resolve());
      ws.once("error", (e) => reject(e));
    });
  }

  function close() {
    return new Promise<void>((resolve) => {
      if (ws.readyState === WebSocket.CLOSED) {
        resolve();
        return;
      }
      ws.once("close", () => resolve());
      ws.close();
    });
  }

  return {
    ws,
    waitOpen,
    close,
  };
}
