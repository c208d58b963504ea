import { WebSocketServer, WebSocket } from "ws";
import { logger } from "./logger.js";
import type { Notification } from "./types.js";

/**
 * WebSocket server broadcasting market notifications to every connected client.
 * Broadcasting with no clients is a no-op.
 */
export function startWsServer(port = 0) {
  const wss = new WebSocketServer({ port });

  /**
   * Send one notification to every open client.
   * Returns how many clients it was sent to.
   */
  function broadcast(notification: Notification): number {
    const open = [...wss.clients].filter((client) => client.readyState === WebSocket.OPEN);
    if (open.length === 0) return 0;

    const payload = JSON.stringify(notification);
    open.forEach((client) => client.send(payload));
    logger.debug(`Notification ${notification.seq} (${notification.type}) sent to ${open.length} client(s)`);
    return open.length;
  }

  // bound port; differs from the requested one when started on port 0
  function getPort(): number {
    const bound = wss.address();
    if (!bound || typeof bound === "string") {
      throw new Error("Notification feed is not bound to a TCP port");
    }
    return bound.port;
  }

  function close() {
    return new Promise<void>((resolve, reject) => {
      for (const client of wss.clients) {
        client.terminate();
      }
      wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  wss.on("error", (err) => logger.error("WebSocket server error", err));

  return {
    wss,
    getPort,
    broadcast,
    close,
  };
}

export type WsServer = ReturnType<typeof startWsServer>;
