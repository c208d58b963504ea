import { getConfig } from "./config.js";
import { logger } from "./logger.js";
import { createMarket } from "./market.js";
import { createServer } from "./server.js";
import { startWsServer } from "./wsServer.js";

export { createMarket, type Market, type MarketOptions } from "./market.js";
export { OrderBook, settlementAmount } from "./orderBook.js";
export { InstallationRegistry } from "./installations.js";
export { CustodyLedger } from "./custody.js";
export { CustodySettlementGateway, type SettlementGateway } from "./settlement.js";
export { NotificationLog } from "./notifications.js";
export { TradeFeed } from "./tradeFeed.js";
export { MarketError, ValidationError, StateConflictError, TransferError } from "./errors.js";
export type * from "./types.js";

/**
 * Start the HTTP API and the notification feed for one market session.
 */
export async function start() {
  const config = getConfig();
  const market = createMarket({ installationUnitRate: config.installationUnitRate });

  const ws = startWsServer(config.wsPort);
  const unsubscribe = market.notifications.subscribe(ws.broadcast);

  const server = createServer(market);
  await new Promise<void>((resolve) => server.listen(config.port, config.host, resolve));

  logger.info(`HTTP API listening on ${config.host}:${config.port}`);
  logger.info(`Notification feed on port ${ws.getPort()}`);

  async function stop() {
    unsubscribe();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await ws.close();
  }

  return { market, server, ws, stop };
}
