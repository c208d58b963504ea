import { getConfig } from "./config.js";
import { CustodyLedger } from "./custody.js";
import { InstallationRegistry } from "./installations.js";
import { NotificationLog } from "./notifications.js";
import { OrderBook } from "./orderBook.js";
import { CustodySettlementGateway, type SettlementGateway } from "./settlement.js";

export interface MarketOptions {
  installationUnitRate?: number;
  custody?: CustodyLedger;
  // defaults to a gateway paying out of the market's custody
  gateway?: SettlementGateway;
}

export interface Market {
  custody: CustodyLedger;
  gateway: SettlementGateway;
  notifications: NotificationLog;
  orders: OrderBook;
  installations: InstallationRegistry;
}

/**
 * Build an independent market session. Nothing is shared between two markets.
 */
export function createMarket(options: MarketOptions = {}): Market {
  const custody = options.custody ?? new CustodyLedger();
  const gateway = options.gateway ?? new CustodySettlementGateway(custody);
  const notifications = new NotificationLog();
  const unitRate = options.installationUnitRate ?? getConfig().installationUnitRate;

  return {
    custody,
    gateway,
    notifications,
    orders: new OrderBook({ custody, gateway, notifications }),
    installations: new InstallationRegistry(custody, unitRate),
  };
}
