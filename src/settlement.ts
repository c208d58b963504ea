import type { CustodyLedger } from "./custody.js";
import { logger } from "./logger.js";
import type { Party } from "./types.js";

/**
 * Moves value to a recipient. Reports failure through the return value and
 * never throws for a refused transfer; callers must check it before committing.
 */
export interface SettlementGateway {
  transfer(to: Party, amount: number): boolean;
}

export class CustodySettlementGateway implements SettlementGateway {
  constructor(private readonly custody: CustodyLedger) {}

  transfer(to: Party, amount: number): boolean {
    let ok: boolean;
    try {
      ok = this.custody.release(to, amount);
    } catch (error) {
      logger.error(`Transfer of ${amount} to ${to} threw`, error);
      return false;
    }

    if (!ok) {
      logger.warn(`Transfer of ${amount} to ${to} refused`);
      return false;
    }
    logger.debug(`Transferred ${amount} to ${to}`);
    return true;
  }
}
