import type { CustodyLedger } from "./custody.js";
import { ValidationError } from "./errors.js";
import { logger } from "./logger.js";
import type { Installation, Party } from "./types.js";

/**
 * Registry of generation installations. Independent of matching and settlement.
 */
export class InstallationRegistry {
  private readonly installations: Installation[] = [];

  constructor(
    private readonly custody: CustodyLedger,
    private readonly unitRate: number,
  ) {}

  /**
   * Register capacity for an owner. The upfront payment must cover
   * capacity x unit rate and is moved into custody.
   */
  register(owner: Party, capacity: number, payment: number): number {
    if (owner.length === 0) {
      throw new ValidationError("INVALID_INPUT", "owner is required");
    }
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new ValidationError("INVALID_INPUT", `capacity must be a positive integer, got ${capacity}`);
    }
    const minimum = capacity * this.unitRate;
    if (!Number.isSafeInteger(payment) || payment < minimum) {
      throw new ValidationError("INSUFFICIENT_PAYMENT", `Installation of ${capacity} requires ${minimum}`, {
        payment,
        minimum,
      });
    }

    this.custody.deposit(owner, payment);

    const id = this.installations.length;
    this.installations.push({ id, owner, capacity, installed: true });
    logger.market(`Installation ${id} registered: ${capacity} for ${owner}`);
    return id;
  }

  get(installationId: number): Installation {
    const installation = Number.isInteger(installationId) ? this.installations[installationId] : undefined;
    if (!installation || !installation.installed) {
      throw new ValidationError("NOT_INSTALLED", `Installation ${installationId} is not installed`);
    }
    return { ...installation };
  }

  count(): number {
    return this.installations.length;
  }
}
