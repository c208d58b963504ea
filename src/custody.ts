import { ValidationError } from "./errors.js";
import type { Party } from "./types.js";

/**
 * In-process value ledger: participant balances plus the market's own custody account.
 *
 * Everything a participant pays to the market lands in custody; settlement
 * releases it to recipients. Nothing is ever refunded automatically.
 */
export class CustodyLedger {
  private readonly balances = new Map<Party, number>();
  private readonly rejecting = new Set<Party>();
  private held = 0;

  balanceOf(party: Party): number {
    return this.balances.get(party) ?? 0;
  }

  custodyBalance(): number {
    return this.held;
  }

  credit(party: Party, amount: number): number {
    assertAmount(amount);
    const next = this.balanceOf(party) + amount;
    this.balances.set(party, next);
    return next;
  }

  /**
   * Move value from a participant into custody.
   */
  deposit(from: Party, amount: number): void {
    assertAmount(amount);
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new ValidationError("INSUFFICIENT_FUNDS", `${from} holds ${balance}, needs ${amount}`, {
        party: from,
        balance,
        amount,
      });
    }
    this.balances.set(from, balance - amount);
    this.held += amount;
  }

  /**
   * Move value out of custody. Returns false instead of throwing when the move is refused.
   * Releasing 0 succeeds and moves nothing.
   */
  release(to: Party, amount: number): boolean {
    if (!Number.isSafeInteger(amount) || amount < 0) return false;
    if (this.rejecting.has(to)) return false;
    if (this.held < amount) return false;

    this.held -= amount;
    this.balances.set(to, this.balanceOf(to) + amount);
    return true;
  }

  // recipients that refuse incoming funds
  setRejecting(party: Party, rejecting: boolean): void {
    if (rejecting) {
      this.rejecting.add(party);
    } else {
      this.rejecting.delete(party);
    }
  }
}

function assertAmount(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount < 0) {
    throw new ValidationError("INVALID_INPUT", `amount must be a non-negative integer, got ${amount}`);
  }
}
