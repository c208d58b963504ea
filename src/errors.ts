/**
 * Error classes for the market core.
 *
 * Every error is raised before any order state changes, except TransferError,
 * which leaves the caller's payment in custody.
 */

export type ValidationCode =
  | "INVALID_INPUT"
  | "INVALID_REFERENCE"
  | "NOT_A_BUY_ORDER"
  | "NOT_AUTHORIZED"
  | "INSUFFICIENT_PAYMENT"
  | "INSUFFICIENT_FUNDS"
  | "NOT_INSTALLED";

export type StateConflictCode = "NOT_MATCHED" | "ALREADY_MATCHED" | "ALREADY_EXECUTED";

export type MarketErrorCode = ValidationCode | StateConflictCode | "TRANSFER_FAILED";

export class MarketError extends Error {
  constructor(
    public readonly code: MarketErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "MarketError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Bad reference, wrong caller or not enough value. The caller can retry with corrected input.
 */
export class ValidationError extends MarketError {
  constructor(code: ValidationCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "ValidationError";
  }
}

/**
 * The caller's view of the order lifecycle is stale.
 */
export class StateConflictError extends MarketError {
  constructor(code: StateConflictCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "StateConflictError";
  }
}

/**
 * The settlement transfer was refused after validation passed.
 * Order state is unchanged; the payment already taken stays in custody.
 */
export class TransferError extends MarketError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("TRANSFER_FAILED", message, details);
    this.name = "TransferError";
  }
}
