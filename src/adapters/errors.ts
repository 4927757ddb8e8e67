/**
 * Ledger and venue adapter error types.
 *
 * Adapters raise these; the execution core translates them into swap errors.
 */

export type LedgerErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "NOT_AUTHORIZED"
  | "INVALID_AMOUNT"
  | "NETWORK_ERROR"
  | "UNKNOWN";

export class LedgerError extends Error {
  public override readonly name = "LedgerError";

  constructor(
    message: string,
    public readonly code: LedgerErrorCode,
    public readonly ledger: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export type VenueErrorCode =
  | "SLIPPAGE_EXCEEDED"
  | "EXPIRED"
  | "ROUTE_UNAVAILABLE"
  | "NETWORK_ERROR"
  | "UNKNOWN";

export class VenueError extends Error {
  public override readonly name = "VenueError";

  constructor(
    message: string,
    public readonly code: VenueErrorCode,
    public readonly venue: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export const isLedgerError = (value: unknown): value is LedgerError =>
  value instanceof LedgerError;

export const isVenueError = (value: unknown): value is VenueError => value instanceof VenueError;
