/**
 * Swap failure taxonomy.
 *
 * Every failure is terminal for its invocation: nothing is retried and no
 * path continues with a weaker bound.
 */

import type { Route } from "./types";

export const SWAP_ERROR_CODES = [
  "INVALID_REQUEST",
  "TRANSFER_DENIED",
  "AUTHORIZATION_DENIED",
  "SLIPPAGE_EXCEEDED",
  "EXPIRED",
  "ROUTE_UNAVAILABLE",
  "VENUE_UNAVAILABLE",
  "ROLLBACK_FAILED",
] as const;

export type SwapErrorCode = (typeof SWAP_ERROR_CODES)[number];

export const isSwapErrorCode = (value: unknown): value is SwapErrorCode =>
  SWAP_ERROR_CODES.some((code) => code === value);

export class SwapError extends Error {
  public readonly code: SwapErrorCode;

  constructor(message: string, code: SwapErrorCode, cause?: unknown) {
    super(message, { cause });
    this.name = "SwapError";
    this.code = code;
  }
}

export class InvalidSwapRequestError extends SwapError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message, "INVALID_REQUEST");
    this.name = "InvalidSwapRequestError";
  }
}

/**
 * The ledger refused to move the caller's funds into custody
 * (insufficient balance or missing pre-authorization).
 */
export class TransferDeniedError extends SwapError {
  constructor(message: string, cause?: unknown) {
    super(message, "TRANSFER_DENIED", cause);
    this.name = "TransferDeniedError";
  }
}

export class AuthorizationDeniedError extends SwapError {
  constructor(message: string, cause?: unknown) {
    super(message, "AUTHORIZATION_DENIED", cause);
    this.name = "AuthorizationDeniedError";
  }
}

export class SlippageExceededError extends SwapError {
  constructor(
    public readonly minimumAmountOut: bigint,
    public readonly amountOut?: bigint,
    cause?: unknown,
  ) {
    super(
      amountOut === undefined
        ? `Settlement would fall below minimum output ${minimumAmountOut}`
        : `Settlement output ${amountOut} is below minimum output ${minimumAmountOut}`,
      "SLIPPAGE_EXCEEDED",
      cause,
    );
    this.name = "SlippageExceededError";
  }
}

export class ExpiredError extends SwapError {
  constructor(
    public readonly expirySec: bigint,
    public readonly nowSec?: bigint,
    cause?: unknown,
  ) {
    super(
      nowSec === undefined
        ? `Swap expired at ${expirySec}`
        : `Swap expired at ${expirySec}, now ${nowSec}`,
      "EXPIRED",
      cause,
    );
    this.name = "ExpiredError";
  }
}

export class RouteUnavailableError extends SwapError {
  constructor(
    public readonly route: Route,
    cause?: unknown,
  ) {
    super(`No venue price for route ${route[0]} -> ${route[1]}`, "ROUTE_UNAVAILABLE", cause);
    this.name = "RouteUnavailableError";
  }
}

export class VenueUnavailableError extends SwapError {
  constructor(message: string, cause?: unknown) {
    super(message, "VENUE_UNAVAILABLE", cause);
    this.name = "VenueUnavailableError";
  }
}

/**
 * A compensation step failed while reverting an aborted swap. Balances may
 * differ from the before-state; `failure` is the error that caused the abort.
 */
export class RollbackFailedError extends SwapError {
  constructor(
    public readonly failure: unknown,
    public readonly rollbackErrors: readonly { step: string; error: unknown }[],
  ) {
    super(
      `Rollback failed at ${rollbackErrors.map((item) => item.step).join(", ")}`,
      "ROLLBACK_FAILED",
      failure,
    );
    this.name = "RollbackFailedError";
  }
}

export const isSwapError = (value: unknown): value is SwapError => value instanceof SwapError;
