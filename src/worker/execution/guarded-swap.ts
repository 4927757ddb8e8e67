/**
 * Guarded execution of one swap request.
 *
 * Execution flow, all of it inside one compensating envelope:
 * 1. Refuse up front when the deadline has already passed or the venue
 *    breaker is open (nothing has moved yet)
 * 2. Custody intake (transfer in, authorize venue)
 * 3. Settle at the venue with the caller's bound and the deadline
 * 4. Re-check the reported output against the caller's bound
 *
 * SAFETY INVARIANTS:
 * - `minimumAmountOut` reaches the venue exactly as the caller gave it
 * - proceeds go to the caller, never to the executing party
 * - any failure after intake reverts intake before it surfaces
 */

import { isVenueError } from "@/adapters/errors";
import type { ExecuteAndSettleParams } from "@/adapters/types";
import {
  ExpiredError,
  RouteUnavailableError,
  SlippageExceededError,
  type SwapError,
  VenueUnavailableError,
  isSwapError,
} from "@/domains/swap/errors";
import { computeExpirySec, isExpired } from "@/domains/swap/expiry";
import { buildRoute } from "@/domains/swap/request";
import type { SettlementOutcome, SwapRequest, SwapResult } from "@/domains/swap/types";
import { CircuitOpenError } from "@/lib/circuit-breaker";

import { runAtomically } from "./compensation";
import { acquire } from "./custody-intake";
import type { ExecutionDeps } from "./types";

const toSwapError = (error: unknown, params: ExecuteAndSettleParams, venueName: string): SwapError => {
  if (isSwapError(error)) return error;

  if (error instanceof CircuitOpenError) {
    return new VenueUnavailableError(`Venue ${venueName} is unavailable: ${error.message}`, error);
  }

  if (isVenueError(error)) {
    switch (error.code) {
      case "SLIPPAGE_EXCEEDED":
        return new SlippageExceededError(params.minimumAmountOut, undefined, error);
      case "EXPIRED":
        return new ExpiredError(params.expirySec, undefined, error);
      case "ROUTE_UNAVAILABLE":
        return new RouteUnavailableError(params.route, error);
      case "NETWORK_ERROR":
      case "UNKNOWN":
        return new VenueUnavailableError(`Venue ${venueName} failed: ${error.message}`, error);
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  return new VenueUnavailableError(`Venue ${venueName} failed: ${message}`, error);
};

/**
 * Execute `request` all-or-nothing.
 *
 * Resolves with the settlement once the caller holds the proceeds. Rejects
 * with a SwapError after every intake effect has been undone, or with
 * RollbackFailedError when undoing itself failed.
 */
export const execute = async (request: SwapRequest, deps: ExecutionDeps): Promise<SwapResult> => {
  const { ledger, venue, circuitBreaker, clock, logger, config } = deps;

  const settleParams: ExecuteAndSettleParams = {
    amountIn: request.amountIn,
    minimumAmountOut: request.minimumAmountOut,
    route: buildRoute(request),
    settlementDestination: request.caller,
    expirySec: computeExpirySec(request.submittedAtSec, config.expiryToleranceSec),
  };

  const nowSec = clock();
  if (isExpired(settleParams.expirySec, nowSec)) {
    throw new ExpiredError(settleParams.expirySec, nowSec);
  }

  if (circuitBreaker.isOpen()) {
    throw new VenueUnavailableError(`Venue ${venue.name} circuit breaker is open`);
  }

  const outcome = await runAtomically(async (scope): Promise<SettlementOutcome> => {
    await acquire(
      { caller: request.caller, inputAsset: request.inputAsset, amountIn: request.amountIn },
      scope,
      { ledger, venue, logger },
    );

    logger.info("Settling at venue", {
      venue: venue.name,
      amountIn: settleParams.amountIn,
      minimumAmountOut: settleParams.minimumAmountOut.toString(),
      expirySec: settleParams.expirySec,
    });

    let settled: SettlementOutcome;
    try {
      settled = await circuitBreaker.execute(() => venue.executeAndSettle(settleParams));
    } catch (error) {
      throw toSwapError(error, settleParams, venue.name);
    }

    if (settled.amountOut < request.minimumAmountOut) {
      throw new SlippageExceededError(request.minimumAmountOut, settled.amountOut);
    }
    return settled;
  }, logger);

  return { status: "SETTLED", request, outcome };
};
