/**
 * Paper exchange venue: constant-product pools settled on the in-memory ledger.
 *
 * Pool reserves are the venue party's own balances, so a settlement is two
 * ordinary ledger transfers: input drawn from the trader through its
 * authorization, output paid from the venue to the destination. All checks
 * run before either transfer.
 */

import type { InMemoryLedger } from "@/adapters/ledger/memory";
import type { AssetId, Clock, PartyId, Route, SettlementOutcome } from "@/domains/swap/types";
import { isSameParty, systemClock } from "@/domains/swap/types";

import { VenueError } from "../errors";
import type { ExchangeVenue, ExecuteAndSettleParams } from "../types";

export const CONSTANT_PRODUCT_VENUE_NAME = "constant-product";

export const BPS_PER_UNIT = 10_000n;

/** Uniswap V2 charges 0.3% on input. */
export const DEFAULT_FEE_BPS = 30n;

export interface ConstantProductVenueConfig {
  ledger: InMemoryLedger;
  /** The venue's own account; holds pool reserves and is the spender to authorize. */
  id: PartyId;
  /** Account whose authorization funds every settlement. */
  trader: PartyId;
  /** Tradable pairs; either direction of a pair is routable. */
  pairs: readonly (readonly [AssetId, AssetId])[];
  feeBps?: bigint;
  clock?: Clock;
}

/**
 * Output of a constant-product swap with the fee taken on input.
 *
 * Rounds down, as settlement must never pay out more than the invariant allows.
 */
export const getAmountOut = (
  amountIn: bigint,
  reserveIn: bigint,
  reserveOut: bigint,
  feeBps: bigint = DEFAULT_FEE_BPS,
): bigint => {
  if (amountIn <= 0n || reserveIn <= 0n || reserveOut <= 0n) {
    return 0n;
  }
  const amountInWithFee = amountIn * (BPS_PER_UNIT - feeBps);
  return (amountInWithFee * reserveOut) / (reserveIn * BPS_PER_UNIT + amountInWithFee);
};

export const createConstantProductVenue = (config: ConstantProductVenueConfig): ExchangeVenue => {
  const { ledger, id, trader, pairs, feeBps = DEFAULT_FEE_BPS, clock = systemClock } = config;
  const venueLedger = ledger.as(id);

  const hasPair = ([assetIn, assetOut]: Route): boolean =>
    pairs.some(
      ([a, b]) =>
        (isSameParty(a, assetIn) && isSameParty(b, assetOut)) ||
        (isSameParty(a, assetOut) && isSameParty(b, assetIn)),
    );

  const priceRoute = (amountIn: bigint, route: Route): bigint => {
    const [assetIn, assetOut] = route;
    const reserveIn = ledger.balanceOf(id, assetIn);
    const reserveOut = ledger.balanceOf(id, assetOut);

    if (!hasPair(route) || reserveIn === 0n || reserveOut === 0n) {
      throw new VenueError(
        `No liquidity for ${assetIn} -> ${assetOut}`,
        "ROUTE_UNAVAILABLE",
        CONSTANT_PRODUCT_VENUE_NAME,
      );
    }
    return getAmountOut(amountIn, reserveIn, reserveOut, feeBps);
  };

  const executeAndSettle = async (params: ExecuteAndSettleParams): Promise<SettlementOutcome> => {
    const { amountIn, minimumAmountOut, route, settlementDestination, expirySec } = params;

    const amountOut = priceRoute(amountIn, route);

    const nowSec = clock();
    if (nowSec > expirySec) {
      throw new VenueError(
        `Deadline ${expirySec} passed at ${nowSec}`,
        "EXPIRED",
        CONSTANT_PRODUCT_VENUE_NAME,
      );
    }

    // A zero-output trade is refused even against a zero bound.
    if (amountOut === 0n || amountOut < minimumAmountOut) {
      throw new VenueError(
        `Output ${amountOut} below minimum ${minimumAmountOut}`,
        "SLIPPAGE_EXCEEDED",
        CONSTANT_PRODUCT_VENUE_NAME,
      );
    }

    const [assetIn, assetOut] = route;
    try {
      await venueLedger.transfer({ from: trader, to: id, asset: assetIn, amount: amountIn });
    } catch (error) {
      throw new VenueError(
        `Could not draw ${amountIn} of ${assetIn} from ${trader}`,
        "UNKNOWN",
        CONSTANT_PRODUCT_VENUE_NAME,
        error,
      );
    }
    await venueLedger.transfer({
      from: id,
      to: settlementDestination,
      asset: assetOut,
      amount: amountOut,
    });

    return { amountOut, settledAtSec: nowSec };
  };

  return {
    name: CONSTANT_PRODUCT_VENUE_NAME,
    id,
    quote: async (amountIn, route) => priceRoute(amountIn, route),
    executeAndSettle,
  };
};
