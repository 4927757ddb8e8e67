/**
 * Uniswap V2 router venue over viem.
 *
 * Settlement is one `swapExactTokensForTokens` call. The router enforces
 * `amountOutMin` and `deadline` inside the same transaction that moves the
 * funds, so the bound holds against whatever the pool state is when the
 * transaction is mined.
 */

import { type Address, type Log, type PublicClient, erc20Abi, parseEventLogs } from "viem";

import type { AssetId, PartyId, Route, SettlementOutcome } from "@/domains/swap/types";
import { isSameParty } from "@/domains/swap/types";
import type { SigningWalletClient } from "@/lib/chain/client";
import {
  describeError,
  getRevertDetails,
  isTransportError,
  revertMatches,
} from "@/lib/chain/errors";

import { VenueError, type VenueErrorCode } from "../errors";
import type { ExchangeVenue, ExecuteAndSettleParams } from "../types";
import { UNISWAP_V2_ROUTER_ABI } from "./abi";

export const UNISWAP_V2_VENUE_NAME = "uniswap-v2";

export interface UniswapV2VenueConfig {
  publicClient: PublicClient;
  walletClient: SigningWalletClient;
  routerAddress: Address;
}

const SLIPPAGE_REVERTS = ["INSUFFICIENT_OUTPUT_AMOUNT"] as const;
const EXPIRED_REVERTS = ["EXPIRED"] as const;
const ROUTE_REVERTS = ["INSUFFICIENT_LIQUIDITY", "INVALID_PATH"] as const;

const classifyError = (error: unknown): VenueErrorCode => {
  if (isTransportError(error)) return "NETWORK_ERROR";

  const revert = getRevertDetails(error);
  if (!revert) return "UNKNOWN";
  if (revertMatches(revert, SLIPPAGE_REVERTS)) return "SLIPPAGE_EXCEEDED";
  if (revertMatches(revert, EXPIRED_REVERTS)) return "EXPIRED";
  if (revertMatches(revert, ROUTE_REVERTS)) return "ROUTE_UNAVAILABLE";
  return "UNKNOWN";
};

const toVenueError = (action: string, error: unknown, fallback?: VenueErrorCode): VenueError => {
  if (error instanceof VenueError) return error;
  const code = classifyError(error);
  return new VenueError(
    `${action} failed: ${describeError(error)}`,
    code === "UNKNOWN" && fallback ? fallback : code,
    UNISWAP_V2_VENUE_NAME,
    error,
  );
};

const lastAmount = (amounts: readonly bigint[]): bigint => {
  const amount = amounts[amounts.length - 1];
  if (amount === undefined) {
    throw new VenueError("Router returned no amounts", "UNKNOWN", UNISWAP_V2_VENUE_NAME);
  }
  return amount;
};

/**
 * Sum of `asset` Transfer events paying `destination` in a receipt's logs.
 *
 * This is what actually settled, which can exceed the simulated amount when
 * the pool moved in the caller's favour before the transaction was mined.
 */
export const settledAmountFromLogs = (
  logs: readonly Log[],
  asset: AssetId,
  destination: PartyId,
): bigint | null => {
  const transfers = parseEventLogs({
    abi: erc20Abi,
    eventName: "Transfer",
    logs: [...logs],
    strict: true,
  }).filter((log) => isSameParty(log.address, asset) && isSameParty(log.args.to, destination));

  if (transfers.length === 0) return null;
  return transfers.reduce((total, log) => total + log.args.value, 0n);
};

export const createUniswapV2Venue = (config: UniswapV2VenueConfig): ExchangeVenue => {
  const { publicClient, walletClient, routerAddress } = config;
  const account = walletClient.account;

  // A pair that does not exist makes getAmountsOut revert without a reason,
  // so every quote failure other than transport means the route is unpriced.
  const quote = async (amountIn: bigint, route: Route): Promise<bigint> => {
    try {
      const amounts = await publicClient.readContract({
        address: routerAddress,
        abi: UNISWAP_V2_ROUTER_ABI,
        functionName: "getAmountsOut",
        args: [amountIn, [...route]],
      });
      return lastAmount(amounts);
    } catch (error) {
      throw toVenueError(
        `quote ${route[0]} -> ${route[1]}`,
        error,
        isTransportError(error) ? undefined : "ROUTE_UNAVAILABLE",
      );
    }
  };

  const executeAndSettle = async (params: ExecuteAndSettleParams): Promise<SettlementOutcome> => {
    const { amountIn, minimumAmountOut, route, settlementDestination, expirySec } = params;

    await quote(amountIn, route);

    const action = `swap ${amountIn} ${route[0]} -> ${route[1]}`;
    try {
      const { request, result } = await publicClient.simulateContract({
        account,
        address: routerAddress,
        abi: UNISWAP_V2_ROUTER_ABI,
        functionName: "swapExactTokensForTokens",
        args: [amountIn, minimumAmountOut, [...route], settlementDestination, expirySec],
      });

      const hash = await walletClient.writeContract(request);
      const receipt = await publicClient.waitForTransactionReceipt({ hash });
      if (receipt.status !== "success") {
        throw new VenueError(`${action} reverted in ${hash}`, "UNKNOWN", UNISWAP_V2_VENUE_NAME);
      }

      const block = await publicClient.getBlock({ blockNumber: receipt.blockNumber });
      const settled = settledAmountFromLogs(receipt.logs, route[1], settlementDestination);
      return {
        amountOut: settled ?? lastAmount(result),
        settledAtSec: block.timestamp,
        reference: hash,
      };
    } catch (error) {
      throw toVenueError(action, error);
    }
  };

  return {
    name: UNISWAP_V2_VENUE_NAME,
    id: routerAddress,
    quote,
    executeAndSettle,
  };
};
