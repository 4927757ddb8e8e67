import {
  BaseError,
  ContractFunctionRevertedError,
  HttpRequestError,
  type Address,
  type Log,
  type PublicClient,
  encodeAbiParameters,
  encodeEventTopics,
  erc20Abi,
} from "viem";
import { describe, expect, it, vi } from "vitest";

import type { SigningWalletClient } from "@/lib/chain/client";

import { createUniswapV2Venue, settledAmountFromLogs } from "./uniswap-v2";

const EXECUTOR = "0x4000000000000000000000000000000000000004";
const ALICE: Address = "0x1000000000000000000000000000000000000001";
const ROUTER = "0x5000000000000000000000000000000000000005";
const WETH = "0x2000000000000000000000000000000000000002";
const USDC = "0x3000000000000000000000000000000000000003";
const PAIR = "0x7000000000000000000000000000000000000007";
const TX_HASH = `0x${"cd".repeat(32)}` as const;

const revert = (message: string): BaseError =>
  new BaseError("Contract call failed", {
    cause: new ContractFunctionRevertedError({
      abi: [],
      functionName: "swapExactTokensForTokens",
      message,
    }),
  });

const transferLog = (token: `0x${string}`, to: `0x${string}`, value: bigint): Log => ({
  address: token,
  topics: encodeEventTopics({
    abi: erc20Abi,
    eventName: "Transfer",
    args: { from: PAIR, to },
  }) as Log["topics"],
  data: encodeAbiParameters([{ type: "uint256" }], [value]),
  blockHash: `0x${"00".repeat(32)}`,
  blockNumber: 10n,
  logIndex: 0,
  transactionHash: TX_HASH,
  transactionIndex: 0,
  removed: false,
});

const createClients = (overrides?: {
  readContract?: ReturnType<typeof vi.fn>;
  simulateContract?: ReturnType<typeof vi.fn>;
  logs?: Log[];
}) => {
  const publicClient = {
    readContract: overrides?.readContract ?? vi.fn().mockResolvedValue([1000n, 990n]),
    simulateContract:
      overrides?.simulateContract ??
      vi.fn().mockImplementation(async (params: unknown) => ({
        request: params,
        result: [1000n, 990n],
      })),
    waitForTransactionReceipt: vi.fn().mockResolvedValue({
      status: "success",
      blockNumber: 10n,
      logs: overrides?.logs ?? [],
    }),
    getBlock: vi.fn().mockResolvedValue({ timestamp: 1_700_000_012n }),
  };
  const walletClient = {
    account: { address: EXECUTOR },
    writeContract: vi.fn().mockResolvedValue(TX_HASH),
  };
  const venue = createUniswapV2Venue({
    publicClient: publicClient as unknown as PublicClient,
    walletClient: walletClient as unknown as SigningWalletClient,
    routerAddress: ROUTER,
  });
  return { venue, publicClient, walletClient };
};

const settleParams = {
  amountIn: 1000n,
  minimumAmountOut: 985n,
  route: [WETH, USDC] as const,
  settlementDestination: ALICE,
  expirySec: 1_700_000_000n,
};

describe("createUniswapV2Venue", () => {
  it("should use the router as the spender id", () => {
    expect(createClients().venue.id).toBe(ROUTER);
  });

  it("should quote the last hop of getAmountsOut", async () => {
    const { venue, publicClient } = createClients();

    expect(await venue.quote(1000n, [WETH, USDC])).toBe(990n);
    expect(publicClient.readContract).toHaveBeenCalledWith(
      expect.objectContaining({ functionName: "getAmountsOut", args: [1000n, [WETH, USDC]] }),
    );
  });

  it("should report an unpriced pair as ROUTE_UNAVAILABLE", async () => {
    const { venue } = createClients({
      readContract: vi.fn().mockRejectedValue(revert("execution reverted")),
    });

    await expect(venue.quote(1000n, [WETH, USDC])).rejects.toMatchObject({
      code: "ROUTE_UNAVAILABLE",
    });
  });

  it("should report a failing RPC during quoting as NETWORK_ERROR", async () => {
    const { venue } = createClients({
      readContract: vi.fn().mockRejectedValue(
        new BaseError("Request failed", {
          cause: new HttpRequestError({ url: "http://127.0.0.1:8545", status: 503 }),
        }),
      ),
    });

    await expect(venue.quote(1000n, [WETH, USDC])).rejects.toMatchObject({
      code: "NETWORK_ERROR",
    });
  });

  it("should pass every settlement argument to the router unchanged", async () => {
    const { venue, publicClient } = createClients();

    await venue.executeAndSettle(settleParams);

    expect(publicClient.simulateContract).toHaveBeenCalledWith(
      expect.objectContaining({
        address: ROUTER,
        functionName: "swapExactTokensForTokens",
        args: [1000n, 985n, [WETH, USDC], ALICE, 1_700_000_000n],
      }),
    );
  });

  it("should settle with the simulated output when no transfer log matches", async () => {
    const { venue, walletClient } = createClients();

    const outcome = await venue.executeAndSettle(settleParams);

    expect(walletClient.writeContract).toHaveBeenCalledTimes(1);
    expect(outcome).toEqual({
      amountOut: 990n,
      settledAtSec: 1_700_000_012n,
      reference: TX_HASH,
    });
  });

  it("should settle with the amount actually transferred to the destination", async () => {
    const { venue } = createClients({ logs: [transferLog(USDC, ALICE, 993n)] });

    const outcome = await venue.executeAndSettle(settleParams);

    expect(outcome.amountOut).toBe(993n);
  });

  it("should map router reverts to venue error codes", async () => {
    const cases = [
      ["UniswapV2Router: INSUFFICIENT_OUTPUT_AMOUNT", "SLIPPAGE_EXCEEDED"],
      ["UniswapV2Router: EXPIRED", "EXPIRED"],
      ["UniswapV2Library: INSUFFICIENT_LIQUIDITY", "ROUTE_UNAVAILABLE"],
    ] as const;

    for (const [reason, code] of cases) {
      const { venue, walletClient } = createClients({
        simulateContract: vi.fn().mockRejectedValue(revert(reason)),
      });

      await expect(venue.executeAndSettle(settleParams)).rejects.toMatchObject({ code });
      expect(walletClient.writeContract).not.toHaveBeenCalled();
    }
  });
});

describe("settledAmountFromLogs", () => {
  it("should sum transfers of the asset to the destination only", () => {
    const logs = [
      transferLog(USDC, ALICE, 600n),
      transferLog(USDC, ALICE, 390n),
      transferLog(USDC, EXECUTOR, 5n),
      transferLog(WETH, ALICE, 7n),
    ];

    expect(settledAmountFromLogs(logs, USDC, ALICE)).toBe(990n);
  });

  it("should return null when nothing reached the destination", () => {
    expect(settledAmountFromLogs([], USDC, ALICE)).toBeNull();
  });
});
