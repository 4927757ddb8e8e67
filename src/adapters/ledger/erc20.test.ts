import { BaseError, ContractFunctionRevertedError, HttpRequestError, type PublicClient } from "viem";
import { describe, expect, it, vi } from "vitest";

import type { SigningWalletClient } from "@/lib/chain/client";

import { LedgerError } from "../errors";
import { createErc20Ledger } from "./erc20";

const EXECUTOR = "0x4000000000000000000000000000000000000004";
const ALICE = "0x1000000000000000000000000000000000000001";
const ROUTER = "0x5000000000000000000000000000000000000005";
const WETH = "0x2000000000000000000000000000000000000002";
const TX_HASH = `0x${"ab".repeat(32)}`;

const revert = (functionName: string, message: string): BaseError =>
  new BaseError("Contract call failed", {
    cause: new ContractFunctionRevertedError({ abi: [], functionName, message }),
  });

const createClients = (overrides?: {
  simulateContract?: ReturnType<typeof vi.fn>;
  receiptStatus?: "success" | "reverted";
  readContract?: ReturnType<typeof vi.fn>;
}) => {
  const publicClient = {
    simulateContract:
      overrides?.simulateContract ??
      vi.fn().mockImplementation(async (params: unknown) => ({ request: params, result: true })),
    waitForTransactionReceipt: vi
      .fn()
      .mockResolvedValue({ status: overrides?.receiptStatus ?? "success" }),
    readContract: overrides?.readContract ?? vi.fn().mockResolvedValue(0n),
  };
  const walletClient = {
    account: { address: EXECUTOR },
    writeContract: vi.fn().mockResolvedValue(TX_HASH),
  };
  const ledger = createErc20Ledger({
    publicClient: publicClient as unknown as PublicClient,
    walletClient: walletClient as unknown as SigningWalletClient,
  });
  return { ledger, publicClient, walletClient };
};

describe("createErc20Ledger", () => {
  it("should act as the wallet account", () => {
    const { ledger } = createClients();
    expect(ledger.self).toBe(EXECUTOR);
  });

  it("should pull another party's funds with transferFrom", async () => {
    const { ledger, publicClient, walletClient } = createClients();

    await ledger.transfer({ from: ALICE, to: EXECUTOR, asset: WETH, amount: 1000n });

    expect(publicClient.simulateContract).toHaveBeenCalledWith(
      expect.objectContaining({
        address: WETH,
        functionName: "transferFrom",
        args: [ALICE, EXECUTOR, 1000n],
      }),
    );
    expect(walletClient.writeContract).toHaveBeenCalledTimes(1);
    expect(publicClient.waitForTransactionReceipt).toHaveBeenCalledWith({ hash: TX_HASH });
  });

  it("should move its own funds with transfer", async () => {
    const { ledger, publicClient } = createClients();

    await ledger.transfer({ from: EXECUTOR, to: ALICE, asset: WETH, amount: 5n });

    expect(publicClient.simulateContract).toHaveBeenCalledWith(
      expect.objectContaining({ functionName: "transfer", args: [ALICE, 5n] }),
    );
  });

  it("should approve the spender for the exact amount", async () => {
    const { ledger, publicClient } = createClients();

    await ledger.authorize({ owner: EXECUTOR, spender: ROUTER, asset: WETH, amount: 1000n });

    expect(publicClient.simulateContract).toHaveBeenCalledWith(
      expect.objectContaining({ functionName: "approve", args: [ROUTER, 1000n] }),
    );
  });

  it("should refuse to approve on behalf of another owner without touching the chain", async () => {
    const { ledger, publicClient } = createClients();

    await expect(
      ledger.authorize({ owner: ALICE, spender: ROUTER, asset: WETH, amount: 1n }),
    ).rejects.toMatchObject({ code: "NOT_AUTHORIZED" });
    expect(publicClient.simulateContract).not.toHaveBeenCalled();
  });

  it("should classify an allowance revert as NOT_AUTHORIZED and broadcast nothing", async () => {
    const { ledger, walletClient } = createClients({
      simulateContract: vi
        .fn()
        .mockRejectedValue(revert("transferFrom", "ERC20: insufficient allowance")),
    });

    await expect(
      ledger.transfer({ from: ALICE, to: EXECUTOR, asset: WETH, amount: 1000n }),
    ).rejects.toMatchObject({ code: "NOT_AUTHORIZED", ledger: "erc20" });
    expect(walletClient.writeContract).not.toHaveBeenCalled();
  });

  it("should classify a balance revert as INSUFFICIENT_BALANCE", async () => {
    const { ledger } = createClients({
      simulateContract: vi
        .fn()
        .mockRejectedValue(revert("transferFrom", "ERC20: transfer amount exceeds balance")),
    });

    await expect(
      ledger.transfer({ from: ALICE, to: EXECUTOR, asset: WETH, amount: 1000n }),
    ).rejects.toMatchObject({ code: "INSUFFICIENT_BALANCE" });
  });

  it("should classify transport failures as NETWORK_ERROR", async () => {
    const { ledger } = createClients({
      simulateContract: vi.fn().mockRejectedValue(
        new BaseError("Request failed", {
          cause: new HttpRequestError({ url: "http://127.0.0.1:8545", status: 502 }),
        }),
      ),
    });

    await expect(
      ledger.authorize({ owner: EXECUTOR, spender: ROUTER, asset: WETH, amount: 1n }),
    ).rejects.toMatchObject({ code: "NETWORK_ERROR" });
  });

  it("should fail when the mined transaction reverted", async () => {
    const { ledger } = createClients({ receiptStatus: "reverted" });

    await expect(
      ledger.transfer({ from: ALICE, to: EXECUTOR, asset: WETH, amount: 1n }),
    ).rejects.toBeInstanceOf(LedgerError);
  });

  it("should read allowance and balance", async () => {
    const readContract = vi.fn().mockResolvedValueOnce(700n).mockResolvedValueOnce(42n);
    const { ledger } = createClients({ readContract });

    expect(await ledger.getAuthorization({ owner: EXECUTOR, spender: ROUTER, asset: WETH })).toBe(
      700n,
    );
    expect(await ledger.getBalance(ALICE, WETH)).toBe(42n);
    expect(readContract).toHaveBeenNthCalledWith(
      1,
      expect.objectContaining({ functionName: "allowance", args: [EXECUTOR, ROUTER] }),
    );
    expect(readContract).toHaveBeenNthCalledWith(
      2,
      expect.objectContaining({ functionName: "balanceOf", args: [ALICE] }),
    );
  });
});
