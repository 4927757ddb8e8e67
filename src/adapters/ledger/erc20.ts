/**
 * ERC-20 ledger over viem.
 *
 * Acts as the wallet client's account. Writes are simulated first so a
 * revert surfaces with its reason before anything is broadcast, then
 * submitted and awaited to a successful receipt.
 */

import { type Hash, type PublicClient, erc20Abi } from "viem";

import type { AssetId, PartyId } from "@/domains/swap/types";
import { isSameParty } from "@/domains/swap/types";
import type { SigningWalletClient } from "@/lib/chain/client";
import {
  describeError,
  getRevertDetails,
  isTransportError,
  revertMatches,
} from "@/lib/chain/errors";

import { LedgerError, type LedgerErrorCode } from "../errors";
import type { Ledger } from "../types";

export const ERC20_LEDGER_NAME = "erc20";

export interface Erc20LedgerConfig {
  publicClient: PublicClient;
  walletClient: SigningWalletClient;
}

// OpenZeppelin 4.x require messages and 5.x custom error names
const BALANCE_REVERTS = ["exceeds balance", "ERC20InsufficientBalance"] as const;
const ALLOWANCE_REVERTS = [
  "insufficient allowance",
  "ERC20InsufficientAllowance",
  "ERC20InvalidApprover",
] as const;

const classifyError = (error: unknown): LedgerErrorCode => {
  if (isTransportError(error)) return "NETWORK_ERROR";

  const revert = getRevertDetails(error);
  if (revert && revertMatches(revert, BALANCE_REVERTS)) return "INSUFFICIENT_BALANCE";
  if (revert && revertMatches(revert, ALLOWANCE_REVERTS)) return "NOT_AUTHORIZED";
  return "UNKNOWN";
};

const toLedgerError = (action: string, error: unknown): LedgerError =>
  error instanceof LedgerError
    ? error
    : new LedgerError(
        `${action} failed: ${describeError(error)}`,
        classifyError(error),
        ERC20_LEDGER_NAME,
        error,
      );

export const createErc20Ledger = (config: Erc20LedgerConfig): Ledger => {
  const { publicClient, walletClient } = config;
  const account = walletClient.account;
  const self: PartyId = account.address;

  const confirm = async (action: string, hash: Hash): Promise<void> => {
    const receipt = await publicClient.waitForTransactionReceipt({ hash });
    if (receipt.status !== "success") {
      throw new LedgerError(`${action} reverted in ${hash}`, "UNKNOWN", ERC20_LEDGER_NAME);
    }
  };

  const transferOwn = async (to: PartyId, asset: AssetId, amount: bigint): Promise<Hash> => {
    const { request } = await publicClient.simulateContract({
      account,
      address: asset,
      abi: erc20Abi,
      functionName: "transfer",
      args: [to, amount],
    });
    return walletClient.writeContract(request);
  };

  const transferAuthorized = async (
    from: PartyId,
    to: PartyId,
    asset: AssetId,
    amount: bigint,
  ): Promise<Hash> => {
    const { request } = await publicClient.simulateContract({
      account,
      address: asset,
      abi: erc20Abi,
      functionName: "transferFrom",
      args: [from, to, amount],
    });
    return walletClient.writeContract(request);
  };

  return {
    name: ERC20_LEDGER_NAME,
    self,

    transfer: async ({ from, to, asset, amount }) => {
      const action = `transfer ${amount} of ${asset} from ${from} to ${to}`;
      try {
        const hash = isSameParty(from, self)
          ? await transferOwn(to, asset, amount)
          : await transferAuthorized(from, to, asset, amount);
        await confirm(action, hash);
      } catch (error) {
        throw toLedgerError(action, error);
      }
    },

    authorize: async ({ owner, spender, asset, amount }) => {
      if (!isSameParty(owner, self)) {
        throw new LedgerError(
          `${self} cannot grant authorizations owned by ${owner}`,
          "NOT_AUTHORIZED",
          ERC20_LEDGER_NAME,
        );
      }

      const action = `approve ${spender} for ${amount} of ${asset}`;
      try {
        const { request } = await publicClient.simulateContract({
          account,
          address: asset,
          abi: erc20Abi,
          functionName: "approve",
          args: [spender, amount],
        });
        const hash = await walletClient.writeContract(request);
        await confirm(action, hash);
      } catch (error) {
        throw toLedgerError(action, error);
      }
    },

    getAuthorization: async ({ owner, spender, asset }) => {
      try {
        return await publicClient.readContract({
          address: asset,
          abi: erc20Abi,
          functionName: "allowance",
          args: [owner, spender],
        });
      } catch (error) {
        throw toLedgerError(`read allowance of ${spender} from ${owner}`, error);
      }
    },

    getBalance: async (party, asset) => {
      try {
        return await publicClient.readContract({
          address: asset,
          abi: erc20Abi,
          functionName: "balanceOf",
          args: [party],
        });
      } catch (error) {
        throw toLedgerError(`read balance of ${party}`, error);
      }
    },
  };
};
