import { http, type Account, type Chain, createPublicClient, createWalletClient } from "viem";
import { privateKeyToAccount } from "viem/accounts";

import type { PublicClient, Transport, WalletClient } from "viem";

/** Wallet client with its signing account and chain bound. */
export type SigningWalletClient = WalletClient<Transport, Chain, Account>;

export const createChainPublicClient = (chain: Chain, rpcUrl: string): PublicClient =>
  createPublicClient({
    chain,
    transport: http(rpcUrl),
    batch: { multicall: true },
  });

export const createChainWalletClient = (
  chain: Chain,
  rpcUrl: string,
  privateKey: `0x${string}`,
): SigningWalletClient =>
  createWalletClient({
    account: privateKeyToAccount(privateKey),
    chain,
    transport: http(rpcUrl),
  });
