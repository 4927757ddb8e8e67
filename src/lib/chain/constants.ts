import { type Chain, defineChain } from "viem";
import { arbitrum, base, foundry, mainnet, sepolia } from "viem/chains";

export const DEFAULT_BLOCK_STALE_THRESHOLD_SEC = 60n;

export const KNOWN_CHAINS: readonly Chain[] = [mainnet, arbitrum, base, sepolia, foundry];

/**
 * Look up a chain by id, defining a minimal one for ids viem does not ship.
 */
export const resolveChain = (chainId: number, rpcUrl: string): Chain =>
  KNOWN_CHAINS.find((chain) => chain.id === chainId) ??
  defineChain({
    id: chainId,
    name: `chain-${chainId}`,
    nativeCurrency: { name: "Ether", symbol: "ETH", decimals: 18 },
    rpcUrls: { default: { http: [rpcUrl] } },
  });
