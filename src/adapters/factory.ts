/**
 * Builds the ledger and venue a swapper runs against.
 */

import type { PublicClient } from "viem";

import type { Clock, PartyId } from "@/domains/swap/types";
import { createChainPublicClient, createChainWalletClient } from "@/lib/chain/client";
import { resolveChain } from "@/lib/chain/constants";

import type { AdapterConfig } from "./config";
import { createErc20Ledger } from "./ledger/erc20";
import { type InMemoryLedger, createInMemoryLedger } from "./ledger/memory";
import type { ExchangeVenue, Ledger } from "./types";
import { createConstantProductVenue } from "./venue/constant-product";
import { createUniswapV2Venue } from "./venue/uniswap-v2";

/** Custody account of the paper executing party. */
export const PAPER_EXECUTING_PARTY: PartyId = "0x0000000000000000000000000000000000001001";

/** Paper venue account; holds the pool reserves. */
export const PAPER_VENUE: PartyId = "0x0000000000000000000000000000000000002002";

interface AdapterPair {
  /** Ledger acting as the executing party. */
  ledger: Ledger;
  venue: ExchangeVenue;
  executingParty: PartyId;
}

export interface PaperAdapters extends AdapterPair {
  mode: "paper";
  /** The whole in-memory book, for funding callers. */
  book: InMemoryLedger;
}

export interface OnchainAdapters extends AdapterPair {
  mode: "onchain";
  chainId: number;
  publicClient: PublicClient;
}

export type SwapAdapters = PaperAdapters | OnchainAdapters;

export interface SwapAdapterDeps {
  clock?: Clock;
}

export const createSwapAdapters = (
  config: AdapterConfig,
  deps: SwapAdapterDeps = {},
): SwapAdapters => {
  switch (config.mode) {
    case "paper": {
      const book = createInMemoryLedger();
      book.mint(PAPER_VENUE, config.inputAsset, config.reserveIn);
      book.mint(PAPER_VENUE, config.outputAsset, config.reserveOut);

      return {
        mode: "paper",
        book,
        ledger: book.as(PAPER_EXECUTING_PARTY),
        executingParty: PAPER_EXECUTING_PARTY,
        venue: createConstantProductVenue({
          ledger: book,
          id: PAPER_VENUE,
          trader: PAPER_EXECUTING_PARTY,
          pairs: [[config.inputAsset, config.outputAsset]],
          feeBps: config.feeBps,
          ...(deps.clock && { clock: deps.clock }),
        }),
      };
    }
    case "onchain": {
      const chain = resolveChain(config.chainId, config.rpcUrl);
      const publicClient = createChainPublicClient(chain, config.rpcUrl);
      const walletClient = createChainWalletClient(chain, config.rpcUrl, config.privateKey);

      return {
        mode: "onchain",
        chainId: config.chainId,
        publicClient,
        ledger: createErc20Ledger({ publicClient, walletClient }),
        executingParty: walletClient.account.address,
        venue: createUniswapV2Venue({
          publicClient,
          walletClient,
          routerAddress: config.routerAddress,
        }),
      };
    }
  }
};
