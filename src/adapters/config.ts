/**
 * Ledger and venue adapter configuration.
 *
 * `paper` runs constant-product pools on an in-memory ledger; `onchain`
 * talks ERC-20 and a Uniswap V2 router through viem.
 */

import type { Hex } from "viem";
import * as v from "valibot";

import { addressSchema, bigintSchema, positiveAmountSchema } from "@/domains/swap/types";
import type { AppConfig } from "@/lib/config";

const privateKeySchema = v.custom<Hex>(
  (input) => typeof input === "string" && /^0x[0-9a-fA-F]{64}$/.test(input),
  "Expected a 32-byte hex private key",
);

const feeBpsSchema = v.pipe(
  bigintSchema,
  v.check((value) => value >= 0n && value <= 10_000n, "Fee must be between 0 and 10000 bps"),
);

export const AdapterConfigSchema = v.variant("mode", [
  v.object({
    mode: v.literal("paper"),
    inputAsset: addressSchema,
    outputAsset: addressSchema,
    reserveIn: positiveAmountSchema,
    reserveOut: positiveAmountSchema,
    feeBps: feeBpsSchema,
  }),
  v.object({
    mode: v.literal("onchain"),
    rpcUrl: v.pipe(v.string(), v.url()),
    chainId: v.pipe(v.number(), v.integer(), v.minValue(1)),
    privateKey: privateKeySchema,
    routerAddress: addressSchema,
  }),
]);

export type AdapterConfig = v.InferOutput<typeof AdapterConfigSchema>;

export const parseAdapterConfig = (config: unknown): AdapterConfig =>
  v.parse(AdapterConfigSchema, config);

export const isAdapterConfig = (value: unknown): value is AdapterConfig =>
  v.is(AdapterConfigSchema, value);

export const adapterConfigFromAppConfig = ({ swap, venue }: AppConfig): AdapterConfig =>
  parseAdapterConfig(
    venue.mode === "paper"
      ? {
          mode: "paper",
          inputAsset: swap.inputAsset,
          outputAsset: swap.outputAsset,
          reserveIn: venue.paper.reserveIn,
          reserveOut: venue.paper.reserveOut,
          feeBps: venue.paper.feeBps,
        }
      : {
          mode: "onchain",
          rpcUrl: venue.rpcUrl,
          chainId: venue.chainId,
          privateKey: venue.privateKey,
          routerAddress: venue.routerAddress,
        },
  );
