import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

const integerString = (label: string) =>
  v.pipe(v.string(), v.regex(/^\d+$/, `${label} must be a non-negative integer`));

export const addressString = v.pipe(
  v.string(),
  v.regex(/^0x[0-9a-fA-F]{40}$/, "Expected a 20-byte hex address"),
);

export const envSchema = v.pipe(
  v.object({
    // Server
    PORT: v.pipe(v.string(), v.transform(Number), v.number(), v.minValue(1), v.maxValue(65535)),
    NODE_ENV: v.picklist(["development", "production", "test"]),

    // Logging
    LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),

    // Journal (in-memory when unset)
    DATABASE_URL: v.optional(v.pipe(v.string(), v.minLength(1))),

    // Swap binding
    VENUE_MODE: v.optional(v.picklist(["paper", "onchain"]), "paper"),
    SWAP_AUTH: v.optional(v.picklist(["signature", "header"]), "signature"),
    SWAP_AUTH_MAX_VALIDITY_SEC: v.optional(
      v.pipe(integerString("SWAP_AUTH_MAX_VALIDITY_SEC"), v.transform<string, bigint>(BigInt)),
      "300",
    ),
    INPUT_ASSET: addressString,
    OUTPUT_ASSET: addressString,
    EXPIRY_TOLERANCE_SEC: v.optional(
      v.pipe(integerString("EXPIRY_TOLERANCE_SEC"), v.transform<string, bigint>(BigInt)),
      "0",
    ),

    // On-chain venue
    RPC_URL: v.optional(v.pipe(v.string(), v.url())),
    CHAIN_ID: v.optional(
      v.pipe(integerString("CHAIN_ID"), v.transform(Number), v.minValue(1)),
      "1",
    ),
    EXECUTOR_PRIVATE_KEY: v.optional(
      v.pipe(v.string(), v.regex(/^0x[0-9a-fA-F]{64}$/, "Expected a 32-byte hex private key")),
    ),
    ROUTER_ADDRESS: v.optional(addressString),

    // Paper venue
    PAPER_RESERVE_IN: v.optional(
      v.pipe(integerString("PAPER_RESERVE_IN"), v.transform<string, bigint>(BigInt)),
      "1000000000",
    ),
    PAPER_RESERVE_OUT: v.optional(
      v.pipe(integerString("PAPER_RESERVE_OUT"), v.transform<string, bigint>(BigInt)),
      "1000000000",
    ),
    PAPER_FEE_BPS: v.optional(
      v.pipe(integerString("PAPER_FEE_BPS"), v.transform<string, bigint>(BigInt), v.maxValue(10_000n)),
      "30",
    ),
  }),
  v.check(
    (env) =>
      env.VENUE_MODE !== "onchain" ||
      (env.RPC_URL !== undefined &&
        env.EXECUTOR_PRIVATE_KEY !== undefined &&
        env.ROUTER_ADDRESS !== undefined),
    "RPC_URL, EXECUTOR_PRIVATE_KEY and ROUTER_ADDRESS are required when VENUE_MODE=onchain",
  ),
  v.check(
    (env) => env.SWAP_AUTH !== "header" || env.VENUE_MODE === "paper",
    "SWAP_AUTH=header is only allowed with VENUE_MODE=paper",
  ),
  v.check(
    (env) => env.INPUT_ASSET.toLowerCase() !== env.OUTPUT_ASSET.toLowerCase(),
    "INPUT_ASSET and OUTPUT_ASSET must differ",
  ),
);

export type Env = v.InferOutput<typeof envSchema>;
