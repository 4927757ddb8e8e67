/**
 * Signed swap authorizations (EIP-712).
 *
 * A caller proves it asked for a swap by signing the exact amounts, the pair,
 * a nonce and a deadline. The domain binds the signature to one chain and one
 * executing party, so it cannot be replayed against another deployment.
 */

import { type Address, type Hex, verifyTypedData } from "viem";
import * as v from "valibot";

import { amountStringSchema } from "./types";

export const SWAP_AUTHORIZATION_DOMAIN_NAME = "GuardedSwapExecutor";
export const SWAP_AUTHORIZATION_DOMAIN_VERSION = "1";

export const SWAP_AUTHORIZATION_TYPES = {
  Swap: [
    { name: "caller", type: "address" },
    { name: "inputAsset", type: "address" },
    { name: "outputAsset", type: "address" },
    { name: "amountIn", type: "uint256" },
    { name: "minimumAmountOut", type: "uint256" },
    { name: "nonce", type: "uint256" },
    { name: "deadline", type: "uint256" },
  ],
} as const;

export interface SwapAuthorizationDomainParams {
  chainId: number;
  /** The executing party the caller pre-authorizes. */
  executingParty: Address;
}

export const swapAuthorizationDomain = ({
  chainId,
  executingParty,
}: SwapAuthorizationDomainParams) =>
  ({
    name: SWAP_AUTHORIZATION_DOMAIN_NAME,
    version: SWAP_AUTHORIZATION_DOMAIN_VERSION,
    chainId,
    verifyingContract: executingParty,
  }) as const;

export interface SwapAuthorizationMessage {
  caller: Address;
  inputAsset: Address;
  outputAsset: Address;
  amountIn: bigint;
  minimumAmountOut: bigint;
  nonce: bigint;
  /** Unix seconds after which the signature is no longer accepted. */
  deadline: bigint;
}

/** Authorization fields as they travel in a JSON body next to the amounts. */
export const signedAuthorizationSchema = v.object({
  nonce: amountStringSchema,
  deadline: amountStringSchema,
  signature: v.custom<Hex>(
    (input) => typeof input === "string" && /^0x[0-9a-fA-F]{130}$/.test(input),
    "signature must be a 65-byte hex string",
  ),
});

export type SignedAuthorization = v.InferOutput<typeof signedAuthorizationSchema>;

/** True when `signature` over `message` was produced by `message.caller`. */
export const verifySwapAuthorization = (
  domain: SwapAuthorizationDomainParams,
  message: SwapAuthorizationMessage,
  signature: Hex,
): Promise<boolean> =>
  verifyTypedData({
    address: message.caller,
    domain: swapAuthorizationDomain(domain),
    types: SWAP_AUTHORIZATION_TYPES,
    primaryType: "Swap",
    message,
    signature,
  });
