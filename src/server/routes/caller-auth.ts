/**
 * Proof that the `x-caller` named on a swap request asked for it.
 *
 * `signature` mode requires an EIP-712 swap authorization signed by the
 * caller over the exact amounts. `header` mode trusts the header and is only
 * accepted against the paper venue.
 */

import * as v from "valibot";

import {
  type SwapAuthorizationDomainParams,
  signedAuthorizationSchema,
  verifySwapAuthorization,
} from "@/domains/swap/authorization";
import { type AssetId, type Clock, type PartyId, systemClock } from "@/domains/swap/types";

export type CallerAuthMode = "signature" | "header";

export interface CallerAuthInput {
  caller: PartyId;
  amountIn: bigint;
  minimumAmountOut: bigint;
  /** The raw request body, which carries the authorization fields. */
  body: unknown;
}

export type CallerAuthResult = { ok: true } | { ok: false; message: string };

export interface CallerAuthenticator {
  readonly mode: CallerAuthMode;
  authenticate: (input: CallerAuthInput) => Promise<CallerAuthResult>;
}

export const DEFAULT_MAX_AUTHORIZATION_VALIDITY_SEC = 300n;

export interface SignatureAuthenticatorConfig extends SwapAuthorizationDomainParams {
  inputAsset: AssetId;
  outputAsset: AssetId;
  clock?: Clock;
  /** How far ahead a deadline may lie; bounds the remembered nonces. */
  maxValiditySec?: bigint;
}

const reject = (message: string): CallerAuthResult => ({ ok: false, message });

export const createHeaderAuthenticator = (): CallerAuthenticator => ({
  mode: "header",
  authenticate: async () => ({ ok: true }),
});

export const createSignatureAuthenticator = (
  config: SignatureAuthenticatorConfig,
): CallerAuthenticator => {
  const {
    chainId,
    executingParty,
    inputAsset,
    outputAsset,
    clock = systemClock,
    maxValiditySec = DEFAULT_MAX_AUTHORIZATION_VALIDITY_SEC,
  } = config;

  // `${caller}:${nonce}` -> deadline; entries past their deadline are dropped.
  const usedNonces = new Map<string, bigint>();

  const forgetExpired = (nowSec: bigint): void => {
    for (const [key, deadline] of usedNonces) {
      if (deadline < nowSec) usedNonces.delete(key);
    }
  };

  const authenticate = async (input: CallerAuthInput): Promise<CallerAuthResult> => {
    const parsed = v.safeParse(signedAuthorizationSchema, input.body);
    if (!parsed.success) {
      return reject("Signed authorization required: nonce, deadline and signature");
    }

    const { nonce, deadline, signature } = parsed.output;
    const nowSec = clock();
    if (deadline < nowSec) {
      return reject(`Authorization deadline ${deadline} passed at ${nowSec}`);
    }
    if (deadline > nowSec + maxValiditySec) {
      return reject(`Authorization deadline must be within ${maxValiditySec}s`);
    }

    const signedByCaller = await verifySwapAuthorization(
      { chainId, executingParty },
      {
        caller: input.caller,
        inputAsset,
        outputAsset,
        amountIn: input.amountIn,
        minimumAmountOut: input.minimumAmountOut,
        nonce,
        deadline,
      },
      signature,
    ).catch(() => false);
    if (!signedByCaller) {
      return reject("Signature does not match the caller and amounts");
    }

    forgetExpired(nowSec);
    const key = `${input.caller.toLowerCase()}:${nonce}`;
    if (usedNonces.has(key)) {
      return reject(`Authorization nonce ${nonce} already used`);
    }
    usedNonces.set(key, deadline);
    return { ok: true };
  };

  return { mode: "signature", authenticate };
};
