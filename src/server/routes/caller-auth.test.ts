import type { Hex } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { describe, expect, it } from "vitest";

import {
  SWAP_AUTHORIZATION_TYPES,
  type SwapAuthorizationMessage,
  swapAuthorizationDomain,
} from "@/domains/swap/authorization";

import {
  type CallerAuthInput,
  createHeaderAuthenticator,
  createSignatureAuthenticator,
} from "./caller-auth";

const WETH = "0x2000000000000000000000000000000000000002";
const USDC = "0x3000000000000000000000000000000000000003";
const EXECUTOR = "0x4000000000000000000000000000000000000004";
const CHAIN_ID = 31337;
const NOW = 1_700_000_000n;

const alice = privateKeyToAccount(`0x${"11".repeat(32)}`);
const mallory = privateKeyToAccount(`0x${"22".repeat(32)}`);

const sign = (
  account: typeof alice,
  overrides: Partial<SwapAuthorizationMessage> = {},
): Promise<Hex> =>
  account.signTypedData({
    domain: swapAuthorizationDomain({ chainId: CHAIN_ID, executingParty: EXECUTOR }),
    types: SWAP_AUTHORIZATION_TYPES,
    primaryType: "Swap",
    message: {
      caller: alice.address,
      inputAsset: WETH,
      outputAsset: USDC,
      amountIn: 1000n,
      minimumAmountOut: 990n,
      nonce: 7n,
      deadline: NOW + 60n,
      ...overrides,
    },
  });

const input = (signature: Hex, body: Record<string, unknown> = {}): CallerAuthInput => ({
  caller: alice.address,
  amountIn: 1000n,
  minimumAmountOut: 990n,
  body: {
    amountIn: "1000",
    minimumAmountOut: "990",
    nonce: "7",
    deadline: String(NOW + 60n),
    signature,
    ...body,
  },
});

const createAuthenticator = () =>
  createSignatureAuthenticator({
    chainId: CHAIN_ID,
    executingParty: EXECUTOR,
    inputAsset: WETH,
    outputAsset: USDC,
    clock: () => NOW,
  });

describe("createSignatureAuthenticator", () => {
  it("should accept a request signed by the caller", async () => {
    const authenticator = createAuthenticator();

    expect(authenticator.mode).toBe("signature");
    expect(await authenticator.authenticate(input(await sign(alice)))).toEqual({ ok: true });
  });

  it("should require the authorization fields", async () => {
    const authenticator = createAuthenticator();

    const result = await authenticator.authenticate({
      caller: alice.address,
      amountIn: 1000n,
      minimumAmountOut: 990n,
      body: { amountIn: "1000", minimumAmountOut: "990" },
    });

    expect(result).toEqual({
      ok: false,
      message: "Signed authorization required: nonce, deadline and signature",
    });
  });

  it("should reject a caller named by someone else's signature", async () => {
    const authenticator = createAuthenticator();

    const result = await authenticator.authenticate(input(await sign(mallory)));

    expect(result).toEqual({
      ok: false,
      message: "Signature does not match the caller and amounts",
    });
  });

  it("should reject a lower bound than the one the caller signed", async () => {
    const authenticator = createAuthenticator();
    const signature = await sign(alice);

    const result = await authenticator.authenticate({
      ...input(signature, { minimumAmountOut: "0" }),
      minimumAmountOut: 0n,
    });

    expect(result).toEqual({
      ok: false,
      message: "Signature does not match the caller and amounts",
    });
  });

  it("should reject a signature made for another executing party", async () => {
    const authenticator = createSignatureAuthenticator({
      chainId: CHAIN_ID,
      executingParty: "0x9000000000000000000000000000000000000009",
      inputAsset: WETH,
      outputAsset: USDC,
      clock: () => NOW,
    });

    const result = await authenticator.authenticate(input(await sign(alice)));

    expect(result.ok).toBe(false);
  });

  it("should reject a signature that cannot be recovered", async () => {
    const authenticator = createAuthenticator();

    const result = await authenticator.authenticate(input(`0x${"00".repeat(65)}`));

    expect(result).toEqual({
      ok: false,
      message: "Signature does not match the caller and amounts",
    });
  });

  it("should reject a passed deadline", async () => {
    const authenticator = createAuthenticator();
    const deadline = NOW - 1n;

    const result = await authenticator.authenticate(
      input(await sign(alice, { deadline }), { deadline: String(deadline) }),
    );

    expect(result).toEqual({
      ok: false,
      message: `Authorization deadline ${deadline} passed at ${NOW}`,
    });
  });

  it("should reject a deadline further out than the validity window", async () => {
    const authenticator = createAuthenticator();
    const deadline = NOW + 301n;

    const result = await authenticator.authenticate(
      input(await sign(alice, { deadline }), { deadline: String(deadline) }),
    );

    expect(result).toEqual({
      ok: false,
      message: "Authorization deadline must be within 300s",
    });
  });

  it("should accept each nonce once", async () => {
    const authenticator = createAuthenticator();
    const signature = await sign(alice);

    expect(await authenticator.authenticate(input(signature))).toEqual({ ok: true });
    expect(await authenticator.authenticate(input(signature))).toEqual({
      ok: false,
      message: "Authorization nonce 7 already used",
    });
  });
});

describe("createHeaderAuthenticator", () => {
  it("should trust the caller header", async () => {
    const authenticator = createHeaderAuthenticator();

    expect(authenticator.mode).toBe("header");
    expect(
      await authenticator.authenticate({
        caller: alice.address,
        amountIn: 1n,
        minimumAmountOut: 0n,
        body: {},
      }),
    ).toEqual({ ok: true });
  });
});
