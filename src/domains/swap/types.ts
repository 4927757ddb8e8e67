/**
 * Swap domain types and schemas.
 *
 * Amounts are unsigned integers in the asset's smallest unit (`bigint`).
 * Times are unix seconds (`*Sec`, `bigint`), the unit venues compare deadlines in.
 */

import { type Address, getAddress, isAddress, maxUint256 } from "viem";
import * as v from "valibot";

// --- Identifiers ---

/** Asset contract address, checksummed. */
export type AssetId = Address;

/** Account address of a participant (caller, executing party, venue), checksummed. */
export type PartyId = Address;

export const bigintSchema = v.custom<bigint>(
  (input) => typeof input === "bigint",
  "Expected bigint",
);

const AMOUNT_OVERFLOW_MESSAGE = "Amount must fit in 256 bits";

/** Amounts are `uint256` wherever they reach a token or router contract. */
export const MAX_AMOUNT = maxUint256;

export const unsignedAmountSchema = v.pipe(
  bigintSchema,
  v.check((value) => value >= 0n, "Amount must not be negative"),
  v.check((value) => value <= MAX_AMOUNT, AMOUNT_OVERFLOW_MESSAGE),
);

export const positiveAmountSchema = v.pipe(
  bigintSchema,
  v.check((value) => value > 0n, "Amount must be positive"),
  v.check((value) => value <= MAX_AMOUNT, AMOUNT_OVERFLOW_MESSAGE),
);

/** Accepts any-case hex addresses and normalises them to checksum form. */
export const addressSchema = v.pipe(
  v.string(),
  v.check((value) => isAddress(value, { strict: false }), "Invalid address"),
  v.transform((value): Address => getAddress(value)),
);

/** Decimal integer string, as amounts travel over JSON. */
export const amountStringSchema = v.pipe(
  v.string(),
  v.regex(/^\d+$/, "Amount must be a decimal integer string"),
  v.transform<string, bigint>(BigInt),
  v.check((value) => value <= MAX_AMOUNT, AMOUNT_OVERFLOW_MESSAGE),
);

export const isSameParty = (a: PartyId | AssetId, b: PartyId | AssetId): boolean =>
  a.toLowerCase() === b.toLowerCase();

// --- Route ---

/** Direct two-asset hop: `[inputAsset, outputAsset]`. */
export type Route = readonly [AssetId, AssetId];

// --- Swap Request ---

/**
 * One invocation's immutable input.
 *
 * `minimumAmountOut` is exactly what the caller asked for; nothing downstream
 * may replace it.
 */
export interface SwapRequest {
  readonly id: string;
  readonly inputAsset: AssetId;
  readonly outputAsset: AssetId;
  readonly amountIn: bigint;
  readonly minimumAmountOut: bigint;
  readonly caller: PartyId;
  /** When the invocation was accepted; the origin of its expiry bound. */
  readonly submittedAtSec: bigint;
}

export const swapRequestSchema = v.object({
  id: v.pipe(v.string(), v.minLength(1)),
  inputAsset: addressSchema,
  outputAsset: addressSchema,
  amountIn: positiveAmountSchema,
  minimumAmountOut: unsignedAmountSchema,
  caller: addressSchema,
  submittedAtSec: unsignedAmountSchema,
});

// --- Settlement ---

/** What the venue reports after a successful settlement. */
export interface SettlementOutcome {
  amountOut: bigint;
  settledAtSec: bigint;
  /** Venue-side settlement id (transaction hash on chain). */
  reference?: string;
}

export const settlementOutcomeSchema = v.object({
  amountOut: unsignedAmountSchema,
  settledAtSec: unsignedAmountSchema,
  reference: v.optional(v.string()),
});

// --- Swap Result ---

export interface SwapResult {
  status: "SETTLED";
  request: SwapRequest;
  outcome: SettlementOutcome;
}

// --- Clock ---

/** Returns the current unix time in seconds. */
export type Clock = () => bigint;

export const systemClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));

// --- Type Guards ---

export const isSwapRequest = (value: unknown): value is SwapRequest =>
  v.is(swapRequestSchema, value);

export const isSettlementOutcome = (value: unknown): value is SettlementOutcome =>
  v.is(settlementOutcomeSchema, value);
