/**
 * Swap request construction and route building.
 */

import { randomUUID } from "node:crypto";

import * as v from "valibot";

import { InvalidSwapRequestError } from "./errors";
import {
  type Clock,
  type Route,
  type SwapRequest,
  isSameParty,
  swapRequestSchema,
  systemClock,
} from "./types";

export interface SwapRequestInput {
  caller: string;
  inputAsset: string;
  outputAsset: string;
  amountIn: bigint;
  minimumAmountOut: bigint;
}

export interface SwapRequestDeps {
  clock?: Clock;
  generateId?: () => string;
}

/**
 * Validate caller arguments and freeze them into a SwapRequest.
 *
 * `minimumAmountOut` is copied as given. Zero is a legal (if unprotected)
 * bound, so it is accepted, never substituted.
 */
export const createSwapRequest = (
  input: SwapRequestInput,
  deps: SwapRequestDeps = {},
): SwapRequest => {
  const { clock = systemClock, generateId = randomUUID } = deps;

  const parsed = v.safeParse(swapRequestSchema, {
    ...input,
    id: generateId(),
    submittedAtSec: clock(),
  });

  if (!parsed.success) {
    const issues = parsed.issues.map((issue) => {
      const path = issue.path?.map((item) => String(item.key)).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new InvalidSwapRequestError(`Invalid swap request: ${issues.join("; ")}`, issues);
  }

  const request = parsed.output;
  if (isSameParty(request.inputAsset, request.outputAsset)) {
    throw new InvalidSwapRequestError("Input and output asset must differ", [
      "outputAsset: must differ from inputAsset",
    ]);
  }

  return Object.freeze(request);
};

/** Direct hop from the request's input asset to its output asset. */
export const buildRoute = (request: Pick<SwapRequest, "inputAsset" | "outputAsset">): Route =>
  Object.freeze([request.inputAsset, request.outputAsset] as const);
