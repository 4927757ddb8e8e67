/**
 * Per-invocation swap lifecycle: PENDING -> SETTLED | ABORTED.
 *
 * Both outcomes are terminal and mutually exclusive. No intermediate step of
 * the execution is represented, since none is observable from outside.
 */

import * as v from "valibot";

import type { SwapErrorCode } from "./errors";
import type { SettlementOutcome, SwapRequest } from "./types";

export type SwapStatus = "PENDING" | "SETTLED" | "ABORTED";

export type TransitionResult<T> =
  | { ok: true; state: T; from: SwapStatus; to: SwapStatus }
  | { ok: false; error: string };

export const SWAP_TRANSITIONS: Record<SwapStatus, SwapStatus[]> = {
  PENDING: ["SETTLED", "ABORTED"],
  SETTLED: [], // Terminal state
  ABORTED: [], // Terminal state
};

export const SWAP_TERMINAL_STATES: readonly SwapStatus[] = ["SETTLED", "ABORTED"] as const;

export type SwapEvent =
  | { type: "SETTLE"; outcome: SettlementOutcome }
  | { type: "ABORT"; code: SwapErrorCode; message: string };

export interface SwapExecution {
  request: SwapRequest;
  status: SwapStatus;
  outcome: SettlementOutcome | null;
  errorCode: SwapErrorCode | null;
  errorMessage: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export const isTerminalSwapStatus = (status: SwapStatus): boolean =>
  SWAP_TERMINAL_STATES.includes(status);

const eventToStatus = (event: SwapEvent): SwapStatus =>
  event.type === "SETTLE" ? "SETTLED" : "ABORTED";

export const transitionSwap = (
  execution: SwapExecution,
  event: SwapEvent,
): TransitionResult<SwapExecution> => {
  if (isTerminalSwapStatus(execution.status)) {
    return {
      ok: false,
      error: `Cannot transition from terminal state: ${execution.status}`,
    };
  }

  const targetStatus = eventToStatus(event);
  if (!SWAP_TRANSITIONS[execution.status].includes(targetStatus)) {
    return {
      ok: false,
      error: `Invalid transition: ${execution.status} -> ${targetStatus}`,
    };
  }

  const updatedAt = new Date();
  const state: SwapExecution =
    event.type === "SETTLE"
      ? { ...execution, status: targetStatus, outcome: event.outcome, updatedAt }
      : {
          ...execution,
          status: targetStatus,
          errorCode: event.code,
          errorMessage: event.message,
          updatedAt,
        };

  return { ok: true, state, from: execution.status, to: targetStatus };
};

export const createSwapExecution = (request: SwapRequest): SwapExecution => {
  const now = new Date();
  return {
    request,
    status: "PENDING",
    outcome: null,
    errorCode: null,
    errorMessage: null,
    createdAt: now,
    updatedAt: now,
  };
};

export const swapStatusSchema = v.picklist(["PENDING", "SETTLED", "ABORTED"] as const);

export const isSwapStatus = (value: unknown): value is SwapStatus =>
  v.is(swapStatusSchema, value);
