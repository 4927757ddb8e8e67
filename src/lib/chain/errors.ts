/**
 * Revert and transport error inspection for contract calls.
 */

import {
  BaseError,
  ContractFunctionRevertedError,
  HttpRequestError,
  TimeoutError,
  WebSocketRequestError,
} from "viem";

export interface RevertDetails {
  /** `require` message, e.g. "UniswapV2Router: EXPIRED". */
  reason?: string;
  /** Custom error name, e.g. "ERC20InsufficientBalance". */
  errorName?: string;
}

/**
 * Extract the revert reason or custom error from a failed contract call.
 *
 * Returns `null` when the error is not a contract revert.
 */
export const getRevertDetails = (error: unknown): RevertDetails | null => {
  if (!(error instanceof BaseError)) return null;

  const reverted = error.walk((cause) => cause instanceof ContractFunctionRevertedError);
  if (!(reverted instanceof ContractFunctionRevertedError)) return null;

  return {
    ...(reverted.reason !== undefined && { reason: reverted.reason }),
    ...(reverted.data?.errorName !== undefined && { errorName: reverted.data.errorName }),
  };
};

/** True when the call never reached a node or the node did not answer. */
export const isTransportError = (error: unknown): boolean => {
  if (!(error instanceof BaseError)) return false;
  const transport = error.walk(
    (cause) =>
      cause instanceof HttpRequestError ||
      cause instanceof WebSocketRequestError ||
      cause instanceof TimeoutError,
  );
  return transport !== null;
};

/** Case-insensitive match of any needle against the revert reason or error name. */
export const revertMatches = (details: RevertDetails, needles: readonly string[]): boolean => {
  const haystack = `${details.reason ?? ""} ${details.errorName ?? ""}`.toLowerCase();
  return needles.some((needle) => haystack.includes(needle.toLowerCase()));
};

export const describeError = (error: unknown): string => {
  if (error instanceof BaseError) return error.shortMessage;
  return error instanceof Error ? error.message : String(error);
};
