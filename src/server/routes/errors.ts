import type { SwapErrorCode } from "@/domains/swap/errors";
import { isSwapError } from "@/domains/swap/errors";

export type ErrorStatus = 400 | 401 | 404 | 409 | 410 | 422 | 500 | 503;

export const SWAP_ERROR_STATUS: Record<SwapErrorCode, ErrorStatus> = {
  INVALID_REQUEST: 400,
  SLIPPAGE_EXCEEDED: 409,
  EXPIRED: 410,
  TRANSFER_DENIED: 422,
  AUTHORIZATION_DENIED: 422,
  ROUTE_UNAVAILABLE: 422,
  VENUE_UNAVAILABLE: 503,
  ROLLBACK_FAILED: 500,
};

export interface ErrorBody {
  error: { code: string; message: string };
}

export const errorBody = (code: string, message: string): ErrorBody => ({
  error: { code, message },
});

/** HTTP status and body for an error thrown while handling a swap. */
export const describeFailure = (error: unknown): { status: ErrorStatus; body: ErrorBody } => {
  if (isSwapError(error)) {
    return { status: SWAP_ERROR_STATUS[error.code], body: errorBody(error.code, error.message) };
  }
  return { status: 500, body: errorBody("INTERNAL", "Internal server error") };
};
