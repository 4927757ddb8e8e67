/**
 * Swap domain exports.
 */

export type {
  AssetId,
  Clock,
  PartyId,
  Route,
  SettlementOutcome,
  SwapRequest,
  SwapResult,
} from "./types";

export {
  MAX_AMOUNT,
  addressSchema,
  amountStringSchema,
  bigintSchema,
  isSameParty,
  isSettlementOutcome,
  isSwapRequest,
  positiveAmountSchema,
  settlementOutcomeSchema,
  swapRequestSchema,
  systemClock,
  unsignedAmountSchema,
} from "./types";

export {
  AuthorizationDeniedError,
  ExpiredError,
  InvalidSwapRequestError,
  RollbackFailedError,
  SWAP_ERROR_CODES,
  RouteUnavailableError,
  SlippageExceededError,
  SwapError,
  TransferDeniedError,
  VenueUnavailableError,
  isSwapError,
  isSwapErrorCode,
} from "./errors";
export type { SwapErrorCode } from "./errors";

export { buildRoute, createSwapRequest } from "./request";
export type { SwapRequestDeps, SwapRequestInput } from "./request";

export { computeExpirySec, isExpired } from "./expiry";

export {
  SWAP_TERMINAL_STATES,
  SWAP_TRANSITIONS,
  createSwapExecution,
  isSwapStatus,
  isTerminalSwapStatus,
  swapStatusSchema,
  transitionSwap,
} from "./state";
export type { SwapEvent, SwapExecution, SwapStatus, TransitionResult } from "./state";

export {
  SWAP_AUTHORIZATION_TYPES,
  signedAuthorizationSchema,
  swapAuthorizationDomain,
  verifySwapAuthorization,
} from "./authorization";
export type {
  SignedAuthorization,
  SwapAuthorizationDomainParams,
  SwapAuthorizationMessage,
} from "./authorization";
