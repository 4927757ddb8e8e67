/**
 * Ledger and venue adapters.
 */

export type {
  AuthorizationKey,
  AuthorizeParams,
  ExchangeVenue,
  ExecuteAndSettleParams,
  Ledger,
  TransferParams,
} from "./types";

export { LedgerError, VenueError, isLedgerError, isVenueError } from "./errors";
export type { LedgerErrorCode, VenueErrorCode } from "./errors";

export {
  AdapterConfigSchema,
  adapterConfigFromAppConfig,
  isAdapterConfig,
  parseAdapterConfig,
} from "./config";
export type { AdapterConfig } from "./config";

export { PAPER_EXECUTING_PARTY, PAPER_VENUE, createSwapAdapters } from "./factory";
export type { OnchainAdapters, PaperAdapters, SwapAdapterDeps, SwapAdapters } from "./factory";

export {
  IN_MEMORY_LEDGER_NAME,
  UNLIMITED_AUTHORIZATION,
  createInMemoryLedger,
} from "./ledger/memory";
export type { InMemoryLedger, LedgerSnapshot } from "./ledger/memory";
export { ERC20_LEDGER_NAME, createErc20Ledger } from "./ledger/erc20";
export type { Erc20LedgerConfig } from "./ledger/erc20";

export {
  CONSTANT_PRODUCT_VENUE_NAME,
  DEFAULT_FEE_BPS,
  createConstantProductVenue,
  getAmountOut,
} from "./venue/constant-product";
export type { ConstantProductVenueConfig } from "./venue/constant-product";
export {
  UNISWAP_V2_VENUE_NAME,
  createUniswapV2Venue,
  settledAmountFromLogs,
} from "./venue/uniswap-v2";
export type { UniswapV2VenueConfig } from "./venue/uniswap-v2";
