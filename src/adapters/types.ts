/**
 * Ports for the two collaborators a guarded swap depends on: the asset
 * ledger that holds custody, and the exchange venue that prices and settles.
 *
 * @see {@link ../domains/swap/types.ts Swap domain types}
 */

import type { AssetId, PartyId, Route, SettlementOutcome } from "@/domains/swap/types";

// --- Ledger ---

export interface TransferParams {
  from: PartyId;
  to: PartyId;
  asset: AssetId;
  amount: bigint;
}

export interface AuthorizeParams {
  owner: PartyId;
  spender: PartyId;
  asset: AssetId;
  amount: bigint;
}

export interface AuthorizationKey {
  owner: PartyId;
  spender: PartyId;
  asset: AssetId;
}

/**
 * Asset ledger as seen by one acting party (`self`).
 *
 * A transfer whose `from` is not `self` spends `from`'s authorization for
 * `self`. Authorizations can only be granted by their owner.
 */
export interface Ledger {
  readonly name: string;
  readonly self: PartyId;
  transfer: (params: TransferParams) => Promise<void>;
  /** Set the allowance `owner` grants `spender` for `asset`. */
  authorize: (params: AuthorizeParams) => Promise<void>;
  getAuthorization: (key: AuthorizationKey) => Promise<bigint>;
  getBalance: (party: PartyId, asset: AssetId) => Promise<bigint>;
}

// --- Exchange Venue ---

export interface ExecuteAndSettleParams {
  amountIn: bigint;
  /** Settlement must produce at least this much, or the venue refuses. */
  minimumAmountOut: bigint;
  route: Route;
  settlementDestination: PartyId;
  /** Last unix second in which settlement may happen. */
  expirySec: bigint;
}

export interface ExchangeVenue {
  readonly name: string;
  /** Account that draws input funds; the spender to authorize. */
  readonly id: PartyId;
  /** Expected output for `amountIn` along `route` at current prices. */
  quote: (amountIn: bigint, route: Route) => Promise<bigint>;
  executeAndSettle: (params: ExecuteAndSettleParams) => Promise<SettlementOutcome>;
}
