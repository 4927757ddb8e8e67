/**
 * In-memory asset ledger.
 *
 * Holds balances and allowances for any number of parties. `as(party)` hands
 * out a `Ledger` port acting as that party, so a caller, the executing party
 * and a venue can all share one book. Every operation validates fully before
 * it mutates, so a refused operation leaves no trace.
 */

import { maxUint256 } from "viem";

import type { AssetId, PartyId } from "@/domains/swap/types";

import { LedgerError } from "../errors";
import type { AuthorizationKey, AuthorizeParams, Ledger, TransferParams } from "../types";

export const IN_MEMORY_LEDGER_NAME = "memory";

/** Allowance that is never decremented when spent. */
export const UNLIMITED_AUTHORIZATION = maxUint256;

/** Non-zero balances and authorizations, keyed by lowercased party and asset. */
export interface LedgerSnapshot {
  balances: Record<string, bigint>;
  authorizations: Record<string, bigint>;
}

export interface InMemoryLedger {
  as: (party: PartyId) => Ledger;
  /** Credit `amount` of `asset` to `party` out of thin air. */
  mint: (party: PartyId, asset: AssetId, amount: bigint) => void;
  balanceOf: (party: PartyId, asset: AssetId) => bigint;
  authorizationOf: (key: AuthorizationKey) => bigint;
  snapshot: () => LedgerSnapshot;
}

const balanceKey = (party: PartyId, asset: AssetId): string =>
  `${party.toLowerCase()}:${asset.toLowerCase()}`;

const authorizationKey = ({ owner, spender, asset }: AuthorizationKey): string =>
  `${owner.toLowerCase()}:${spender.toLowerCase()}:${asset.toLowerCase()}`;

const assertAmount = (amount: bigint): void => {
  if (amount < 0n) {
    throw new LedgerError(
      `Amount must not be negative: ${amount}`,
      "INVALID_AMOUNT",
      IN_MEMORY_LEDGER_NAME,
    );
  }
};

// Zero entries are indistinguishable from absent ones for every reader.
const nonZeroEntries = (map: Map<string, bigint>): Record<string, bigint> =>
  Object.fromEntries([...map].filter(([, value]) => value !== 0n));

export const createInMemoryLedger = (): InMemoryLedger => {
  const balances = new Map<string, bigint>();
  const authorizations = new Map<string, bigint>();

  const balanceOf = (party: PartyId, asset: AssetId): bigint =>
    balances.get(balanceKey(party, asset)) ?? 0n;

  const authorizationOf = (key: AuthorizationKey): bigint =>
    authorizations.get(authorizationKey(key)) ?? 0n;

  const setBalance = (party: PartyId, asset: AssetId, amount: bigint): void => {
    balances.set(balanceKey(party, asset), amount);
  };

  const transfer = (self: PartyId, { from, to, asset, amount }: TransferParams): void => {
    assertAmount(amount);

    const spendsAuthorization = from.toLowerCase() !== self.toLowerCase();
    const allowanceKey = { owner: from, spender: self, asset };
    const allowance = authorizationOf(allowanceKey);

    if (spendsAuthorization && allowance < amount) {
      throw new LedgerError(
        `${self} is authorized for ${allowance} of ${asset} from ${from}, needs ${amount}`,
        "NOT_AUTHORIZED",
        IN_MEMORY_LEDGER_NAME,
      );
    }

    const fromBalance = balanceOf(from, asset);
    if (fromBalance < amount) {
      throw new LedgerError(
        `${from} holds ${fromBalance} of ${asset}, needs ${amount}`,
        "INSUFFICIENT_BALANCE",
        IN_MEMORY_LEDGER_NAME,
      );
    }

    if (spendsAuthorization && allowance !== UNLIMITED_AUTHORIZATION) {
      authorizations.set(authorizationKey(allowanceKey), allowance - amount);
    }
    setBalance(from, asset, fromBalance - amount);
    setBalance(to, asset, balanceOf(to, asset) + amount);
  };

  const authorize = (self: PartyId, { owner, spender, asset, amount }: AuthorizeParams): void => {
    assertAmount(amount);

    if (owner.toLowerCase() !== self.toLowerCase()) {
      throw new LedgerError(
        `${self} cannot grant authorizations owned by ${owner}`,
        "NOT_AUTHORIZED",
        IN_MEMORY_LEDGER_NAME,
      );
    }
    authorizations.set(authorizationKey({ owner, spender, asset }), amount);
  };

  return {
    as: (party) => ({
      name: IN_MEMORY_LEDGER_NAME,
      self: party,
      transfer: async (params) => transfer(party, params),
      authorize: async (params) => authorize(party, params),
      getAuthorization: async (key) => authorizationOf(key),
      getBalance: async (owner, asset) => balanceOf(owner, asset),
    }),

    mint: (party, asset, amount) => {
      assertAmount(amount);
      setBalance(party, asset, balanceOf(party, asset) + amount);
    },

    balanceOf,
    authorizationOf,

    snapshot: () => ({
      balances: nonZeroEntries(balances),
      authorizations: nonZeroEntries(authorizations),
    }),
  };
};
