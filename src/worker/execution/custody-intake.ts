/**
 * Custody intake: move the caller's input into the executing party's custody
 * and make sure the venue may spend it.
 *
 * 1. transfer `amountIn` caller -> executing party (consumes the caller's
 *    authorization for the executing party)
 * 2. authorize the venue for `amountIn`, unless its allowance already covers it
 *
 * Each step registers its undo with the surrounding envelope the moment it
 * has taken effect.
 */

import type { ExchangeVenue, Ledger } from "@/adapters/types";
import {
  AuthorizationDeniedError,
  InvalidSwapRequestError,
  TransferDeniedError,
} from "@/domains/swap/errors";
import type { AssetId, PartyId } from "@/domains/swap/types";
import type { Logger } from "@/lib/logger/logger";

import type { CompensationScope } from "./types";

export interface AcquireParams {
  caller: PartyId;
  inputAsset: AssetId;
  amountIn: bigint;
}

export interface AcquireDeps {
  /** Ledger acting as the executing party. */
  ledger: Ledger;
  venue: Pick<ExchangeVenue, "id" | "name">;
  logger: Logger;
}

const reasonOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const acquire = async (
  params: AcquireParams,
  scope: CompensationScope,
  deps: AcquireDeps,
): Promise<void> => {
  const { caller, inputAsset, amountIn } = params;
  const { ledger, venue, logger } = deps;
  const executingParty = ledger.self;

  if (amountIn <= 0n) {
    throw new InvalidSwapRequestError(`amountIn must be positive, got ${amountIn}`, [
      "amountIn: Amount must be positive",
    ]);
  }

  try {
    await ledger.transfer({ from: caller, to: executingParty, asset: inputAsset, amount: amountIn });
  } catch (error) {
    throw new TransferDeniedError(
      `Could not take ${amountIn} of ${inputAsset} from ${caller}: ${reasonOf(error)}`,
      error,
    );
  }
  scope.record("return-input", () =>
    ledger.transfer({ from: executingParty, to: caller, asset: inputAsset, amount: amountIn }),
  );
  logger.info("Input taken into custody", { caller, inputAsset, amountIn });

  const authorizationKey = { owner: executingParty, spender: venue.id, asset: inputAsset };
  let previousAllowance: bigint;
  try {
    previousAllowance = await ledger.getAuthorization(authorizationKey);
  } catch (error) {
    throw new AuthorizationDeniedError(
      `Could not read ${venue.name} allowance for ${inputAsset}: ${reasonOf(error)}`,
      error,
    );
  }

  if (previousAllowance >= amountIn) {
    logger.debug("Venue allowance already covers input", { previousAllowance, amountIn });
    return;
  }

  try {
    await ledger.authorize({ ...authorizationKey, amount: amountIn });
  } catch (error) {
    throw new AuthorizationDeniedError(
      `Could not authorize ${venue.name} for ${amountIn} of ${inputAsset}: ${reasonOf(error)}`,
      error,
    );
  }
  scope.record("restore-authorization", () =>
    ledger.authorize({ ...authorizationKey, amount: previousAllowance }),
  );
  logger.info("Venue authorized", { venue: venue.id, amountIn, previousAllowance });
};
