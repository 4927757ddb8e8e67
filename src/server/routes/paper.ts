import { Hono } from "hono";
import * as v from "valibot";

import type { InMemoryLedger } from "@/adapters/ledger/memory";
import { UNLIMITED_AUTHORIZATION } from "@/adapters/ledger/memory";
import { addressSchema, amountStringSchema } from "@/domains/swap/types";
import type { AssetId, PartyId } from "@/domains/swap/types";

import { errorBody } from "./errors";

const fundBodySchema = v.object({
  caller: addressSchema,
  amount: amountStringSchema,
});

export interface PaperRouteDeps {
  book: InMemoryLedger;
  inputAsset: AssetId;
  executingParty: PartyId;
}

/**
 * Paper-mode faucet: credits a caller with input asset and pre-authorizes the
 * executing party to take it, which on chain the caller would do themselves.
 */
export const createPaperRoute = (deps: PaperRouteDeps): Hono => {
  const { book, inputAsset, executingParty } = deps;
  const paper = new Hono();

  paper.post("/fund", async (c) => {
    const body = v.safeParse(fundBodySchema, await c.req.json().catch(() => undefined));
    if (!body.success) {
      return c.json(errorBody("INVALID_REQUEST", "Body must be { caller: address, amount: string }"), 400);
    }

    const { caller, amount } = body.output;
    book.mint(caller, inputAsset, amount);
    await book.as(caller).authorize({
      owner: caller,
      spender: executingParty,
      asset: inputAsset,
      amount: UNLIMITED_AUTHORIZATION,
    });

    return c.json({
      caller,
      asset: inputAsset,
      balance: book.balanceOf(caller, inputAsset).toString(),
    });
  });

  return paper;
};
