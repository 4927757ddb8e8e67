import { Hono } from "hono";
import * as v from "valibot";

import { isVenueError } from "@/adapters/errors";
import { addressSchema, amountStringSchema } from "@/domains/swap/types";
import type { SwapJournalEntry, SwapRepository } from "@/lib/db/ports/swap-repository";
import type { Logger } from "@/lib/logger/logger";
import { toError } from "@/lib/logger/logger";
import type { GuardedSwapper } from "@/worker/execution/swapper";

import type { CallerAuthenticator } from "./caller-auth";
import { describeFailure, errorBody } from "./errors";

export const CALLER_HEADER = "x-caller";

const swapBodySchema = v.object({
  amountIn: amountStringSchema,
  minimumAmountOut: amountStringSchema,
});

const quoteQuerySchema = v.object({
  amountIn: amountStringSchema,
});

const swapIdSchema = v.pipe(v.string(), v.uuid());

export interface SwapsRouteDeps {
  swapper: GuardedSwapper;
  repository: SwapRepository;
  logger: Logger;
  authenticator: CallerAuthenticator;
}

const issuesMessage = (issues: readonly v.BaseIssue<unknown>[]): string =>
  issues
    .map((issue) => {
      const path = issue.path?.map((item) => String(item.key)).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");

const serializeEntry = (entry: SwapJournalEntry) => ({
  ...entry,
  amountIn: entry.amountIn.toString(),
  minimumAmountOut: entry.minimumAmountOut.toString(),
  submittedAtSec: entry.submittedAtSec.toString(),
  amountOut: entry.amountOut?.toString() ?? null,
  createdAt: entry.createdAt.toISOString(),
  updatedAt: entry.updatedAt.toISOString(),
});

export const createSwapsRoute = (deps: SwapsRouteDeps): Hono => {
  const { swapper, repository, logger, authenticator } = deps;
  const swaps = new Hono();

  swaps.post("/", async (c) => {
    const caller = v.safeParse(addressSchema, c.req.header(CALLER_HEADER));
    if (!caller.success) {
      return c.json(
        errorBody("INVALID_REQUEST", `${CALLER_HEADER} header must be an address`),
        400,
      );
    }

    const rawBody: unknown = await c.req.json().catch(() => undefined);
    const body = v.safeParse(swapBodySchema, rawBody);
    if (!body.success) {
      return c.json(errorBody("INVALID_REQUEST", issuesMessage(body.issues)), 400);
    }

    const auth = await authenticator.authenticate({
      caller: caller.output,
      ...body.output,
      body: rawBody,
    });
    if (!auth.ok) {
      logger.warn("Swap request not authorized", { caller: caller.output, reason: auth.message });
      return c.json(errorBody("UNAUTHORIZED", auth.message), 401);
    }

    try {
      const result = await swapper.swap({ caller: caller.output, ...body.output });
      return c.json(
        {
          status: result.status,
          id: result.request.id,
          amountOut: result.outcome.amountOut.toString(),
          reference: result.outcome.reference ?? null,
        },
        200,
      );
    } catch (error) {
      const { status, body: failure } = describeFailure(error);
      if (status === 500) {
        logger.error("Swap request failed", toError(error));
      }
      return c.json(failure, status);
    }
  });

  swaps.get("/quote", async (c) => {
    const query = v.safeParse(quoteQuerySchema, { amountIn: c.req.query("amountIn") });
    if (!query.success) {
      return c.json(errorBody("INVALID_REQUEST", issuesMessage(query.issues)), 400);
    }

    try {
      const expectedAmountOut = await swapper.quote(query.output.amountIn);
      return c.json({
        amountIn: query.output.amountIn.toString(),
        expectedAmountOut: expectedAmountOut.toString(),
      });
    } catch (error) {
      const reason = toError(error).message;
      logger.warn("Quote failed", { reason });
      return isVenueError(error) && error.code === "ROUTE_UNAVAILABLE"
        ? c.json(errorBody("ROUTE_UNAVAILABLE", reason), 422)
        : c.json(errorBody("VENUE_UNAVAILABLE", reason), 503);
    }
  });

  swaps.get("/:id", async (c) => {
    const id = c.req.param("id");
    const notFound = () => c.json(errorBody("NOT_FOUND", `Swap ${id} not found`), 404);

    // Journal ids are UUIDs; anything else cannot name a swap.
    if (!v.is(swapIdSchema, id)) return notFound();

    const entry = await repository.findById(id);
    if (!entry) return notFound();

    return c.json({
      ...serializeEntry(entry),
      queueStatus: entry.status === "PENDING" ? swapper.getQueueStatus(id) : null,
    });
  });

  return swaps;
};
