/**
 * Guarded swapper: the invocation entry point.
 *
 * Binds the asset pair and the executing party from configuration, takes
 * `caller` from the invocation context, and runs each accepted request
 * through the execution queue. Every accepted request is journaled as
 * PENDING and then SETTLED or ABORTED; the journal is written outside the
 * atomic envelope and its failures are only logged.
 */

import * as v from "valibot";

import type { ExchangeVenue, Ledger } from "@/adapters/types";
import { VenueUnavailableError, isSwapError } from "@/domains/swap/errors";
import { buildRoute, createSwapRequest } from "@/domains/swap/request";
import { type SwapExecution, createSwapExecution, transitionSwap } from "@/domains/swap/state";
import type { AssetId, Clock, SwapRequest, SwapResult } from "@/domains/swap/types";
import { systemClock } from "@/domains/swap/types";
import type { CircuitBreaker } from "@/lib/circuit-breaker";
import { type SwapRepository, toJournalEntry, toJournalUpdate } from "@/lib/db/ports/swap-repository";
import { type Logger, toError } from "@/lib/logger/logger";

import { type ExecutionQueue, type JobStatus, createExecutionQueue } from "../queue";
import { execute } from "./guarded-swap";
import { DEFAULT_EXECUTION_CONFIG, type ExecutionConfig, ExecutionConfigSchema } from "./types";
import { createVenueCircuitBreaker } from "./venue-circuit-breaker";

export interface SwapInvocation {
  caller: string;
  amountIn: bigint;
  minimumAmountOut: bigint;
}

export interface GuardedSwapperConfig {
  /** Ledger acting as the executing party. */
  ledger: Ledger;
  venue: ExchangeVenue;
  inputAsset: AssetId;
  outputAsset: AssetId;
  logger: Logger;
  execution?: ExecutionConfig;
  repository?: SwapRepository;
  circuitBreaker?: CircuitBreaker;
  queue?: ExecutionQueue;
  clock?: Clock;
  generateId?: () => string;
  /** Called once per accepted request with its terminal state. */
  onFinished?: (execution: SwapExecution) => void;
}

export interface GuardedSwapper {
  swap: (invocation: SwapInvocation) => Promise<SwapResult>;
  /** Expected output for `amountIn` at current venue prices. Informational only. */
  quote: (amountIn: bigint) => Promise<bigint>;
  getPendingCount: () => number;
  /** Whether an accepted swap is still waiting or running; `null` once finished. */
  getQueueStatus: (id: string) => JobStatus | null;
  /** Stop accepting swaps and wait for the queued ones. */
  close: () => Promise<void>;
}

export const createGuardedSwapper = (config: GuardedSwapperConfig): GuardedSwapper => {
  const {
    ledger,
    venue,
    inputAsset,
    outputAsset,
    logger,
    repository,
    circuitBreaker = createVenueCircuitBreaker(logger),
    queue = createExecutionQueue(),
    clock = systemClock,
    generateId,
    onFinished,
  } = config;
  const execution = v.parse(ExecutionConfigSchema, config.execution ?? DEFAULT_EXECUTION_CONFIG);

  const journal = async (
    action: "create" | "update",
    state: SwapExecution,
    log: Logger,
  ): Promise<void> => {
    if (!repository) return;
    try {
      if (action === "create") {
        await repository.create(toJournalEntry(state));
      } else {
        await repository.update(state.request.id, toJournalUpdate(state));
      }
    } catch (error) {
      log.error("Swap journal write failed", toError(error), { action });
    }
  };

  const finish = async (
    pending: SwapExecution,
    outcome: { result: SwapResult } | { error: unknown },
    log: Logger,
  ): Promise<void> => {
    const transition = transitionSwap(
      pending,
      "result" in outcome
        ? { type: "SETTLE", outcome: outcome.result.outcome }
        : {
            type: "ABORT",
            code: isSwapError(outcome.error) ? outcome.error.code : "VENUE_UNAVAILABLE",
            message: toError(outcome.error).message,
          },
    );
    if (!transition.ok) {
      log.error("Swap state transition rejected", new Error(transition.error));
      return;
    }
    await journal("update", transition.state, log);
    onFinished?.(transition.state);
  };

  const run = async (request: SwapRequest): Promise<SwapResult> => {
    const log = logger.child({ swapId: request.id, caller: request.caller });
    const pending = createSwapExecution(request);

    log.info("Swap accepted", {
      amountIn: request.amountIn,
      minimumAmountOut: request.minimumAmountOut,
      submittedAtSec: request.submittedAtSec,
    });
    await journal("create", pending, log);

    try {
      const result = await queue.run(request.id, () =>
        execute(request, {
          ledger,
          venue,
          circuitBreaker,
          clock,
          logger: log,
          config: execution,
        }),
      );
      log.info("Swap settled", {
        amountOut: result.outcome.amountOut,
        reference: result.outcome.reference,
      });
      await finish(pending, { result }, log);
      return result;
    } catch (error) {
      const failure = toError(error);
      if (isSwapError(error) && error.code === "ROLLBACK_FAILED") {
        log.error("Swap aborted with incomplete rollback", failure);
      } else {
        log.warn("Swap aborted", {
          code: isSwapError(error) ? error.code : undefined,
          reason: failure.message,
        });
      }
      await finish(pending, { error }, log);
      throw error;
    }
  };

  return {
    swap: async (invocation) => {
      if (queue.isClosed()) {
        throw new VenueUnavailableError("Swapper is shutting down");
      }
      return run(
        createSwapRequest(
          { ...invocation, inputAsset, outputAsset },
          { clock, ...(generateId && { generateId }) },
        ),
      );
    },

    quote: (amountIn) => venue.quote(amountIn, buildRoute({ inputAsset, outputAsset })),

    getPendingCount: queue.getPendingCount,

    getQueueStatus: queue.getStatus,

    close: async () => {
      await queue.close();
      logger.info("Swapper drained");
    },
  };
};
