/**
 * Execution core types and config.
 */

import * as v from "valibot";

import type { ExchangeVenue, Ledger } from "@/adapters/types";
import { unsignedAmountSchema } from "@/domains/swap/types";
import type { Clock } from "@/domains/swap/types";
import type { CircuitBreaker } from "@/lib/circuit-breaker";
import type { Logger } from "@/lib/logger/logger";

// --- Execution Config ---

export interface ExecutionConfig {
  /**
   * Seconds after acceptance that settlement may still happen. Zero pins
   * the deadline to the acceptance second itself.
   */
  expiryToleranceSec: bigint;
}

export const ExecutionConfigSchema = v.object({
  expiryToleranceSec: unsignedAmountSchema,
});

export const DEFAULT_EXECUTION_CONFIG: ExecutionConfig = {
  expiryToleranceSec: 0n,
};

// --- Dependencies ---

/**
 * Collaborators of one guarded execution. `ledger` acts as the executing
 * party, so `ledger.self` is where custody is held.
 */
export interface ExecutionDeps {
  ledger: Ledger;
  venue: ExchangeVenue;
  circuitBreaker: CircuitBreaker;
  clock: Clock;
  logger: Logger;
  config: ExecutionConfig;
}

// --- Compensation ---

export type CompensationAction = () => Promise<void>;

/** Handed to each step of an atomic execution to register its undo. */
export interface CompensationScope {
  record: (step: string, undo: CompensationAction) => void;
}
