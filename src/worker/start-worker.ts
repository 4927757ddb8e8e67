/**
 * Worker orchestrator: builds the adapters for the configured venue mode and
 * the guarded swapper that runs on them.
 */

import * as v from "valibot";

import { adapterConfigFromAppConfig } from "@/adapters/config";
import { type SwapAdapters, createSwapAdapters } from "@/adapters/factory";
import { type AssetId, addressSchema } from "@/domains/swap/types";
import type { AppConfig } from "@/lib/config";
import type { SwapRepository } from "@/lib/db/ports/swap-repository";
import type { Logger } from "@/lib/logger";

import { type GuardedSwapper, type GuardedSwapperConfig, createGuardedSwapper } from "./execution/swapper";

export interface StartWorkerConfig {
  config: AppConfig;
  repository: SwapRepository;
  logger: Logger;
  /** Called once per accepted swap with its terminal state. */
  onSwapFinished?: GuardedSwapperConfig["onFinished"];
}

export interface WorkerHandle {
  adapters: SwapAdapters;
  swapper: GuardedSwapper;
  inputAsset: AssetId;
  outputAsset: AssetId;
  /** Waits for queued swaps to finish; new ones are refused meanwhile. */
  shutdown: () => Promise<void>;
}

export const startWorker = (workerConfig: StartWorkerConfig): WorkerHandle => {
  const { config, repository, logger, onSwapFinished } = workerConfig;

  const adapters = createSwapAdapters(adapterConfigFromAppConfig(config));
  const inputAsset = v.parse(addressSchema, config.swap.inputAsset);
  const outputAsset = v.parse(addressSchema, config.swap.outputAsset);

  const swapper = createGuardedSwapper({
    ledger: adapters.ledger,
    venue: adapters.venue,
    inputAsset,
    outputAsset,
    logger: logger.child({ component: "swapper" }),
    repository,
    execution: { expiryToleranceSec: config.swap.expiryToleranceSec },
    ...(onSwapFinished && { onFinished: onSwapFinished }),
  });

  logger.info("Swap worker started", {
    mode: adapters.mode,
    executingParty: adapters.executingParty,
    venue: adapters.venue.name,
    venueId: adapters.venue.id,
    inputAsset,
    outputAsset,
    expiryToleranceSec: config.swap.expiryToleranceSec,
  });

  const shutdown = async (): Promise<void> => {
    logger.info("Worker shutting down...", { pending: swapper.getPendingCount() });
    await swapper.close();
    logger.info("Worker shutdown complete");
  };

  return { adapters, swapper, inputAsset, outputAsset, shutdown };
};
