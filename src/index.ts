/**
 * Guarded Swap Executor
 *
 * Entry point: journal, swap worker and HTTP API.
 */

import { getConfig } from "./lib/config";
import { type DatabaseInstance, createDatabase } from "./lib/db/client";
import { createInMemorySwapRepository } from "./lib/db/adapters/memory/swap-repository";
import { createPostgresSwapRepository } from "./lib/db/adapters/postgres/swap-repository";
import type { SwapRepository } from "./lib/db/ports/swap-repository";
import { createLogger } from "./lib/logger";
import { startHttpServer } from "./server";
import {
  createHeaderAuthenticator,
  createSignatureAuthenticator,
} from "./server/routes/caller-auth";
import { recordSwapOutcome } from "./server/routes/metrics";
import { startWorker } from "./worker";

const main = async (): Promise<void> => {
  const logger = createLogger({ level: "info" });

  logger.info("Guarded Swap Executor starting...");

  try {
    // 1. Validate environment configuration
    const config = getConfig();
    const appLogger = createLogger({ level: config.logging.level });
    appLogger.info("Environment configuration validated", { venueMode: config.venue.mode });

    // 2. Swap journal
    let database: DatabaseInstance | null = null;
    let repository: SwapRepository;
    if (config.database.url) {
      database = createDatabase(config.database.url);
      repository = createPostgresSwapRepository(database.db);
      appLogger.info("Swap journal: postgres");
    } else {
      repository = createInMemorySwapRepository();
      appLogger.warn("DATABASE_URL not set, swap journal is in-memory");
    }

    // 3. Start worker (adapters and guarded swapper)
    const worker = startWorker({
      config,
      repository,
      logger: appLogger,
      onSwapFinished: recordSwapOutcome,
    });

    // 4. Caller authentication
    const { adapters } = worker;
    const authenticator =
      config.auth.mode === "header"
        ? createHeaderAuthenticator()
        : createSignatureAuthenticator({
            chainId: config.venue.chainId,
            executingParty: adapters.executingParty,
            inputAsset: worker.inputAsset,
            outputAsset: worker.outputAsset,
            maxValiditySec: config.auth.maxValiditySec,
          });
    if (authenticator.mode === "header") {
      appLogger.warn("SWAP_AUTH=header: x-caller is trusted without a signature (paper only)");
    }

    // 5. Start HTTP server
    const httpServer = await startHttpServer({
      port: config.server.port,
      logger: appLogger,
      swapper: worker.swapper,
      repository,
      authenticator,
      ...(adapters.mode === "onchain" && {
        rpc: { client: adapters.publicClient, expectedChainId: adapters.chainId },
      }),
      ...(adapters.mode === "paper" && {
        paper: {
          book: adapters.book,
          inputAsset: worker.inputAsset,
          executingParty: adapters.executingParty,
        },
      }),
    });

    // 6. Graceful shutdown
    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
      if (shuttingDown) return;
      shuttingDown = true;
      appLogger.info(`Received ${signal}, initiating graceful shutdown`);

      await worker.shutdown();
      await httpServer.close();
      await database?.close();

      appLogger.info("Graceful shutdown complete");
      process.exit(0);
    };

    const onSignal = (signal: string): void => {
      shutdown(signal).catch((error: unknown) => {
        const err = error instanceof Error ? error : new Error(String(error));
        appLogger.error("Shutdown failed", err);
        process.exit(1);
      });
    };
    process.on("SIGTERM", () => onSignal("SIGTERM"));
    process.on("SIGINT", () => onSignal("SIGINT"));
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error("Fatal error during startup", err);
    process.exit(1);
  }
};

main().catch((error) => {
  console.error("Unhandled error:", error);
  process.exit(1);
});
