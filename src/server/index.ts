import { serve } from "@hono/node-server";
import { Hono } from "hono";

import type { SwapRepository } from "../lib/db/ports/swap-repository";
import type { Logger } from "../lib/logger/logger";
import { toError } from "../lib/logger/logger";
import type { GuardedSwapper } from "../worker/execution/swapper";
import { errorBody } from "./routes/errors";
import { type HealthRouteDeps, createHealthRoute } from "./routes/health";
import { incrementMetric, metrics, recordDuration } from "./routes/metrics";
import type { CallerAuthenticator } from "./routes/caller-auth";
import { type PaperRouteDeps, createPaperRoute } from "./routes/paper";
import { createSwapsRoute } from "./routes/swaps";

export interface AppDeps {
  logger: Logger;
  swapper: GuardedSwapper;
  repository: SwapRepository;
  /** Decides whether a swap request really comes from its `x-caller`. */
  authenticator: CallerAuthenticator;
  rpc?: HealthRouteDeps["rpc"];
  /** Mounts the paper faucet; paper mode only. */
  paper?: PaperRouteDeps;
}

export interface ServerDeps extends AppDeps {
  port: number;
}

export interface HttpServer {
  port: number;
  close: () => Promise<void>;
}

export const createApp = (deps: AppDeps): Hono => {
  const app = new Hono();

  // Request logging middleware
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    deps.logger.info("HTTP request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: duration,
    });
    incrementMetric("httpRequestsTotal");
    recordDuration(duration);
  });

  app.onError((error, c) => {
    deps.logger.error("Unhandled request error", toError(error), { path: c.req.path });
    return c.json(errorBody("INTERNAL", "Internal server error"), 500);
  });

  app.get("/", (c) => c.json({ message: "Guarded Swap Executor API" }));
  app.route("/health", createHealthRoute({ repository: deps.repository, rpc: deps.rpc }));
  app.route("/metrics", metrics);
  app.route(
    "/swaps",
    createSwapsRoute({
      swapper: deps.swapper,
      repository: deps.repository,
      logger: deps.logger,
      authenticator: deps.authenticator,
    }),
  );
  if (deps.paper) {
    app.route("/paper", createPaperRoute(deps.paper));
  }

  return app;
};

export const startHttpServer = async (deps: ServerDeps): Promise<HttpServer> => {
  const app = createApp(deps);

  const server = serve(
    {
      fetch: app.fetch,
      port: deps.port,
    },
    (info) => {
      deps.logger.info(`HTTP server listening on port ${info.port}`);
    },
  );

  return {
    port: deps.port,
    close: async (): Promise<void> => {
      return new Promise<void>((resolve) => {
        server.close(() => {
          deps.logger.info("HTTP server closed");
          resolve();
        });
      });
    },
  };
};
