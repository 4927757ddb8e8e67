import { Hono } from "hono";
import type { PublicClient } from "viem";

import { checkRpcHealth } from "@/lib/chain/health";
import type { SwapRepository } from "@/lib/db/ports/swap-repository";

interface CheckResult {
  status: "healthy" | "unhealthy";
  error?: string;
}

export interface HealthRouteDeps {
  repository: SwapRepository;
  /** Checked only in on-chain mode. */
  rpc?: { client: PublicClient; expectedChainId: number };
}

const checkJournal = async (repository: SwapRepository): Promise<CheckResult> => {
  try {
    await repository.ping();
    return { status: "healthy" };
  } catch (error) {
    return {
      status: "unhealthy",
      error: error instanceof Error ? error.message : String(error),
    };
  }
};

const checkRpc = async (rpc: NonNullable<HealthRouteDeps["rpc"]>): Promise<CheckResult> => {
  const health = await checkRpcHealth(rpc.client, { expectedChainId: rpc.expectedChainId });
  return health.status === "healthy"
    ? { status: "healthy" }
    : { status: "unhealthy", ...(health.error !== undefined && { error: health.error }) };
};

export const createHealthRoute = (deps: HealthRouteDeps): Hono => {
  const health = new Hono();

  health.get("/", async (c) => {
    const checks: Record<string, CheckResult> = {
      journal: await checkJournal(deps.repository),
      ...(deps.rpc && { rpc: await checkRpc(deps.rpc) }),
    };

    const allHealthy = Object.values(checks).every((check) => check.status === "healthy");

    return c.json(
      {
        status: allHealthy ? "healthy" : "unhealthy",
        timestamp: new Date().toISOString(),
        checks,
      },
      allHealthy ? 200 : 503,
    );
  });

  return health;
};
