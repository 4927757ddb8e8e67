import { getEnv } from "./env/env";
import type { LogLevel } from "./logger/schema";

export interface AppConfig {
  server: {
    port: number;
    nodeEnv: "development" | "production" | "test";
  };
  logging: {
    level: LogLevel;
  };
  database: {
    url: string | undefined;
  };
  swap: {
    inputAsset: string;
    outputAsset: string;
    expiryToleranceSec: bigint;
  };
  auth: {
    mode: "signature" | "header";
    maxValiditySec: bigint;
  };
  venue: {
    mode: "paper" | "onchain";
    rpcUrl: string | undefined;
    chainId: number;
    privateKey: string | undefined;
    routerAddress: string | undefined;
    paper: {
      reserveIn: bigint;
      reserveOut: bigint;
      feeBps: bigint;
    };
  };
}

let cachedConfig: AppConfig | undefined;

export const getConfig = (): AppConfig => {
  if (cachedConfig) return cachedConfig;

  const env = getEnv();
  cachedConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
    },
    logging: {
      level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    },
    database: {
      url: env.DATABASE_URL,
    },
    swap: {
      inputAsset: env.INPUT_ASSET,
      outputAsset: env.OUTPUT_ASSET,
      expiryToleranceSec: env.EXPIRY_TOLERANCE_SEC,
    },
    auth: {
      mode: env.SWAP_AUTH,
      maxValiditySec: env.SWAP_AUTH_MAX_VALIDITY_SEC,
    },
    venue: {
      mode: env.VENUE_MODE,
      rpcUrl: env.RPC_URL,
      chainId: env.CHAIN_ID,
      privateKey: env.EXECUTOR_PRIVATE_KEY,
      routerAddress: env.ROUTER_ADDRESS,
      paper: {
        reserveIn: env.PAPER_RESERVE_IN,
        reserveOut: env.PAPER_RESERVE_OUT,
        feeBps: env.PAPER_FEE_BPS,
      },
    },
  };
  return cachedConfig;
};
