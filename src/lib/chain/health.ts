import { DEFAULT_BLOCK_STALE_THRESHOLD_SEC } from "./constants";

import type { PublicClient } from "viem";

export type RpcHealthStatus =
  | { status: "healthy"; blockNumber: bigint; blockAgeSec: bigint; chainId: number; error?: undefined }
  | {
      status: "unhealthy";
      blockNumber?: bigint;
      blockAgeSec?: bigint;
      chainId?: number;
      error?: string;
    };

export interface RpcHealthOptions {
  thresholdSec?: bigint;
  /** Flag the RPC as unhealthy when it serves a different chain. */
  expectedChainId?: number;
}

export const checkRpcHealth = async (
  client: PublicClient,
  options: RpcHealthOptions = {},
): Promise<RpcHealthStatus> => {
  const { thresholdSec = DEFAULT_BLOCK_STALE_THRESHOLD_SEC, expectedChainId } = options;
  try {
    const [block, chainId] = await Promise.all([client.getBlock(), client.getChainId()]);
    const now = BigInt(Math.floor(Date.now() / 1000));
    const blockAgeSec = now - block.timestamp;

    if (expectedChainId !== undefined && chainId !== expectedChainId) {
      return {
        status: "unhealthy",
        blockNumber: block.number,
        blockAgeSec,
        chainId,
        error: `RPC serves chain ${chainId}, expected ${expectedChainId}`,
      };
    }

    if (blockAgeSec > thresholdSec) {
      return {
        status: "unhealthy",
        blockNumber: block.number,
        blockAgeSec,
        chainId,
        error: `Block age ${blockAgeSec}s exceeds threshold ${thresholdSec}s`,
      };
    }

    return {
      status: "healthy",
      blockNumber: block.number,
      blockAgeSec,
      chainId,
    };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    return {
      status: "unhealthy",
      error,
    };
  }
};
