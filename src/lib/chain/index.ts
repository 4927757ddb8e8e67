export { DEFAULT_BLOCK_STALE_THRESHOLD_SEC, KNOWN_CHAINS, resolveChain } from "./constants";
export { createChainPublicClient, createChainWalletClient } from "./client";
export type { SigningWalletClient } from "./client";
export { describeError, getRevertDetails, isTransportError, revertMatches } from "./errors";
export type { RevertDetails } from "./errors";
export { checkRpcHealth } from "./health";
export type { RpcHealthOptions, RpcHealthStatus } from "./health";
