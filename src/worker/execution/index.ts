/**
 * Guarded swap execution.
 */

export { createGuardedSwapper } from "./swapper";
export type { GuardedSwapper, GuardedSwapperConfig, SwapInvocation } from "./swapper";

export { execute } from "./guarded-swap";
export { acquire } from "./custody-intake";
export type { AcquireDeps, AcquireParams } from "./custody-intake";
export { runAtomically } from "./compensation";

export {
  VENUE_CIRCUIT_BREAKER_CONFIG,
  createVenueCircuitBreaker,
  isVenueOutage,
} from "./venue-circuit-breaker";

export { DEFAULT_EXECUTION_CONFIG, ExecutionConfigSchema } from "./types";
export type {
  CompensationAction,
  CompensationScope,
  ExecutionConfig,
  ExecutionDeps,
} from "./types";
