export {
  CircuitOpenError,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  createCircuitBreaker,
} from "./circuit-breaker";
export type { CircuitBreaker, CircuitBreakerConfig, CircuitBreakerState } from "./circuit-breaker";
