/**
 * Circuit breaker around venue settlement.
 *
 * A venue that refuses a trade on its own terms (slippage, deadline, no
 * route) is healthy. Only failures of the venue itself count: transport
 * errors and anything unclassified.
 *
 * Opens after 3 consecutive counted failures and lets one trial settlement
 * through after 30s.
 */

import { isVenueError } from "@/adapters/errors";
import {
  type CircuitBreaker,
  type CircuitBreakerConfig,
  createCircuitBreaker,
} from "@/lib/circuit-breaker";
import type { Logger } from "@/lib/logger/logger";

export const isVenueOutage = (error: Error): boolean =>
  !isVenueError(error) || error.code === "NETWORK_ERROR" || error.code === "UNKNOWN";

export const VENUE_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 3,
  resetTimeoutMs: 30_000,
  countsAsFailure: isVenueOutage,
};

export const createVenueCircuitBreaker = (
  logger: Logger,
  config: CircuitBreakerConfig = VENUE_CIRCUIT_BREAKER_CONFIG,
): CircuitBreaker => {
  const breaker = createCircuitBreaker(config);

  breaker.onStateChange((state) => {
    if (state === "OPEN") {
      logger.error(
        "Venue circuit breaker OPENED after consecutive failures",
        new Error("Venue circuit breaker opened"),
        { state, failureThreshold: config.failureThreshold },
      );
    } else if (state === "CLOSED") {
      logger.info("Venue circuit breaker CLOSED, resuming settlement", { state });
    } else {
      logger.info("Venue circuit breaker HALF_OPEN, trying one settlement", { state });
    }
  });

  return breaker;
};
