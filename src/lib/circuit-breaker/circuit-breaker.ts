/**
 * Circuit breaker wrapper around cockatiel.
 *
 * - CLOSED: calls pass through
 * - OPEN: after `failureThreshold` consecutive counted failures, calls fail fast
 * - HALF_OPEN: after `resetTimeoutMs`, one trial call decides whether to close
 *
 * Only errors accepted by `countsAsFailure` move the breaker. Any other error
 * propagates untouched and leaves the failure streak as it was.
 */

import {
  BrokenCircuitError,
  CircuitState,
  ConsecutiveBreaker,
  circuitBreaker,
  handleAll,
  handleWhen,
} from "cockatiel";

export type CircuitBreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
  /** Consecutive counted failures before opening. */
  failureThreshold: number;
  /** Time in ms before a trial call is let through. */
  resetTimeoutMs: number;
  /** Which errors count towards opening; all of them when omitted. */
  countsAsFailure?: (error: Error) => boolean;
}

export interface CircuitBreaker {
  execute: <T>(fn: () => Promise<T>) => Promise<T>;
  getState: () => CircuitBreakerState;
  /**
   * True while calls fail fast. Turns false once `resetTimeoutMs` has passed
   * since opening, so the next `execute` runs as the trial call.
   */
  isOpen: () => boolean;
  /** Subscribe to state changes; returns the unsubscribe function. */
  onStateChange: (callback: (state: CircuitBreakerState) => void) => () => void;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 30_000,
};

export class CircuitOpenError extends Error {
  constructor(message = "Circuit breaker is open") {
    super(message);
    this.name = "CircuitOpenError";
  }
}

const mapCircuitState = (state: CircuitState): CircuitBreakerState => {
  switch (state) {
    case CircuitState.Open:
    case CircuitState.Isolated:
      return "OPEN";
    case CircuitState.HalfOpen:
      return "HALF_OPEN";
    case CircuitState.Closed:
      return "CLOSED";
  }
};

/**
 * @example
 * ```typescript
 * const breaker = createCircuitBreaker({
 *   failureThreshold: 3,
 *   resetTimeoutMs: 30_000,
 *   countsAsFailure: (error) => isVenueError(error) && error.code === "NETWORK_ERROR",
 * });
 *
 * const amountOut = await breaker.execute(() => venue.quote(amountIn, route));
 * ```
 */
export const createCircuitBreaker = (
  config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
): CircuitBreaker => {
  const { failureThreshold, resetTimeoutMs, countsAsFailure } = config;

  const breaker = circuitBreaker(countsAsFailure ? handleWhen(countsAsFailure) : handleAll, {
    halfOpenAfter: resetTimeoutMs,
    breaker: new ConsecutiveBreaker(failureThreshold),
  });

  const stateChangeListeners = new Set<(state: CircuitBreakerState) => void>();
  let openedAt = 0;

  breaker.onStateChange((state) => {
    if (state === CircuitState.Open) {
      openedAt = Date.now();
    }
    const mappedState = mapCircuitState(state);
    for (const listener of stateChangeListeners) {
      listener(mappedState);
    }
  });

  const execute = async <T>(fn: () => Promise<T>): Promise<T> => {
    try {
      return await breaker.execute(fn);
    } catch (error) {
      if (error instanceof BrokenCircuitError) {
        throw new CircuitOpenError(`Circuit breaker is open after ${failureThreshold} failures`);
      }
      throw error;
    }
  };

  return {
    execute,
    getState: () => mapCircuitState(breaker.state),
    isOpen: () =>
      breaker.state === CircuitState.Isolated ||
      (breaker.state === CircuitState.Open && Date.now() - openedAt < resetTimeoutMs),
    onStateChange: (callback) => {
      stateChangeListeners.add(callback);
      return () => {
        stateChangeListeners.delete(callback);
      };
    },
  };
};
