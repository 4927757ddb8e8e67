import { Hono } from "hono";

import { SWAP_ERROR_CODES, type SwapErrorCode } from "@/domains/swap/errors";
import type { SwapExecution } from "@/domains/swap/state";

const metrics = new Hono();

interface MetricsStore {
  httpRequestsTotal: number;
  httpRequestDuration: number[];
  swapsSettled: number;
  swapsAborted: Record<SwapErrorCode, number>;
}

// Simple metrics store (in production, use prom-client)
const metricsStore: MetricsStore = {
  httpRequestsTotal: 0,
  httpRequestDuration: [],
  swapsSettled: 0,
  swapsAborted: {
    INVALID_REQUEST: 0,
    TRANSFER_DENIED: 0,
    AUTHORIZATION_DENIED: 0,
    SLIPPAGE_EXCEEDED: 0,
    EXPIRED: 0,
    ROUTE_UNAVAILABLE: 0,
    VENUE_UNAVAILABLE: 0,
    ROLLBACK_FAILED: 0,
  },
};

metrics.get("/", (c) => {
  const aborted = SWAP_ERROR_CODES.map(
    (code) => `swaps_aborted_total{code="${code}"} ${metricsStore.swapsAborted[code]}`,
  ).join("\n");

  const prometheusFormat = `
# HELP http_requests_total Total number of HTTP requests
# TYPE http_requests_total counter
http_requests_total ${metricsStore.httpRequestsTotal}

# HELP http_request_duration_seconds HTTP request duration in seconds
# TYPE http_request_duration_seconds histogram
http_request_duration_seconds_bucket{le="0.1"} ${metricsStore.httpRequestDuration.filter((d) => d < 100).length}
http_request_duration_seconds_bucket{le="0.5"} ${metricsStore.httpRequestDuration.filter((d) => d < 500).length}
http_request_duration_seconds_bucket{le="1.0"} ${metricsStore.httpRequestDuration.filter((d) => d < 1000).length}
http_request_duration_seconds_bucket{le="+Inf"} ${metricsStore.httpRequestDuration.length}

# HELP swaps_settled_total Swaps settled to the caller
# TYPE swaps_settled_total counter
swaps_settled_total ${metricsStore.swapsSettled}

# HELP swaps_aborted_total Swaps aborted and rolled back, by error code
# TYPE swaps_aborted_total counter
${aborted}
`.trim();

  return c.text(prometheusFormat, 200, {
    "Content-Type": "text/plain; version=0.0.4",
  });
});

export const incrementMetric = (metric: "httpRequestsTotal"): void => {
  metricsStore[metric]++;
};

export const recordDuration = (durationMs: number): void => {
  metricsStore.httpRequestDuration.push(durationMs);
  // Keep only last 1000 durations to prevent memory growth
  if (metricsStore.httpRequestDuration.length > 1000) {
    metricsStore.httpRequestDuration.shift();
  }
};

export const recordSwapOutcome = (execution: SwapExecution): void => {
  if (execution.status === "SETTLED") {
    metricsStore.swapsSettled++;
  } else if (execution.errorCode) {
    metricsStore.swapsAborted[execution.errorCode]++;
  }
};

export { metrics };
