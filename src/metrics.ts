import { Registry, Histogram, Counter } from "prom-client";

export type RequestOutcome =
  | "ok"
  | "protocol_error"
  | "transport_error"
  | "malformed_response";

export const registry = new Registry();

export const requestCounter = new Counter<"method" | "outcome">({
  name: "delivery_requests_total",
  help: "Signed API calls by method and outcome",
  labelNames: ["method", "outcome"],
  registers: [registry],
});

export const requestDuration = new Histogram<"method">({
  name: "delivery_request_duration_ms",
  help: "Round-trip latency of signed API calls (ms)",
  labelNames: ["method"],
  buckets: [25, 50, 100, 250, 500, 1000, 2500, 5000],
  registers: [registry],
});
