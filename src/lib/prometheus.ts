/**
 * Prometheus Metrics Export
 *
 * Probe and batch counters for the checker, plus default Node.js
 * process metrics, served on GET /metrics.
 */

import { Counter, collectDefaultMetrics, Histogram, Registry } from "prom-client";
import type { ProbeOutcome } from "../checker/types";

const registry = new Registry();

collectDefaultMetrics({ register: registry });

/**
 * Probes performed, by outcome kind
 */
export const probesTotal = new Counter({
  name: "site_checker_probes_total",
  help: "Total number of domain probes performed",
  labelNames: ["outcome"] as const,
  registers: [registry],
});

/**
 * Time until response headers, for probes that got a response
 */
export const probeDuration = new Histogram({
  name: "site_checker_probe_duration_seconds",
  help: "Probe response time in seconds",
  buckets: [0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

/**
 * Batch requests, accepted or rejected
 */
export const batchesTotal = new Counter({
  name: "site_checker_batches_total",
  help: "Total number of batch check requests",
  labelNames: ["result"] as const,
  registers: [registry],
});

export function recordProbe(outcome: ProbeOutcome): void {
  probesTotal.inc({ outcome: outcome.kind });
  if (outcome.kind === "response") {
    probeDuration.observe(outcome.elapsedSeconds);
  }
}

export function recordBatch(result: "accepted" | "rejected"): void {
  batchesTotal.inc({ result });
}

/**
 * Get metrics in Prometheus text format
 */
export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getMetricsContentType(): string {
  return registry.contentType;
}
