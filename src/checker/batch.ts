import { logger } from "../lib/logger";
import { recordBatch } from "../lib/prometheus";
import { mapWithConcurrency } from "./pool";
import type { BatchOutcome, BatchSummary, CheckResult, CheckerConfig, DomainProbe } from "./types";

const isNumeric = (result: CheckResult): result is CheckResult & { status: number } =>
  typeof result.status === "number";

const inRange = (result: CheckResult, min: number, max: number): boolean =>
  isNumeric(result) && result.status >= min && result.status < max;

/**
 * Tally a result sequence. Each bucket is counted on its own, so a numeric
 * status below 200 lands in none of them and the buckets can sum to less
 * than `total`.
 */
export function summarizeResults(results: readonly CheckResult[]): BatchSummary {
  return {
    total: results.length,
    active: results.filter((r) => inRange(r, 200, 300)).length,
    inactive: results.filter((r) => inRange(r, 400, 500)).length,
    errors: results.filter((r) => !isNumeric(r) || r.status >= 500).length,
    redirects: results.filter((r) => inRange(r, 300, 400)).length,
  };
}

/**
 * Check whether a batch may be probed. Returns the rejection message, or null.
 */
export function validateBatchSize(domains: readonly string[], maxBatchSize: number): string | null {
  if (domains.length === 0) {
    return "At least one domain is required";
  }
  if (domains.length > maxBatchSize) {
    return `Maximum ${maxBatchSize} domains allowed`;
  }
  return null;
}

/**
 * Create a batch checker over the given prober
 */
export function createBatchChecker(config: CheckerConfig, probe: DomainProbe) {
  return async function checkBatch(domains: readonly string[]): Promise<BatchOutcome> {
    const rejection = validateBatchSize(domains, config.maxBatchSize);
    if (rejection) {
      recordBatch("rejected");
      logger.debug({ size: domains.length, rejection }, "Batch rejected");
      return { ok: false, error: rejection };
    }

    const targets = domains.map((domain) => domain.trim()).filter((domain) => domain.length > 0);
    const started = Date.now();

    const results = await mapWithConcurrency(targets, config.concurrency, (domain) => probe(domain));
    const summary = summarizeResults(results);

    recordBatch("accepted");
    logger.info(
      { requested: domains.length, checked: targets.length, durationMs: Date.now() - started, summary },
      "Batch check complete",
    );

    return { ok: true, results, summary };
  };
}
