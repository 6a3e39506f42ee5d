import { logger } from "../lib/logger";
import { createBatchChecker } from "./batch";
import { type ProbeDependencies, createProbe } from "./probe";
import type { BatchOutcome, CheckResult, CheckerConfig } from "./types";

export interface DomainChecker {
  readonly config: CheckerConfig;
  checkOne(domain: string): Promise<CheckResult>;
  checkMany(domains: readonly string[]): Promise<BatchOutcome>;
}

/**
 * Wire the prober and batch aggregator for one configuration
 */
export function createDomainChecker(
  config: CheckerConfig,
  deps: Partial<ProbeDependencies> = {},
): DomainChecker {
  const probe = createProbe(config, deps);
  const checkBatch = createBatchChecker(config, probe);

  logger.debug({ config }, "Domain checker created");

  return {
    config,
    checkOne: (domain) => probe(domain),
    checkMany: (domains) => checkBatch(domains),
  };
}

export { summarizeResults, validateBatchSize } from "./batch";
export { cleanCandidateDomains } from "./candidates";
export { normalizeUrl } from "./normalize";
export { describeError } from "./probe";
export { describeStatus, getStatusMessage } from "./status-messages";
export type * from "./types";
