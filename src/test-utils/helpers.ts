/**
 * Test helper utilities
 */

import type { CheckResult, CheckStatus, CheckerConfig } from "../checker/types";
import { loadConfig, type AppConfig } from "../lib/config";

export const FIXED_DATE = new Date(2024, 2, 5, 9, 7, 3);
export const FIXED_TIMESTAMP = "2024-03-05 09:07:03";

export function createCheckerConfig(overrides: Partial<CheckerConfig> = {}): CheckerConfig {
  return {
    timeoutMs: 10_000,
    concurrency: 10,
    maxBatchSize: 100,
    userAgent: "test-agent/1.0",
    timestampTimezone: "local",
    ...overrides,
  };
}

export function createAppConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ NODE_ENV: "test", ...env });
}

/**
 * Monotonic clock that advances by `stepMs` on every read
 */
export function createSteppingClock(startMs = 1_000, stepMs = 250): () => number {
  let current = startMs - stepMs;
  return () => {
    current += stepMs;
    return current;
  };
}

/**
 * Result record with only the status mattering
 */
export function createResult(status: CheckStatus, domain = "example.com"): CheckResult {
  return {
    domain,
    status,
    message: "",
    timestamp: FIXED_TIMESTAMP,
    response_time: typeof status === "number" ? 0.1 : null,
  };
}

export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
