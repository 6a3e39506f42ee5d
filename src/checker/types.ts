/**
 * Checker Types
 * Shared shapes for probing domains and reporting batches
 */

/**
 * Outcome kinds reported in place of an HTTP status when no response arrived
 */
export type SentinelStatus = "TIMEOUT" | "CONNECTION_ERROR" | "ERROR";

export type CheckStatus = number | SentinelStatus;

export type TimestampTimezone = "local" | "utc";

/**
 * Result of a single domain check, as returned to API callers.
 * `response_time` is set exactly when `status` is numeric.
 */
export interface CheckResult {
  readonly domain: string;
  readonly status: CheckStatus;
  readonly message: string;
  readonly timestamp: string;
  readonly response_time: number | null;
}

export interface BatchSummary {
  total: number;
  active: number;
  inactive: number;
  errors: number;
  redirects: number;
}

/**
 * What a probe observed, before it is rendered into a CheckResult
 */
export type ProbeOutcome =
  | { kind: "response"; status: number; elapsedSeconds: number }
  | { kind: "timeout" }
  | { kind: "connection_error"; code: string }
  | { kind: "error"; detail: string };

export type BatchOutcome =
  | { ok: true; results: CheckResult[]; summary: BatchSummary }
  | { ok: false; error: string };

export interface CheckerConfig {
  readonly timeoutMs: number;
  readonly concurrency: number;
  readonly maxBatchSize: number;
  readonly userAgent: string;
  readonly timestampTimezone: TimestampTimezone;
}

/**
 * Minimal response surface the prober reads
 */
export interface ProbeResponse {
  status: number;
  body: { cancel(): Promise<void> } | null;
}

export interface ProbeRequestInit {
  method: "GET";
  headers: Record<string, string>;
  redirect: "follow";
  signal: AbortSignal;
}

/**
 * HTTP client injected into the prober (global fetch in production)
 */
export type FetchFn = (url: string, init: ProbeRequestInit) => Promise<ProbeResponse>;

export type DomainProbe = (domain: string) => Promise<CheckResult>;
