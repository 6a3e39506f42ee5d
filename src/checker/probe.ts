import { logger } from "../lib/logger";
import { recordProbe } from "../lib/prometheus";
import { formatTimestamp } from "../lib/timestamp";
import { normalizeUrl } from "./normalize";
import { describeStatus } from "./status-messages";
import type {
  CheckResult,
  CheckerConfig,
  DomainProbe,
  FetchFn,
  ProbeOutcome,
  ProbeResponse,
} from "./types";

/**
 * Injectable collaborators of the prober
 */
export interface ProbeDependencies {
  fetch: FetchFn;
  /** Monotonic milliseconds, used for response time */
  clock: () => number;
  /** Wall clock, used for the result timestamp */
  now: () => Date;
}

const defaultDependencies: ProbeDependencies = {
  fetch: (url, init) => fetch(url, init),
  clock: () => performance.now(),
  now: () => new Date(),
};

const TIMEOUT_CODES: ReadonlySet<string> = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
]);

const CONNECTION_CODES: ReadonlySet<string> = new Set([
  "ENOTFOUND",
  "EAI_AGAIN",
  "EAI_FAIL",
  "EAI_NONAME",
  "ECONNREFUSED",
  "ECONNRESET",
  "ECONNABORTED",
  "EHOSTUNREACH",
  "EHOSTDOWN",
  "ENETUNREACH",
  "ENETDOWN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED",
]);

const MAX_CAUSE_DEPTH = 5;

function isTlsCode(code: string): boolean {
  return (
    code.startsWith("ERR_TLS_") ||
    code.startsWith("ERR_SSL_") ||
    code.includes("CERT") ||
    code.includes("SSL")
  );
}

function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

/**
 * Collect `code` values from an error, its cause chain and any aggregated errors.
 * fetch wraps socket and DNS failures as `TypeError("fetch failed", { cause })`.
 */
function collectErrorCodes(error: unknown, depth = 0): string[] {
  if (depth > MAX_CAUSE_DEPTH || typeof error !== "object" || error === null) {
    return [];
  }

  const codes: string[] = [];
  if ("code" in error && typeof error.code === "string") {
    codes.push(error.code);
  }
  if (error instanceof AggregateError) {
    for (const inner of error.errors) {
      codes.push(...collectErrorCodes(inner, depth + 1));
    }
  }
  if ("cause" in error) {
    codes.push(...collectErrorCodes(error.cause, depth + 1));
  }
  return codes;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    if (error.cause instanceof Error && error.cause.message) {
      return `${error.message}: ${error.cause.message}`;
    }
    return error.message || error.name;
  }
  return String(error);
}

/**
 * Map a failed request onto a probe outcome
 */
export function classifyFetchError(error: unknown, timedOut = false): ProbeOutcome {
  if (timedOut || isAbortError(error)) {
    return { kind: "timeout" };
  }

  const codes = collectErrorCodes(error);
  if (codes.some((code) => TIMEOUT_CODES.has(code))) {
    return { kind: "timeout" };
  }

  const connectionCode = codes.find((code) => CONNECTION_CODES.has(code) || isTlsCode(code));
  if (connectionCode !== undefined) {
    return { kind: "connection_error", code: connectionCode };
  }

  return { kind: "error", detail: describeError(error) };
}

async function discardBody(response: ProbeResponse, url: string): Promise<void> {
  if (!response.body) return;
  try {
    await response.body.cancel();
  } catch (error) {
    logger.debug({ url, error }, "Failed to discard response body");
  }
}

/**
 * Issue one GET against an already normalized URL
 */
async function requestOnce(
  url: string,
  config: CheckerConfig,
  deps: ProbeDependencies,
): Promise<ProbeOutcome> {
  const controller = new AbortController();
  let timedOut = false;
  const timeoutHandle = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.timeoutMs);

  const startTime = deps.clock();

  try {
    const response = await deps.fetch(url, {
      method: "GET",
      headers: { "User-Agent": config.userAgent },
      redirect: "follow",
      signal: controller.signal,
    });
    const elapsedSeconds = (deps.clock() - startTime) / 1000;

    await discardBody(response, url);

    return { kind: "response", status: response.status, elapsedSeconds };
  } catch (error) {
    return classifyFetchError(error, timedOut);
  } finally {
    clearTimeout(timeoutHandle);
  }
}

/**
 * Render a probe outcome as the result record returned to callers
 */
export function toCheckResult(domain: string, outcome: ProbeOutcome, timestamp: string): CheckResult {
  switch (outcome.kind) {
    case "response":
      return {
        domain,
        status: outcome.status,
        message: describeStatus(outcome.status),
        timestamp,
        response_time: outcome.elapsedSeconds,
      };
    case "timeout":
      return {
        domain,
        status: "TIMEOUT",
        message: describeStatus("TIMEOUT"),
        timestamp,
        response_time: null,
      };
    case "connection_error":
      return {
        domain,
        status: "CONNECTION_ERROR",
        message: describeStatus("CONNECTION_ERROR"),
        timestamp,
        response_time: null,
      };
    case "error":
      return {
        domain,
        status: "ERROR",
        message: describeStatus("ERROR", outcome.detail),
        timestamp,
        response_time: null,
      };
    default: {
      const exhaustive: never = outcome;
      throw new Error(`Unknown probe outcome: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/**
 * Create a prober for the given configuration.
 * The returned function resolves for every input; failures become
 * TIMEOUT, CONNECTION_ERROR or ERROR results.
 */
export function createProbe(
  config: CheckerConfig,
  overrides: Partial<ProbeDependencies> = {},
): DomainProbe {
  const deps: ProbeDependencies = { ...defaultDependencies, ...overrides };

  return async (domain: string): Promise<CheckResult> => {
    let outcome: ProbeOutcome;
    try {
      outcome = await requestOnce(normalizeUrl(domain), config, deps);
    } catch (error) {
      outcome = { kind: "error", detail: describeError(error) };
    }

    recordProbe(outcome);
    logger.debug({ domain, outcome }, "Probe finished");

    return toCheckResult(domain, outcome, formatTimestamp(deps.now(), config.timestampTimezone));
  };
}
