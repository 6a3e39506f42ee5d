import { z } from "zod";
import type { CheckerConfig } from "../checker/types";
import { logger } from "./logger";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().min(1).default(fallback);

/**
 * Environment variables understood by the service.
 * Unknown variables are ignored.
 */
const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().min(1).default("0.0.0.0"),
  NODE_ENV: z.string().default("development"),
  CHECK_TIMEOUT_SECONDS: z.coerce.number().positive().max(300).default(10),
  CHECK_CONCURRENCY: positiveInt(10).pipe(z.number().max(100)),
  MAX_BATCH_SIZE: positiveInt(100),
  TIMESTAMP_TIMEZONE: z.enum(["local", "utc"]).default("local"),
  CORS_ORIGIN: z.string().default("*"),
  MAX_UPLOAD_BYTES: positiveInt(5 * 1024 * 1024),
});

export interface AppConfig {
  readonly port: number;
  readonly host: string;
  readonly env: string;
  readonly isDev: boolean;
  readonly version: string;
  readonly corsOrigin: string | string[];
  readonly maxUploadBytes: number;
  readonly checker: CheckerConfig;
}

const APP_VERSION = "1.0.0";

/**
 * Desktop Chrome user agent sent with every probe
 */
export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36";

function parseCorsOrigin(raw: string): string | string[] {
  const origins = raw
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  if (origins.length === 1 && origins[0] !== undefined) {
    return origins[0];
  }
  return origins;
}

/**
 * Build the application configuration from an environment map.
 * Throws a ZodError when a variable is present but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);

  const checker: CheckerConfig = Object.freeze({
    timeoutMs: Math.round(parsed.CHECK_TIMEOUT_SECONDS * 1000),
    concurrency: parsed.CHECK_CONCURRENCY,
    maxBatchSize: parsed.MAX_BATCH_SIZE,
    userAgent: BROWSER_USER_AGENT,
    timestampTimezone: parsed.TIMESTAMP_TIMEZONE,
  });

  return Object.freeze({
    port: parsed.PORT,
    host: parsed.HOST,
    env: parsed.NODE_ENV,
    isDev: parsed.NODE_ENV !== "production",
    version: APP_VERSION,
    corsOrigin: parseCorsOrigin(parsed.CORS_ORIGIN),
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    checker,
  });
}

export function logConfig(config: AppConfig): void {
  logger.info(
    {
      env: config.env,
      host: config.host,
      port: config.port,
      timeoutMs: config.checker.timeoutMs,
      concurrency: config.checker.concurrency,
      maxBatchSize: config.checker.maxBatchSize,
      timestampTimezone: config.checker.timestampTimezone,
    },
    "Configuration loaded",
  );
}
