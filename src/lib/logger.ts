import "dotenv/config";
import pino from "pino";

/**
 * Level from LOG_LEVEL, else debug in development, info in production
 * and silent under tests
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === "test") return "silent";
  return env.NODE_ENV === "production" ? "info" : "debug";
}

const env = process.env.NODE_ENV;
const isDev = env !== "production" && env !== "test";
const logLevel = resolveLogLevel();

export const logger = pino(
  isDev
    ? {
        level: logLevel,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      }
    : {
        level: logLevel,
      },
);
