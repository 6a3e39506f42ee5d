/**
 * Site Status Checker entry point
 *
 * Serves the bulk availability-check API over HTTP.
 */

import "dotenv/config";
import { createDomainChecker } from "./checker";
import { loadConfig, logConfig } from "./lib/config";
import { logger } from "./lib/logger";
import { createApp } from "./server/app";

type App = Awaited<ReturnType<typeof createApp>>;

let app: App | null = null;

async function main() {
  const config = loadConfig();
  logConfig(config);

  const checker = createDomainChecker(config.checker);
  app = await createApp({ config, checker });

  await app.listen({ port: config.port, host: config.host });
  logger.info({ port: config.port, host: config.host }, "Site status checker started");
}

const gracefulShutdown = async () => {
  logger.info("Shutting down gracefully...");

  if (app) {
    await app.close();
  }

  logger.info("Shutdown complete");
  process.exit(0);
};

const onSignal = () => {
  gracefulShutdown().catch((error) => {
    logger.error(error, "Error during shutdown");
    process.exit(1);
  });
};

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

main().catch((error) => {
  logger.error(error, "Fatal error during startup");
  process.exit(1);
});
