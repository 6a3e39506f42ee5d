import fastifyCors from "@fastify/cors";
import fastifyMultipart from "@fastify/multipart";
import Fastify, { type FastifyBaseLogger, type FastifyError, type FastifyInstance } from "fastify";
import { ZodError } from "zod";
import type { DomainChecker } from "../checker";
import type { AppConfig } from "../lib/config";
import { logger } from "../lib/logger";
import { clientErrorStatus, firstIssueMessage } from "./errors";
import { registerCheckRoutes } from "./routes/check";
import { registerInfoRoutes } from "./routes/info";
import { registerUploadRoutes } from "./routes/upload";

export interface AppOptions {
  config: AppConfig;
  checker: DomainChecker;
  /** Clock for the health endpoint timestamp */
  now?: () => Date;
}

export async function createApp(options: AppOptions): Promise<FastifyInstance> {
  const { config, checker } = options;
  const loggerInstance: FastifyBaseLogger = logger;

  const app = Fastify({
    loggerInstance,
    trustProxy: true,
  });

  await app.register(fastifyCors, {
    origin: config.corsOrigin,
  });

  await app.register(fastifyMultipart, {
    limits: {
      fileSize: config.maxUploadBytes,
      files: 5,
    },
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({ error: firstIssueMessage(error) });
    }

    const status = clientErrorStatus(error);
    if (status !== null) {
      return reply.status(status).send({ error: error.message });
    }

    logger.error({ error, url: request.url, method: request.method }, "Unhandled error");

    return reply.status(500).send({ error: "Internal server error" });
  });

  await registerInfoRoutes(app, config, options.now);
  await registerCheckRoutes(app, checker);
  await registerUploadRoutes(app, checker);

  return app;
}
