/**
 * Service info routes
 * GET / - API overview
 * GET /api/health - Liveness with timestamp
 * GET /metrics - Prometheus scrape endpoint
 */

import type { FastifyInstance } from "fastify";
import type { AppConfig } from "../../lib/config";
import { getMetrics, getMetricsContentType } from "../../lib/prometheus";
import { formatTimestamp } from "../../lib/timestamp";

export async function registerInfoRoutes(
  fastify: FastifyInstance,
  config: AppConfig,
  now: () => Date = () => new Date(),
): Promise<void> {
  const app = fastify;
  const timezone = config.checker.timestampTimezone;

  app.get("/api/health", async () => ({
    status: "healthy",
    timestamp: formatTimestamp(now(), timezone),
    version: config.version,
  }));

  app.get("/", async () => ({
    message: "Website Status Checker API",
    version: config.version,
    endpoints: {
      "POST /api/check-single": "Check single domain status",
      "POST /api/check-bulk": "Check multiple domains status",
      "POST /api/upload-file": "Upload and process CSV/Excel file",
      "GET /api/health": "Health check",
      "GET /metrics": "Prometheus metrics",
    },
    documentation: {
      "check-single": {
        method: "POST",
        body: { domain: "example.com" },
        description: "Check status of a single domain",
      },
      "check-bulk": {
        method: "POST",
        body: { domains: ["example.com", "example.org"] },
        description: `Check status of up to ${config.checker.maxBatchSize} domains`,
      },
    },
  }));

  app.get("/metrics", async (_request, reply) => {
    const metrics = await getMetrics();
    return reply.header("Content-Type", getMetricsContentType()).send(metrics);
  });
}
