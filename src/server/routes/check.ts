/**
 * Check routes
 * POST /api/check-single - Check one domain
 * POST /api/check-bulk - Check a list of domains
 */

import type { FastifyInstance } from "fastify";
import type { DomainChecker } from "../../checker";
import { CheckBulkBodySchema, CheckSingleBodySchema } from "../../types/schemas/check";
import { firstIssueMessage } from "../errors";

export async function registerCheckRoutes(
  fastify: FastifyInstance,
  checker: DomainChecker,
): Promise<void> {
  const app = fastify;

  /**
   * POST /api/check-single
   *
   * Request body:
   *   domain: string (required, non-blank)
   *
   * Response:
   *   200 OK: CheckResult
   *   400 Bad Request: { error: "..." }
   */
  app.post("/api/check-single", async (request, reply) => {
    const parseResult = CheckSingleBodySchema.safeParse(request.body);
    if (!parseResult.success) {
      return reply.status(400).send({ error: firstIssueMessage(parseResult.error) });
    }

    return checker.checkOne(parseResult.data.domain);
  });

  /**
   * POST /api/check-bulk
   *
   * Request body:
   *   domains: string[] (1 to maxBatchSize entries; blank entries are skipped)
   *
   * Response:
   *   200 OK: { results: CheckResult[], summary: BatchSummary }
   *   400 Bad Request: { error: "..." }
   */
  app.post("/api/check-bulk", async (request, reply) => {
    const parseResult = CheckBulkBodySchema.safeParse(request.body);
    if (!parseResult.success) {
      return reply.status(400).send({ error: firstIssueMessage(parseResult.error) });
    }

    const outcome = await checker.checkMany(parseResult.data.domains);
    if (!outcome.ok) {
      return reply.status(400).send({ error: outcome.error });
    }

    return { results: outcome.results, summary: outcome.summary };
  });
}
