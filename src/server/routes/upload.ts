/**
 * Upload route
 * POST /api/upload-file - Extract candidate domains from a CSV or Excel file
 */

import type { FastifyInstance } from "fastify";
import { type DomainChecker, cleanCandidateDomains, describeError } from "../../checker";
import { extractDomainCandidates } from "../../extract/spreadsheet";
import { logger } from "../../lib/logger";
import type { UploadResponse } from "../../types/schemas/check";

export async function registerUploadRoutes(
  fastify: FastifyInstance,
  checker: DomainChecker,
): Promise<void> {
  const app = fastify;

  /**
   * POST /api/upload-file
   *
   * Multipart form with a `file` field (.csv, .xlsx or .xls). Other parts are
   * read and ignored; the first `file` part wins.
   *
   * Response:
   *   200 OK: { domains: string[], total_found: number }
   *   400 Bad Request: no file, unsupported format, or no valid domains
   *   413 Payload Too Large: file exceeds the upload limit
   *   500 Internal Server Error: the file could not be parsed
   */
  app.post("/api/upload-file", async (request, reply) => {
    if (!request.isMultipart()) {
      return reply.status(400).send({ error: "No file uploaded" });
    }

    let upload: { filename: string; content: Buffer } | undefined;
    for await (const part of request.parts()) {
      if (part.type !== "file") {
        continue;
      }
      // Every file stream must be drained for iteration to continue; size-limit errors surface here as 413
      const content = await part.toBuffer();
      if (part.fieldname === "file" && upload === undefined) {
        upload = { filename: part.filename, content };
      }
    }

    if (!upload) {
      return reply.status(400).send({ error: "No file uploaded" });
    }
    if (upload.filename === "") {
      return reply.status(400).send({ error: "No file selected" });
    }
    const { filename, content } = upload;

    let extraction: ReturnType<typeof extractDomainCandidates>;
    try {
      extraction = extractDomainCandidates(filename, content);
    } catch (error) {
      logger.warn({ filename, error }, "Failed to parse uploaded file");
      return reply.status(500).send({ error: `Error processing file: ${describeError(error)}` });
    }

    if (!extraction.ok) {
      return reply
        .status(400)
        .send({ error: "Unsupported file format. Please use CSV or Excel files." });
    }

    const { domains, totalFound } = cleanCandidateDomains(
      extraction.values,
      checker.config.maxBatchSize,
    );
    if (totalFound === 0) {
      return reply.status(400).send({ error: "No valid domains found in the file" });
    }

    logger.info(
      {
        filename,
        format: extraction.format,
        column: extraction.column,
        totalFound,
        returned: domains.length,
      },
      "Extracted domains from upload",
    );

    const response: UploadResponse = { domains, total_found: totalFound };
    return response;
  });
}
