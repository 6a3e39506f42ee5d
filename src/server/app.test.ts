import type { FastifyInstance } from "fastify";
import { afterEach, describe, expect, test } from "vitest";
import { createDomainChecker } from "../checker";
import {
  CheckBulkResponseSchema,
  CheckResultSchema,
  UploadResponseSchema,
} from "../types/schemas/check";
import {
  FIXED_DATE,
  FIXED_TIMESTAMP,
  createAppConfig,
  createSteppingClock,
} from "../test-utils/helpers";
import {
  buildMultipart,
  buildMultipartParts,
  buildWorkbook,
  websitesCsv,
} from "../test-utils/fixtures/uploads";
import { createFakeFetch, createNetworkError } from "../test-utils/mocks/fetch";
import { createApp } from "./app";

let app: FastifyInstance | null = null;

async function buildApp(env: NodeJS.ProcessEnv = {}, table: Record<string, number | Error> = {}) {
  const config = createAppConfig(env);
  const { fetch } = createFakeFetch(table);
  const checker = createDomainChecker(config.checker, {
    fetch,
    clock: createSteppingClock(1_000, 250),
    now: () => FIXED_DATE,
  });
  app = await createApp({ config, checker, now: () => FIXED_DATE });
  return app;
}

afterEach(async () => {
  if (app) {
    await app.close();
    app = null;
  }
});

describe("info routes", () => {
  test("GET /api/health reports status, timestamp and version", async () => {
    const server = await buildApp();
    const res = await server.inject({ method: "GET", url: "/api/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: "healthy",
      timestamp: FIXED_TIMESTAMP,
      version: "1.0.0",
    });
  });

  test("GET / describes the API", async () => {
    const server = await buildApp();
    const res = await server.inject({ method: "GET", url: "/" });

    expect(res.statusCode).toBe(200);
    expect(res.json().message).toBe("Website Status Checker API");
    expect(res.json().endpoints["POST /api/check-bulk"]).toBe("Check multiple domains status");
  });

  test("GET /metrics exposes probe counters", async () => {
    const server = await buildApp();
    const res = await server.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toContain("text/plain");
    expect(res.body).toContain("# TYPE site_checker_probes_total counter");
  });
});

describe("POST /api/check-single", () => {
  test("returns the check result for a trimmed domain", async () => {
    const server = await buildApp({}, { "https://example.com": 200 });
    const res = await server.inject({
      method: "POST",
      url: "/api/check-single",
      payload: { domain: "  example.com " },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      domain: "example.com",
      status: 200,
      message: "✅ Site is Live",
      timestamp: FIXED_TIMESTAMP,
      response_time: 0.25,
    });
    expect(CheckResultSchema.safeParse(res.json()).success).toBe(true);
  });

  test("answers 200 with a classified failure for an unreachable domain", async () => {
    const server = await buildApp({}, { "https://gone.example": createNetworkError("ENOTFOUND") });
    const res = await server.inject({
      method: "POST",
      url: "/api/check-single",
      payload: { domain: "gone.example" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      domain: "gone.example",
      status: "CONNECTION_ERROR",
      message: "❌ Connection Failed",
      timestamp: FIXED_TIMESTAMP,
      response_time: null,
    });
  });

  test("rejects a request without a body", async () => {
    const server = await buildApp();
    const res = await server.inject({ method: "POST", url: "/api/check-single" });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "Domain is required" });
  });

  const invalidBodies: Array<[string, unknown, string]> = [
    ["missing domain", {}, "Domain is required"],
    ["empty domain", { domain: "" }, "Domain cannot be empty"],
    ["blank domain", { domain: "   " }, "Domain cannot be empty"],
    ["non-string domain", { domain: 42 }, "Domain must be a string"],
  ];

  for (const [label, payload, error] of invalidBodies) {
    test(`rejects ${label}`, async () => {
      const server = await buildApp();
      const res = await server.inject({
        method: "POST",
        url: "/api/check-single",
        headers: { "content-type": "application/json" },
        payload: JSON.stringify(payload),
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error });
    });
  }
});

describe("POST /api/check-bulk", () => {
  test("returns ordered results and a summary, skipping blanks", async () => {
    const server = await buildApp(
      {},
      {
        "https://live.example": 200,
        "https://missing.example": 404,
        "https://gone.example": createNetworkError("ECONNREFUSED"),
      },
    );
    const res = await server.inject({
      method: "POST",
      url: "/api/check-bulk",
      payload: { domains: ["live.example", "", "missing.example", "  ", "gone.example"] },
    });

    expect(res.statusCode).toBe(200);
    const body = CheckBulkResponseSchema.parse(res.json());
    expect(body.results.map((r) => [r.domain, r.status])).toEqual([
      ["live.example", 200],
      ["missing.example", 404],
      ["gone.example", "CONNECTION_ERROR"],
    ]);
    expect(body.summary).toEqual({
      total: 3,
      active: 1,
      inactive: 1,
      errors: 1,
      redirects: 0,
    });
  });

  test("accepts a batch at the size limit", async () => {
    const server = await buildApp();
    const domains = Array.from({ length: 100 }, (_, i) => `site${i}.example`);
    const res = await server.inject({ method: "POST", url: "/api/check-bulk", payload: { domains } });

    expect(res.statusCode).toBe(200);
    expect(res.json().summary.total).toBe(100);
  });

  const invalidBodies: Array<[string, unknown, string]> = [
    ["missing domains", {}, "Domains list is required"],
    ["non-list domains", { domains: "example.com" }, "Domains must be a list"],
    ["non-string entries", { domains: ["a.com", 7] }, "Each domain must be a string"],
    ["an empty list", { domains: [] }, "At least one domain is required"],
    [
      "more than 100 domains",
      { domains: Array.from({ length: 101 }, (_, i) => `site${i}.example`) },
      "Maximum 100 domains allowed",
    ],
  ];

  for (const [label, payload, error] of invalidBodies) {
    test(`rejects ${label}`, async () => {
      const server = await buildApp();
      const res = await server.inject({
        method: "POST",
        url: "/api/check-bulk",
        headers: { "content-type": "application/json" },
        payload: JSON.stringify(payload),
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error });
    });
  }
});

describe("POST /api/upload-file", () => {
  test("extracts domains from a CSV upload", async () => {
    const server = await buildApp();
    const upload = buildMultipart("file", "sites.csv", websitesCsv, "text/csv");
    const res = await server.inject({ method: "POST", url: "/api/upload-file", ...upload });

    expect(res.statusCode).toBe(200);
    expect(UploadResponseSchema.parse(res.json())).toEqual({
      domains: ["acme.com", "gamma.io"],
      total_found: 2,
    });
  });

  test("extracts domains from an Excel upload", async () => {
    const server = await buildApp();
    const workbook = buildWorkbook([["URL"], ["alpha.com"], ["# retired.com"], ["beta.net"]]);
    const upload = buildMultipart("file", "sites.xlsx", workbook);
    const res = await server.inject({ method: "POST", url: "/api/upload-file", ...upload });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ domains: ["alpha.com", "beta.net"], total_found: 2 });
  });

  test("caps returned domains at the batch size", async () => {
    const server = await buildApp({ MAX_BATCH_SIZE: "2" });
    const upload = buildMultipart("file", "sites.csv", "domain\na.com\nb.com\nc.com\n");
    const res = await server.inject({ method: "POST", url: "/api/upload-file", ...upload });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ domains: ["a.com", "b.com"], total_found: 3 });
  });

  test("rejects unsupported file types", async () => {
    const server = await buildApp();
    const upload = buildMultipart("file", "sites.txt", "example.com\n");
    const res = await server.inject({ method: "POST", url: "/api/upload-file", ...upload });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "Unsupported file format. Please use CSV or Excel files." });
  });

  test("rejects files without valid domains", async () => {
    const server = await buildApp();
    const upload = buildMultipart("file", "sites.csv", "domain\nlocalhost\n#comment.com\n");
    const res = await server.inject({ method: "POST", url: "/api/upload-file", ...upload });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "No valid domains found in the file" });
  });

  test("rejects requests that are not multipart", async () => {
    const server = await buildApp();
    const res = await server.inject({
      method: "POST",
      url: "/api/upload-file",
      payload: { file: "sites.csv" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "No file uploaded" });
  });

  test("rejects a file sent under another field name", async () => {
    const server = await buildApp();
    const upload = buildMultipart("attachment", "sites.csv", websitesCsv);
    const res = await server.inject({ method: "POST", url: "/api/upload-file", ...upload });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "No file uploaded" });
  });

  test("rejects a file part with an empty filename", async () => {
    const server = await buildApp();
    const upload = buildMultipart("file", "", websitesCsv);
    const res = await server.inject({ method: "POST", url: "/api/upload-file", ...upload });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "No file selected" });
  });

  test("finds the file field after other parts", async () => {
    const server = await buildApp();
    const upload = buildMultipartParts([
      { fieldName: "note", content: "weekly check" },
      { fieldName: "attachment", filename: "other.csv", content: "domain\nignored.com\n" },
      { fieldName: "file", filename: "sites.csv", content: websitesCsv, contentType: "text/csv" },
    ]);
    const res = await server.inject({ method: "POST", url: "/api/upload-file", ...upload });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ domains: ["acme.com", "gamma.io"], total_found: 2 });
  });

  test("reports parse failures as a server error", async () => {
    const server = await buildApp();
    const upload = buildMultipart("file", "bad.csv", 'domain\n"unterminated');
    const res = await server.inject({ method: "POST", url: "/api/upload-file", ...upload });

    expect(res.statusCode).toBe(500);
    expect(res.json().error).toMatch(/^Error processing file: /);
  });

  test("rejects files over the upload limit", async () => {
    const server = await buildApp({ MAX_UPLOAD_BYTES: "16" });
    const upload = buildMultipart("file", "sites.csv", `domain\n${"a.com\n".repeat(20)}`);
    const res = await server.inject({ method: "POST", url: "/api/upload-file", ...upload });

    expect(res.statusCode).toBe(413);
  });
});
