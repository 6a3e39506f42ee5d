/**
 * Zod schemas for the check endpoints
 * Messages are returned verbatim to API callers
 */

import { z } from "zod";

/**
 * POST /api/check-single body
 */
export const CheckSingleBodySchema = z.object(
  {
    domain: z
      .string({
        required_error: "Domain is required",
        invalid_type_error: "Domain must be a string",
      })
      .trim()
      .min(1, "Domain cannot be empty"),
  },
  {
    required_error: "Domain is required",
    invalid_type_error: "Domain is required",
  },
);

/**
 * POST /api/check-bulk body
 * Size limits are enforced by the batch checker, not here.
 */
export const CheckBulkBodySchema = z.object(
  {
    domains: z.array(
      z.string({ invalid_type_error: "Each domain must be a string" }),
      {
        required_error: "Domains list is required",
        invalid_type_error: "Domains must be a list",
      },
    ),
  },
  {
    required_error: "Domains list is required",
    invalid_type_error: "Domains list is required",
  },
);

export const CheckStatusSchema = z.union([
  z.number().int(),
  z.enum(["TIMEOUT", "CONNECTION_ERROR", "ERROR"]),
]);

/**
 * Shape of a CheckResult on the wire
 */
export const CheckResultSchema = z.object({
  domain: z.string(),
  status: CheckStatusSchema,
  message: z.string(),
  timestamp: z.string().regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/),
  response_time: z.number().nonnegative().nullable(),
});

export const BatchSummarySchema = z.object({
  total: z.number().int().nonnegative(),
  active: z.number().int().nonnegative(),
  inactive: z.number().int().nonnegative(),
  errors: z.number().int().nonnegative(),
  redirects: z.number().int().nonnegative(),
});

export const CheckBulkResponseSchema = z.object({
  results: z.array(CheckResultSchema),
  summary: BatchSummarySchema,
});

/**
 * POST /api/upload-file response
 */
export const UploadResponseSchema = z.object({
  domains: z.array(z.string()),
  total_found: z.number().int().nonnegative(),
});

export type UploadResponse = z.infer<typeof UploadResponseSchema>;
