import type { ZodError } from "zod";

export function firstIssueMessage(error: ZodError): string {
  return error.issues[0]?.message ?? "Validation failed";
}

/**
 * Client-side status carried by an error (e.g. multipart limits), if any
 */
export function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null || !("statusCode" in error)) {
    return null;
  }
  const { statusCode } = error;
  if (typeof statusCode === "number" && statusCode >= 400 && statusCode < 500) {
    return statusCode;
  }
  return null;
}
