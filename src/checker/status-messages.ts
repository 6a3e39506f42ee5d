import type { CheckStatus } from "./types";

const MAX_ERROR_DETAIL_CHARS = 50;

/**
 * Curated labels for common status codes; consulted before the range fallback
 */
export const STATUS_MESSAGES: Readonly<Record<number, string>> = Object.freeze({
  200: "✅ Site is Live",
  201: "✅ Created",
  204: "✅ No Content",
  301: "↗️ Moved Permanently",
  302: "↗️ Found (Redirect)",
  304: "📋 Not Modified",
  400: "❌ Bad Request",
  401: "🔒 Unauthorized",
  403: "🔒 Access Forbidden",
  404: "❌ 404 Not Found",
  405: "❌ Method Not Allowed",
  408: "⏱️ Request Timeout",
  429: "⚠️ Too Many Requests",
  500: "⚠️ Internal Server Error",
  502: "⚠️ Bad Gateway",
  503: "⚠️ Service Unavailable",
  504: "⚠️ Gateway Timeout",
});

export const TIMEOUT_MESSAGE = "⏱️ Request Timeout";
export const CONNECTION_FAILED_MESSAGE = "❌ Connection Failed";

/**
 * Message for a numeric HTTP status code
 */
export function getStatusMessage(statusCode: number): string {
  const curated = STATUS_MESSAGES[statusCode];
  if (curated !== undefined) {
    return curated;
  }

  if (statusCode >= 200 && statusCode < 300) return "✅ Success";
  if (statusCode >= 300 && statusCode < 400) return "↗️ Redirect";
  if (statusCode >= 400 && statusCode < 500) return "❌ Client Error";
  if (statusCode >= 500 && statusCode < 600) return "⚠️ Server Error";
  return "❓ Unknown Status";
}

/**
 * Cut a failure description to its first 50 characters (code points, so
 * emoji and other astral characters are never split)
 */
export function truncateDetail(detail: string): string {
  return Array.from(detail).slice(0, MAX_ERROR_DETAIL_CHARS).join("");
}

export function getErrorMessage(detail: string): string {
  return `❌ Error: ${truncateDetail(detail)}`;
}

/**
 * Message for any check status. `detail` is only used for ERROR.
 */
export function describeStatus(status: CheckStatus, detail = ""): string {
  switch (status) {
    case "TIMEOUT":
      return TIMEOUT_MESSAGE;
    case "CONNECTION_ERROR":
      return CONNECTION_FAILED_MESSAGE;
    case "ERROR":
      return getErrorMessage(detail);
    default:
      return getStatusMessage(status);
  }
}
