/**
 * Multipart and spreadsheet builders for upload tests
 */

import * as XLSX from "xlsx";

const BOUNDARY = "----site-checker-test-boundary";

export interface MultipartRequest {
  payload: Buffer;
  headers: Record<string, string>;
}

export interface MultipartPart {
  fieldName: string;
  /** Omit for a plain form field */
  filename?: string;
  content: string | Buffer;
  contentType?: string;
}

export function buildMultipartParts(parts: MultipartPart[]): MultipartRequest {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    const disposition =
      part.filename === undefined
        ? `form-data; name="${part.fieldName}"`
        : `form-data; name="${part.fieldName}"; filename="${part.filename}"`;
    const contentType =
      part.filename === undefined
        ? ""
        : `Content-Type: ${part.contentType ?? "application/octet-stream"}\r\n`;
    chunks.push(
      Buffer.from(`--${BOUNDARY}\r\nContent-Disposition: ${disposition}\r\n${contentType}\r\n`),
      typeof part.content === "string" ? Buffer.from(part.content) : part.content,
      Buffer.from("\r\n"),
    );
  }
  chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`));

  return {
    payload: Buffer.concat(chunks),
    headers: { "content-type": `multipart/form-data; boundary=${BOUNDARY}` },
  };
}

export function buildMultipart(
  fieldName: string,
  filename: string,
  content: string | Buffer,
  contentType = "application/octet-stream",
): MultipartRequest {
  return buildMultipartParts([{ fieldName, filename, content, contentType }]);
}

/**
 * In-memory .xlsx workbook with a single sheet
 */
export function buildWorkbook(rows: unknown[][], sheetName = "Sheet1"): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), sheetName);
  const content: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return content;
}

export const websitesCsv = "Name,Website\nAcme,acme.com\nBeta,\nGamma,gamma.io\n";
