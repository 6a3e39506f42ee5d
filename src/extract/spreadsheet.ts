/**
 * Spreadsheet extraction
 * Pulls candidate domain strings out of an uploaded CSV or Excel file
 */

import { parse } from "csv-parse/sync";
import * as XLSX from "xlsx";

/**
 * Header names recognised as the domain column (compared trimmed, lower-cased)
 */
export const DOMAIN_COLUMN_NAMES: readonly string[] = [
  "domain",
  "url",
  "website",
  "site",
  "domains",
  "urls",
];

export type SpreadsheetFormat = "csv" | "excel";

export type ExtractionResult =
  | { ok: true; format: SpreadsheetFormat; column: string; values: string[] }
  | { ok: false; reason: "unsupported_format" };

type Row = readonly unknown[];

export function detectFormat(filename: string): SpreadsheetFormat | null {
  const lower = filename.toLowerCase();
  if (lower.endsWith(".csv")) return "csv";
  if (lower.endsWith(".xlsx") || lower.endsWith(".xls")) return "excel";
  return null;
}

function isRow(value: unknown): value is Row {
  return Array.isArray(value);
}

function toRows(value: unknown): Row[] {
  if (!Array.isArray(value)) {
    throw new Error("Parser did not return rows");
  }
  return value.filter(isRow);
}

function cellText(cell: unknown): string | null {
  if (cell === null || cell === undefined) return null;
  const text = typeof cell === "string" ? cell : String(cell);
  return text === "" ? null : text;
}

function readCsvRows(content: Buffer): Row[] {
  return toRows(
    parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    }),
  );
}

function readExcelRows(content: Buffer): Row[] {
  const workbook = XLSX.read(content, { type: "buffer" });
  const firstSheetName = workbook.SheetNames[0];
  if (firstSheetName === undefined) {
    throw new Error("Workbook has no sheets");
  }
  const sheet = workbook.Sheets[firstSheetName];
  if (!sheet) {
    throw new Error(`Sheet "${firstSheetName}" could not be read`);
  }
  return toRows(
    XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      defval: null,
      blankrows: false,
      raw: false,
    }),
  );
}

/**
 * Index of the domain column: first header matching a known name, else 0
 */
export function findDomainColumn(headers: Row): number {
  const index = headers.findIndex((header) => {
    const text = cellText(header);
    return text !== null && DOMAIN_COLUMN_NAMES.includes(text.trim().toLowerCase());
  });
  return index === -1 ? 0 : index;
}

/**
 * Values of the domain column, header excluded and empty cells dropped
 */
export function extractColumnValues(rows: readonly Row[]): { column: string; values: string[] } {
  const [headers, ...body] = rows;
  if (!headers) {
    return { column: "", values: [] };
  }

  const columnIndex = findDomainColumn(headers);
  const values: string[] = [];
  for (const row of body) {
    const text = cellText(row[columnIndex]);
    if (text !== null) {
      values.push(text);
    }
  }

  return { column: cellText(headers[columnIndex]) ?? "", values };
}

/**
 * Read candidate domain strings from an uploaded file.
 * Parse failures throw; an unknown extension is reported in the result.
 */
export function extractDomainCandidates(filename: string, content: Buffer): ExtractionResult {
  const format = detectFormat(filename);
  if (format === null) {
    return { ok: false, reason: "unsupported_format" };
  }

  const rows = format === "csv" ? readCsvRows(content) : readExcelRows(content);
  const { column, values } = extractColumnValues(rows);

  return { ok: true, format, column, values };
}
