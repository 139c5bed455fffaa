import { parse } from "csv-parse/sync";
import type { RawRow } from "@millwork/core";

export interface DecodedCsv {
  headers: string[];
  rows: RawRow[];
  delimiter: string;
}

/**
 * Tab-separated exports are common from spreadsheets; the header line
 * decides the delimiter.
 */
export function detectDelimiter(text: string): string {
  const headerLine = text.split(/\r?\n/, 1)[0] ?? "";
  const tabs = headerLine.split("\t").length - 1;
  const commas = headerLine.split(",").length - 1;
  return tabs > commas ? "\t" : ",";
}

/**
 * Decode CSV text into header names and one string map per data row.
 * Cells are trimmed; blank lines are skipped. Short rows leave the
 * missing columns undefined.
 */
export function decodeCsv(text: string): DecodedCsv {
  const delimiter = detectDelimiter(text);
  const parsed: unknown = parse(text, {
    bom: true,
    delimiter,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  const table = toTable(parsed);
  const [headerRow, ...body] = table;
  if (!headerRow) {
    return { headers: [], rows: [], delimiter };
  }

  const headers = headerRow.map((h) => h.trim());
  const rows = body.map((cells) => {
    const row: Record<string, string | undefined> = {};
    headers.forEach((header, i) => {
      row[header] = cells[i];
    });
    return row;
  });

  return { headers, rows, delimiter };
}

function toTable(parsed: unknown): string[][] {
  if (!Array.isArray(parsed)) return [];
  return parsed.map((record: unknown) =>
    Array.isArray(record) ? record.map((cell: unknown) => String(cell)) : [],
  );
}
