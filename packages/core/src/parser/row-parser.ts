import type {
  FieldDefinition,
  FieldValue,
  ParsedRoomData,
  RawRow,
} from "../types/record.js";
import type { Finding } from "../types/validation.js";
import { parseField } from "./field-parser.js";
import { ROOM_SCHEMA, fieldNames } from "./room-schema.js";

export interface ParseRowOptions {
  schema?: readonly FieldDefinition[];
  sourceFile?: string;
}

export interface RowParseResult {
  record?: ParsedRoomData;
  findings: Finding[];
}

export interface RowRejection {
  rowNumber: number;
  roomId: string | null;
  findings: Finding[];
}

export interface ParseRowsOptions extends ParseRowOptions {
  /** Column names in source order; defaults to the keys of the first row */
  headers?: readonly string[];
  /** Row number of the first data row (the header is row 1) */
  firstRow?: number;
}

export interface ParseRowsResult {
  records: ParsedRoomData[];
  rejected: RowRejection[];
  headerFindings: Finding[];
  passed: boolean;
}

const HEADER_ROW = 1;

/**
 * Check source columns against the schema. Missing required columns are
 * errors; columns the schema does not know are warnings and get ignored.
 */
export function checkHeaders(
  headers: readonly string[],
  schema: readonly FieldDefinition[] = ROOM_SCHEMA,
): Finding[] {
  const findings: Finding[] = [];
  const present = new Set(headers.map((h) => h.trim()));
  const known = new Set(fieldNames(schema));

  for (const def of schema) {
    if (def.required && !present.has(def.name)) {
      findings.push({
        kind: "type",
        code: "missing-column",
        severity: "error",
        field: def.name,
        message: `Missing required column "${def.name}"`,
        value: [...headers],
        rowNumber: HEADER_ROW,
        roomId: null,
      });
    }
  }

  for (const header of present) {
    if (!known.has(header)) {
      findings.push({
        kind: "type",
        code: "unknown-column",
        severity: "warning",
        field: header,
        message: `Unknown column "${header}" will be ignored`,
        value: header,
        rowNumber: HEADER_ROW,
        roomId: null,
      });
    }
  }

  return findings;
}

/**
 * Parse one raw row into a typed room record. Every field is parsed so that
 * all problems in the row are reported together.
 */
export function parseRow(
  row: RawRow,
  rowNumber: number,
  options: ParseRowOptions = {},
): RowParseResult {
  const schema = options.schema ?? ROOM_SCHEMA;
  const roomId = row.room_id?.trim() || undefined;
  const findings: Finding[] = [];
  const values = new Map<string, FieldValue | undefined>();

  for (const def of schema) {
    const outcome = parseField(row[def.name], def, { rowNumber, roomId });
    if (outcome.ok) {
      values.set(def.name, outcome.value);
    } else {
      findings.push(outcome.finding);
    }
  }

  if (findings.length > 0) {
    return { findings };
  }

  const missing = (field: string): Finding => ({
    kind: "type",
    code: "missing-field",
    severity: "error",
    field,
    message: `Required field "${field}" is not defined by the schema`,
    value: null,
    rowNumber,
    roomId: roomId ?? null,
  });

  const text = (name: string): string | undefined => {
    const v = values.get(name);
    return typeof v === "string" ? v : undefined;
  };
  const num = (name: string): number | undefined => {
    const v = values.get(name);
    return typeof v === "number" ? v : undefined;
  };
  const flag = (name: string): boolean | undefined => {
    const v = values.get(name);
    return typeof v === "boolean" ? v : undefined;
  };
  const list = (name: string): number[] | undefined => {
    const v = values.get(name);
    return Array.isArray(v) ? v : undefined;
  };

  const id = text("room_id");
  const totalLength = num("total_length_in");
  const numModules = num("num_modules");
  const widths = list("module_widths");
  const materialTop = text("material_top");
  const materialCasework = text("material_casework");

  if (id === undefined) findings.push(missing("room_id"));
  if (totalLength === undefined) findings.push(missing("total_length_in"));
  if (numModules === undefined) findings.push(missing("num_modules"));
  if (widths === undefined) findings.push(missing("module_widths"));
  if (materialTop === undefined) findings.push(missing("material_top"));
  if (materialCasework === undefined) findings.push(missing("material_casework"));

  if (
    id === undefined ||
    totalLength === undefined ||
    numModules === undefined ||
    widths === undefined ||
    materialTop === undefined ||
    materialCasework === undefined
  ) {
    return { findings };
  }

  if (widths.length !== numModules) {
    return {
      findings: [
        {
          kind: "domain",
          code: "module-count-mismatch",
          severity: "error",
          field: "module_widths",
          message: `Module widths count (${widths.length}) does not match num_modules (${numModules})`,
          value: widths,
          rowNumber,
          roomId: id,
        },
      ],
    };
  }

  const record: ParsedRoomData = {
    room_id: id,
    total_length_in: totalLength,
    num_modules: numModules,
    module_widths: widths,
    material_top: materialTop,
    material_casework: materialCasework,
    left_filler_in: num("left_filler_in") ?? 0,
    right_filler_in: num("right_filler_in") ?? 0,
    has_sink: flag("has_sink") ?? false,
    has_ref: flag("has_ref") ?? false,
    counter_height_in: num("counter_height_in"),
    edge_rule: text("edge_rule"),
    hardware_defaults: text("hardware_defaults"),
    notes: text("notes"),
    references: text("references"),
    rowNumber,
    sourceFile: options.sourceFile,
  };

  return { record, findings };
}

/**
 * Parse a sequence of decoded rows. Rows that fail are collected with their
 * findings and never stop the rows after them. A header with missing required
 * columns stops before any row is parsed.
 */
export function parseRows(
  rows: readonly RawRow[],
  options: ParseRowsOptions = {},
): ParseRowsResult {
  const schema = options.schema ?? ROOM_SCHEMA;
  const headers = options.headers ?? Object.keys(rows[0] ?? {});
  const headerFindings = checkHeaders(headers, schema);

  if (headerFindings.some((f) => f.severity === "error")) {
    return { records: [], rejected: [], headerFindings, passed: false };
  }

  const firstRow = options.firstRow ?? HEADER_ROW + 1;
  const records: ParsedRoomData[] = [];
  const rejected: RowRejection[] = [];

  rows.forEach((row, i) => {
    const rowNumber = firstRow + i;
    const result = parseRow(row, rowNumber, options);
    if (result.record) {
      records.push(result.record);
    } else {
      rejected.push({
        rowNumber,
        roomId: row.room_id?.trim() || null,
        findings: result.findings,
      });
    }
  });

  return { records, rejected, headerFindings, passed: rejected.length === 0 };
}
