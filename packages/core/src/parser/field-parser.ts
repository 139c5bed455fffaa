import type { FieldDefinition, FieldValue } from "../types/record.js";
import type { Finding } from "../types/validation.js";

export type FieldParseOutcome =
  | { ok: true; value: FieldValue | undefined }
  | { ok: false; finding: Finding };

export interface FieldContext {
  rowNumber?: number;
  roomId?: string;
}

const NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;

const TRUE_VALUES = new Set(["true", "1", "yes"]);
const FALSE_VALUES = new Set(["false", "0", "no"]);

/**
 * Convert one raw cell into a typed value according to its field definition.
 * Pure: the same input always gives the same outcome. Empty optional fields
 * parse to `undefined`.
 */
export function parseField(
  raw: string | undefined,
  def: FieldDefinition,
  ctx: FieldContext = {},
): FieldParseOutcome {
  const text = (raw ?? "").trim();
  const fail = (
    kind: "type" | "domain",
    code: string,
    message: string,
  ): FieldParseOutcome => ({
    ok: false,
    finding: {
      kind,
      code,
      severity: "error",
      field: def.name,
      message,
      value: raw ?? null,
      rowNumber: ctx.rowNumber ?? null,
      roomId: ctx.roomId ?? null,
    },
  });

  if (text === "") {
    return def.required
      ? fail("type", "missing-field", `Required field "${def.name}" is empty`)
      : { ok: true, value: undefined };
  }

  switch (def.type) {
    case "string":
      return parseString(text, def, fail);
    case "number":
      return parseNumber(text, def, fail);
    case "integer":
      return parseInteger(text, def, fail);
    case "boolean":
      return parseBoolean(text, def, fail);
    case "number-array":
      return parseNumberArray(text, def, fail);
  }
}

type Fail = (
  kind: "type" | "domain",
  code: string,
  message: string,
) => FieldParseOutcome;

function parseString(
  text: string,
  def: FieldDefinition,
  fail: Fail,
): FieldParseOutcome {
  if (def.minLength !== undefined && text.length < def.minLength) {
    return fail(
      "domain",
      "too-short",
      `"${def.name}" is too short: ${text.length} < ${def.minLength}`,
    );
  }
  if (def.maxLength !== undefined && text.length > def.maxLength) {
    return fail(
      "domain",
      "too-long",
      `"${def.name}" is too long: ${text.length} > ${def.maxLength}`,
    );
  }
  if (def.pattern && !def.pattern.test(text)) {
    return fail(
      "domain",
      "pattern-mismatch",
      `"${def.name}" value "${text}" does not match pattern ${def.pattern.source}`,
    );
  }
  if (def.enumValues && !def.enumValues.includes(text)) {
    return fail(
      "domain",
      "not-in-enum",
      `"${def.name}" value "${text}" is not one of: ${def.enumValues.join(", ")}`,
    );
  }
  return { ok: true, value: text };
}

function parseNumber(
  text: string,
  def: FieldDefinition,
  fail: Fail,
): FieldParseOutcome {
  if (!NUMBER.test(text)) {
    return fail(
      "type",
      "not-a-number",
      `"${def.name}" expected a number, got "${text}"`,
    );
  }
  return checkRange(parseFloat(text), def, fail);
}

function parseInteger(
  text: string,
  def: FieldDefinition,
  fail: Fail,
): FieldParseOutcome {
  if (!INTEGER.test(text)) {
    return fail(
      "type",
      NUMBER.test(text) ? "not-an-integer" : "not-a-number",
      NUMBER.test(text)
        ? `"${def.name}" expected an integer, got decimal "${text}"`
        : `"${def.name}" expected an integer, got "${text}"`,
    );
  }
  return checkRange(parseInt(text, 10), def, fail);
}

function checkRange(
  value: number,
  def: FieldDefinition,
  fail: Fail,
): FieldParseOutcome {
  if (def.min !== undefined && value < def.min) {
    return fail(
      "domain",
      "out-of-range",
      `"${def.name}" value ${value} is below the minimum ${def.min}`,
    );
  }
  if (def.max !== undefined && value > def.max) {
    return fail(
      "domain",
      "out-of-range",
      `"${def.name}" value ${value} is above the maximum ${def.max}`,
    );
  }
  return { ok: true, value };
}

function parseBoolean(
  text: string,
  def: FieldDefinition,
  fail: Fail,
): FieldParseOutcome {
  const lower = text.toLowerCase();
  if (TRUE_VALUES.has(lower)) return { ok: true, value: true };
  if (FALSE_VALUES.has(lower)) return { ok: true, value: false };
  return fail(
    "type",
    "not-a-boolean",
    `"${def.name}" expected true/false, 1/0 or yes/no, got "${text}"`,
  );
}

function parseNumberArray(
  text: string,
  def: FieldDefinition,
  fail: Fail,
): FieldParseOutcome {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return fail(
      "type",
      "malformed-array",
      `"${def.name}" is not a valid JSON array: ${text}`,
    );
  }

  if (!Array.isArray(parsed)) {
    return fail(
      "type",
      "malformed-array",
      `"${def.name}" expected a bracketed list of numbers, got: ${text}`,
    );
  }
  if (parsed.length === 0) {
    return fail("domain", "empty-array", `"${def.name}" is an empty list: ${text}`);
  }

  const values: number[] = [];
  for (const [i, item] of parsed.entries()) {
    if (typeof item !== "number" || !Number.isFinite(item)) {
      return fail(
        "type",
        "not-a-number",
        `"${def.name}" item ${i + 1} is not a number: ${text}`,
      );
    }
    values.push(item);
  }
  return { ok: true, value: values };
}
