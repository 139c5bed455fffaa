import type { FieldDefinition } from "../types/record.js";

const CODE_PATTERN = /^[A-Z0-9\-_]+$/;

/**
 * Column schema for room specification rows. Field order is the canonical
 * column order for generated templates.
 */
export const ROOM_SCHEMA: readonly FieldDefinition[] = [
  {
    name: "room_id",
    type: "string",
    required: true,
    minLength: 1,
    maxLength: 50,
    pattern: /^[A-Z0-9][A-Z0-9\-_]*$/,
    description: "Unique room identifier (e.g. KITCHEN-01)",
  },
  {
    name: "total_length_in",
    type: "number",
    required: true,
    min: 1,
    max: 1000,
    description: "Total run length in inches",
  },
  {
    name: "num_modules",
    type: "integer",
    required: true,
    min: 1,
    max: 50,
  },
  {
    name: "module_widths",
    type: "number-array",
    required: true,
    description: "Module widths as a JSON list, e.g. [36,30,36,42]",
  },
  {
    name: "material_top",
    type: "string",
    required: true,
    minLength: 1,
    maxLength: 20,
    pattern: CODE_PATTERN,
  },
  {
    name: "material_casework",
    type: "string",
    required: true,
    minLength: 1,
    maxLength: 20,
    pattern: CODE_PATTERN,
  },
  { name: "left_filler_in", type: "number", required: false, min: 0, max: 12 },
  { name: "right_filler_in", type: "number", required: false, min: 0, max: 12 },
  { name: "has_sink", type: "boolean", required: false },
  { name: "has_ref", type: "boolean", required: false },
  {
    name: "counter_height_in",
    type: "number",
    required: false,
    min: 24,
    max: 48,
  },
  // Membership is checked against EDGE_RULES / HW.DEFAULTS by the validator
  { name: "edge_rule", type: "string", required: false },
  { name: "hardware_defaults", type: "string", required: false },
  { name: "notes", type: "string", required: false, maxLength: 500 },
  { name: "references", type: "string", required: false, maxLength: 100 },
];

export function requiredFieldNames(
  schema: readonly FieldDefinition[] = ROOM_SCHEMA,
): string[] {
  return schema.filter((f) => f.required).map((f) => f.name);
}

export function fieldNames(
  schema: readonly FieldDefinition[] = ROOM_SCHEMA,
): string[] {
  return schema.map((f) => f.name);
}
