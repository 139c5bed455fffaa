// ---- Schema ----

export type FieldType = "string" | "number" | "integer" | "boolean" | "number-array";

export interface FieldDefinition {
  readonly name: string;
  readonly type: FieldType;
  readonly required: boolean;
  readonly min?: number;
  readonly max?: number;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly pattern?: RegExp;
  readonly enumValues?: readonly string[];
  readonly description?: string;
}

export type FieldValue = string | number | boolean | number[];

/** One decoded input row: column name → raw cell text */
export type RawRow = Readonly<Record<string, string | undefined>>;

// ---- Typed record ----

export interface ParsedRoomData {
  readonly room_id: string;
  readonly total_length_in: number;
  readonly num_modules: number;
  readonly module_widths: readonly number[];
  readonly material_top: string;
  readonly material_casework: string;
  readonly left_filler_in: number;
  readonly right_filler_in: number;
  readonly has_sink: boolean;
  readonly has_ref: boolean;
  readonly counter_height_in?: number;
  readonly edge_rule?: string;
  readonly hardware_defaults?: string;
  readonly notes?: string;
  readonly references?: string;
  readonly rowNumber: number;
  readonly sourceFile?: string;
}
