import type { FieldDefinition, ParsedRoomData } from "../src/types/record.js";
import { ROOM_SCHEMA } from "../src/parser/room-schema.js";

/** A valid two-module room: 36 + 30 + 3 + 3 = 72 */
export function makeRecord(overrides: Partial<ParsedRoomData> = {}): ParsedRoomData {
  return {
    room_id: "K-101",
    total_length_in: 72,
    num_modules: 2,
    module_widths: [36, 30],
    material_top: "QTZ-1",
    material_casework: "PLAM-2",
    left_filler_in: 3,
    right_filler_in: 3,
    has_sink: false,
    has_ref: false,
    rowNumber: 2,
    ...overrides,
  };
}

export function schemaField(name: string): FieldDefinition {
  const def = ROOM_SCHEMA.find((f) => f.name === name);
  if (!def) throw new Error(`No schema field ${name}`);
  return def;
}
