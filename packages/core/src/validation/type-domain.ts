import type { MillworkConfig } from "../types/config.js";
import type { ParsedRoomData } from "../types/record.js";
import type {
  CheckContext,
  Finding,
  ValidationResult,
} from "../types/validation.js";
import { recordFinding, toResult } from "./findings.js";

const MAX_ROOM_ID_LENGTH = 50;

/**
 * Re-assert per-field domain rules beyond what the field parser enforces,
 * including batch-level id uniqueness and module count consistency.
 */
export function checkTypeAndDomain(
  record: ParsedRoomData,
  _config: MillworkConfig,
  context: CheckContext = {},
): ValidationResult {
  const findings: Finding[] = [];
  const id = record.room_id;

  if (id.trim().length === 0) {
    findings.push(
      recordFinding(record, {
        kind: "domain",
        code: "empty-room-id",
        field: "room_id",
        message: "Room ID must be a non-empty string",
        value: id,
      }),
    );
  } else if (id.length > MAX_ROOM_ID_LENGTH) {
    findings.push(
      recordFinding(record, {
        kind: "domain",
        code: "room-id-too-long",
        field: "room_id",
        message: `Room ID too long (max ${MAX_ROOM_ID_LENGTH} characters)`,
        value: id,
      }),
    );
  }

  if (context.seenIds?.has(id)) {
    findings.push(
      recordFinding(record, {
        kind: "domain",
        code: "duplicate-room-id",
        field: "room_id",
        message: `Duplicate room_id: ${id}`,
        value: id,
      }),
    );
  }

  if (!Number.isFinite(record.total_length_in) || record.total_length_in <= 0) {
    findings.push(
      recordFinding(record, {
        kind: "domain",
        code: "invalid-total-length",
        field: "total_length_in",
        message: "Total length must be a positive number",
        value: record.total_length_in,
      }),
    );
  }

  if (!Number.isInteger(record.num_modules) || record.num_modules < 1) {
    findings.push(
      recordFinding(record, {
        kind: "type",
        code: "invalid-module-count",
        field: "num_modules",
        message: "Module count must be an integer of at least 1",
        value: record.num_modules,
      }),
    );
  }

  if (record.module_widths.length !== record.num_modules) {
    findings.push(
      recordFinding(record, {
        kind: "domain",
        code: "module-count-mismatch",
        field: "module_widths",
        message: `Module widths count (${record.module_widths.length}) does not match num_modules (${record.num_modules})`,
        value: [...record.module_widths],
      }),
    );
  }

  record.module_widths.forEach((width, i) => {
    if (!Number.isFinite(width)) {
      findings.push(
        recordFinding(record, {
          kind: "type",
          code: "not-a-number",
          field: "module_widths",
          message: `Module ${i + 1} width is not a finite number`,
          value: width,
        }),
      );
    }
  });

  return toResult(findings, context.strict);
}
