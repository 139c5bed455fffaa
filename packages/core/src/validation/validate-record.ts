import type { MillworkConfig } from "../types/config.js";
import type { ParsedRoomData } from "../types/record.js";
import type { CheckContext, ValidationResult } from "../types/validation.js";
import { toResult } from "./findings.js";
import { checkGeometricConsistency } from "./geometric.js";
import { checkReferentialIntegrity } from "./referential.js";
import { checkTypeAndDomain } from "./type-domain.js";

export type RecordCheck = (
  record: ParsedRoomData,
  config: MillworkConfig,
  context?: CheckContext,
) => ValidationResult;

/** The independent checks every record goes through, in reporting order. */
export const RECORD_CHECKS: readonly RecordCheck[] = [
  checkTypeAndDomain,
  checkGeometricConsistency,
  checkReferentialIntegrity,
];

/**
 * Run every check and concatenate the findings. No check short-circuits
 * another, so a record reports all of its problems at once.
 */
export function validateRecord(
  record: ParsedRoomData,
  config: MillworkConfig,
  context: CheckContext = {},
): ValidationResult {
  const findings = RECORD_CHECKS.flatMap(
    (check) => check(record, config, context).findings,
  );
  return toResult(findings, context.strict);
}
