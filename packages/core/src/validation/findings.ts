import type { ParsedRoomData } from "../types/record.js";
import type {
  Finding,
  FindingKind,
  Severity,
  ValidationResult,
} from "../types/validation.js";

export interface FindingInput {
  kind: FindingKind;
  code: string;
  severity?: Severity;
  field: string;
  message: string;
  value: unknown;
}

/** Build a finding attributed to a record's row and id. */
export function recordFinding(
  record: Pick<ParsedRoomData, "room_id" | "rowNumber">,
  input: FindingInput,
): Finding {
  return {
    severity: "error",
    ...input,
    rowNumber: record.rowNumber,
    roomId: record.room_id,
  };
}

export function toResult(findings: Finding[], strict = false): ValidationResult {
  const out = strict ? findings.map(elevate) : findings;
  return { findings: out, passed: !out.some((f) => f.severity === "error") };
}

/** Concatenate results in order; `passed` is recomputed from the merged findings. */
export function mergeResults(...results: ValidationResult[]): ValidationResult {
  return toResult(results.flatMap((r) => r.findings));
}

export function errorsOf(result: ValidationResult): Finding[] {
  return result.findings.filter((f) => f.severity === "error");
}

export function warningsOf(result: ValidationResult): Finding[] {
  return result.findings.filter((f) => f.severity === "warning");
}

function elevate(finding: Finding): Finding {
  return finding.severity === "warning"
    ? { ...finding, severity: "error" }
    : finding;
}
