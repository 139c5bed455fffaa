import type { DisplayUnit, Finding } from "@millwork/core";

const DISPLAY_UNITS: readonly DisplayUnit[] = ["in", "mm", "ft-in"];

export function isDisplayUnit(value: string): value is DisplayUnit {
  return DISPLAY_UNITS.some((u) => u === value);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** One console line for a finding, prefixed with its row when known. */
export function formatFinding(finding: Finding): string {
  const where = finding.rowNumber !== null ? `row ${finding.rowNumber}: ` : "";
  return `[${finding.code}] ${where}${finding.field}: ${finding.message}`;
}

export function printFindings(findings: readonly Finding[], limit = Infinity): void {
  const errors = findings.filter((f) => f.severity === "error");
  const warnings = findings.filter((f) => f.severity === "warning");

  for (const err of errors.slice(0, limit)) {
    console.error(`  ✗ ${formatFinding(err)}`);
  }
  if (errors.length > limit) {
    console.error(`  ... and ${errors.length - limit} more error(s)`);
  }
  for (const warn of warnings.slice(0, limit)) {
    console.warn(`  ⚠ ${formatFinding(warn)}`);
  }
  if (warnings.length > limit) {
    console.warn(`  ... and ${warnings.length - limit} more warning(s)`);
  }
}
