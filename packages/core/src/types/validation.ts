// ---- Findings ----

export type Severity = "error" | "warning";

/**
 * Which stage of the taxonomy raised a finding. `configuration` findings are
 * only produced where a record needs a config key that is absent; malformed
 * config values throw ConfigurationError instead.
 */
export type FindingKind =
  | "type"
  | "domain"
  | "geometric"
  | "referential"
  | "configuration";

export interface Finding {
  kind: FindingKind;
  code: string;
  severity: Severity;
  field: string;
  message: string;
  value: unknown;
  rowNumber: number | null;
  roomId: string | null;
}

export interface ValidationResult {
  findings: Finding[];
  passed: boolean;
}

// ---- Geometric check ----

export interface LengthSumReport {
  moduleSum: number;
  leftFiller: number;
  rightFiller: number;
  computedTotal: number;
  totalLength: number;
  delta: number;
  tolerance: number;
  withinTolerance: boolean;
}

export interface GeometricCheckResult extends ValidationResult {
  lengthSum: LengthSumReport;
}

// ---- Batch ----

export interface CheckContext {
  /** Room ids already claimed earlier in the same batch */
  seenIds?: ReadonlySet<string>;
  /** Elevate warnings to errors */
  strict?: boolean;
}

export interface BatchCounts {
  total: number;
  accepted: number;
  rejected: number;
  successRate: number;
}
