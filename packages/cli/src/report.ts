import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { BatchCounts, Finding } from "@millwork/core";

// Enough to see a pattern without flooding the summary
const MAX_SUMMARY_ERRORS = 50;

export interface FindingEntry {
  code: string;
  kind: string;
  field: string;
  message: string;
  value: unknown;
  rowNumber: number | null;
}

export interface RoomErrorLog {
  roomId: string;
  rowNumber: number | null;
  status: "failed" | "warning";
  errors: FindingEntry[];
  warnings: FindingEntry[];
}

export interface BatchSummaryLog {
  inputFile: string;
  configFile: string | null;
  configFingerprint: string;
  inputFingerprint: string;
  generatedAt: string;
  totalRooms: number;
  accepted: number;
  rejected: number;
  successRate: number;
  errorBreakdown: Record<string, number>;
  errors: string[];
}

function toEntry(finding: Finding): FindingEntry {
  return {
    code: finding.code,
    kind: finding.kind,
    field: finding.field,
    message: finding.message,
    value: finding.value,
    rowNumber: finding.rowNumber,
  };
}

/**
 * Build the per-room log for a set of findings. Returns undefined when
 * there is nothing to report.
 */
export function buildRoomErrorLog(
  roomId: string,
  rowNumber: number | null,
  findings: readonly Finding[],
): RoomErrorLog | undefined {
  if (findings.length === 0) return undefined;

  const errors = findings.filter((f) => f.severity === "error").map(toEntry);
  const warnings = findings
    .filter((f) => f.severity === "warning")
    .map(toEntry);

  return {
    roomId,
    rowNumber,
    status: errors.length > 0 ? "failed" : "warning",
    errors,
    warnings,
  };
}

export interface SummaryInput {
  inputFile: string;
  configFile: string | null;
  configFingerprint: string;
  inputFingerprint: string;
  generatedAt: string;
  counts: BatchCounts;
  errorBreakdown: Record<string, number>;
  roomLogs: readonly RoomErrorLog[];
}

export function buildSummary(input: SummaryInput): BatchSummaryLog {
  const errors = input.roomLogs
    .flatMap((log) => log.errors.map((e) => `${log.roomId}: ${e.message}`))
    .slice(0, MAX_SUMMARY_ERRORS);

  return {
    inputFile: input.inputFile,
    configFile: input.configFile,
    configFingerprint: input.configFingerprint,
    inputFingerprint: input.inputFingerprint,
    generatedAt: input.generatedAt,
    totalRooms: input.counts.total,
    accepted: input.counts.accepted,
    rejected: input.counts.rejected,
    successRate: input.counts.successRate,
    errorBreakdown: input.errorBreakdown,
    errors,
  };
}

/** File-system safe stem for a room id used in a log file name. */
export function logFileName(roomId: string): string {
  return `${roomId.replace(/[^A-Za-z0-9_-]/g, "_")}.errors.json`;
}

/** Write `<room>.errors.json` per room plus `summary.json` under `<outputDir>/logs`. */
export function writeLogs(
  outputDir: string,
  roomLogs: readonly RoomErrorLog[],
  summary: BatchSummaryLog,
): string {
  const logDir = join(outputDir, "logs");
  mkdirSync(logDir, { recursive: true });

  const used = new Set<string>();
  for (const log of roomLogs) {
    let name = logFileName(log.roomId);
    if (used.has(name)) {
      name = name.replace(/\.errors\.json$/, `.row-${log.rowNumber ?? "x"}.errors.json`);
    }
    used.add(name);
    writeFileSync(
      join(logDir, name),
      JSON.stringify(log, null, 2) + "\n",
      "utf-8",
    );
  }
  writeFileSync(
    join(logDir, "summary.json"),
    JSON.stringify(summary, null, 2) + "\n",
    "utf-8",
  );

  return logDir;
}
