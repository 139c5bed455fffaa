import {
  inputFingerprint,
  parseRows,
  runPipeline,
  type BatchCounts,
  type Finding,
  type LayoutResult,
  type MillworkConfig,
  type PipelineResult,
} from "@millwork/core";
import { decodeCsv } from "./csv.js";
import { buildRoomErrorLog, type RoomErrorLog } from "./report.js";

export interface BatchRunOptions {
  sourceFile?: string;
  strict?: boolean;
  computedAt?: string;
}

export interface BatchRun {
  inputFingerprint: string;
  /** Header problems; any error here means no row was parsed */
  headerFindings: Finding[];
  pipeline?: PipelineResult;
  layouts: LayoutResult[];
  roomLogs: RoomErrorLog[];
  counts: BatchCounts;
  errorBreakdown: Record<string, number>;
}

/**
 * Decode, parse, validate and lay out one CSV document. Row parse
 * failures, validation rejections and layout failures are all counted as
 * rejected rooms; none of them stops the rest of the batch.
 */
export function processBatch(
  text: string,
  config: MillworkConfig,
  options: BatchRunOptions = {},
): BatchRun {
  const fingerprint = inputFingerprint(text);
  const decoded = decodeCsv(text);
  const parsed = parseRows(decoded.rows, {
    headers: decoded.headers,
    sourceFile: options.sourceFile,
  });

  const headerErrors = parsed.headerFindings.some(
    (f) => f.severity === "error",
  );
  if (headerErrors) {
    return {
      inputFingerprint: fingerprint,
      headerFindings: parsed.headerFindings,
      layouts: [],
      roomLogs: [],
      counts: {
        total: decoded.rows.length,
        accepted: 0,
        rejected: decoded.rows.length,
        successRate: 0,
      },
      errorBreakdown: {},
    };
  }

  const pipeline = runPipeline(parsed.records, config, {
    strict: options.strict,
    inputFingerprint: fingerprint,
    computedAt: options.computedAt,
  });

  const roomLogs: RoomErrorLog[] = [];
  const errorBreakdown: Record<string, number> = {
    ...pipeline.validation.errorBreakdown,
  };
  const countErrors = (findings: readonly Finding[]): void => {
    for (const f of findings) {
      if (f.severity !== "error") continue;
      errorBreakdown[f.field] = (errorBreakdown[f.field] ?? 0) + 1;
    }
  };

  for (const rejection of parsed.rejected) {
    countErrors(rejection.findings);
    const log = buildRoomErrorLog(
      rejection.roomId ?? `row-${rejection.rowNumber}`,
      rejection.rowNumber,
      rejection.findings,
    );
    if (log) roomLogs.push(log);
  }

  const layoutFailures = new Map(
    pipeline.layoutFailures.map((f) => [f.record.rowNumber, f.finding]),
  );
  for (const { record, result } of pipeline.validation.results) {
    const failure = layoutFailures.get(record.rowNumber);
    const findings = failure ? [...result.findings, failure] : result.findings;
    if (failure) countErrors([failure]);
    const log = buildRoomErrorLog(record.room_id, record.rowNumber, findings);
    if (log) roomLogs.push(log);
  }

  const total = parsed.records.length + parsed.rejected.length;
  const accepted = pipeline.layouts.length;

  return {
    inputFingerprint: fingerprint,
    headerFindings: parsed.headerFindings,
    pipeline,
    layouts: pipeline.layouts,
    roomLogs,
    counts: {
      total,
      accepted,
      rejected: total - accepted,
      successRate: total > 0 ? accepted / total : 0,
    },
    errorBreakdown,
  };
}
