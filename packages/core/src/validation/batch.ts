import type { MillworkConfig } from "../types/config.js";
import type { ParsedRoomData } from "../types/record.js";
import type { BatchCounts, ValidationResult } from "../types/validation.js";
import { errorsOf } from "./findings.js";
import { validateRecord } from "./validate-record.js";

export interface BatchOptions {
  strict?: boolean;
}

export interface RecordOutcome {
  record: ParsedRoomData;
  result: ValidationResult;
}

export interface BatchValidation {
  accepted: ParsedRoomData[];
  rejected: RecordOutcome[];
  /** Every record's result, in input order */
  results: RecordOutcome[];
  counts: BatchCounts;
  /** Error count per field name */
  errorBreakdown: Record<string, number>;
}

/**
 * Validate an ordered batch. Duplicate ids are tracked in a set local to
 * this call; the first record to use an id claims it. A failing record
 * never stops the records after it.
 */
export function validateBatch(
  records: readonly ParsedRoomData[],
  config: MillworkConfig,
  options: BatchOptions = {},
): BatchValidation {
  const seenIds = new Set<string>();
  const accepted: ParsedRoomData[] = [];
  const rejected: RecordOutcome[] = [];
  const results: RecordOutcome[] = [];
  const errorBreakdown: Record<string, number> = {};

  for (const record of records) {
    const result = validateRecord(record, config, {
      seenIds,
      strict: options.strict,
    });
    seenIds.add(record.room_id);

    const outcome = { record, result };
    results.push(outcome);

    if (result.passed) {
      accepted.push(record);
    } else {
      rejected.push(outcome);
      for (const error of errorsOf(result)) {
        errorBreakdown[error.field] = (errorBreakdown[error.field] ?? 0) + 1;
      }
    }
  }

  const total = records.length;
  return {
    accepted,
    rejected,
    results,
    counts: {
      total,
      accepted: accepted.length,
      rejected: rejected.length,
      successRate: total > 0 ? accepted.length / total : 0,
    },
    errorBreakdown,
  };
}
