import { LayoutContractError } from "../errors.js";
import { configFingerprint } from "../fingerprint.js";
import type { MillworkConfig } from "../types/config.js";
import type { LayoutResult } from "../types/geometry.js";
import type { ParsedRoomData } from "../types/record.js";
import type { Finding } from "../types/validation.js";
import { validateBatch, type BatchValidation } from "../validation/batch.js";
import { computeLayout, resolveAdaProfile } from "./layout-resolver.js";

export interface PipelineOptions {
  strict?: boolean;
  inputFingerprint?: string;
  computedAt?: string;
}

export interface LayoutFailure {
  record: ParsedRoomData;
  finding: Finding;
}

export interface PipelineResult {
  validation: BatchValidation;
  layouts: LayoutResult[];
  layoutFailures: LayoutFailure[];
  configFingerprint: string;
}

/**
 * Validate a batch and lay out every accepted record.
 *
 * Configuration problems (e.g. an unparsable clearance specification) are
 * thrown before any record is touched. Record-scoped problems are collected
 * and never stop the rest of the batch.
 */
export function runPipeline(
  records: readonly ParsedRoomData[],
  config: MillworkConfig,
  options: PipelineOptions = {},
): PipelineResult {
  const ada = resolveAdaProfile(config);
  const fingerprint = configFingerprint(config);
  const validation = validateBatch(records, config, { strict: options.strict });

  const layouts: LayoutResult[] = [];
  const layoutFailures: LayoutFailure[] = [];

  for (const record of validation.accepted) {
    try {
      layouts.push(
        computeLayout(record, config, {
          ada,
          configFingerprint: fingerprint,
          inputFingerprint: options.inputFingerprint,
          computedAt: options.computedAt,
        }),
      );
    } catch (err) {
      if (!(err instanceof LayoutContractError)) throw err;
      layoutFailures.push({ record, finding: err.finding });
    }
  }

  return { validation, layouts, layoutFailures, configFingerprint: fingerprint };
}
