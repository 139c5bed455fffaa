import { nearlyEqual } from "../geometry/units.js";
import type { MillworkConfig, RangeLimit } from "../types/config.js";
import type { ParsedRoomData } from "../types/record.js";
import type {
  CheckContext,
  Finding,
  GeometricCheckResult,
  LengthSumReport,
} from "../types/validation.js";
import { recordFinding, toResult } from "./findings.js";

/**
 * Compare module widths plus fillers against the declared total length.
 * The comparison is inclusive: a delta equal to the tolerance passes.
 */
export function measureLengthSum(
  record: ParsedRoomData,
  tolerance: number,
): LengthSumReport {
  const moduleSum = record.module_widths.reduce((sum, w) => sum + w, 0);
  const computedTotal =
    moduleSum + record.left_filler_in + record.right_filler_in;
  const delta = Math.abs(computedTotal - record.total_length_in);

  return {
    moduleSum,
    leftFiller: record.left_filler_in,
    rightFiller: record.right_filler_in,
    computedTotal,
    totalLength: record.total_length_in,
    delta,
    tolerance,
    withinTolerance: nearlyEqual(computedTotal, record.total_length_in, tolerance),
  };
}

/**
 * Length-sum, width sanity and counter-height checks. Sanity-limit
 * violations are warnings; strict mode turns them into errors.
 */
export function checkGeometricConsistency(
  record: ParsedRoomData,
  config: MillworkConfig,
  context: CheckContext = {},
): GeometricCheckResult {
  const findings: Finding[] = [];
  const lengthSum = measureLengthSum(record, config.TOLERANCES.LENGTH_SUM);

  if (!lengthSum.withinTolerance) {
    findings.push(
      recordFinding(record, {
        kind: "geometric",
        code: "length-sum-mismatch",
        field: "total_length_in",
        message:
          `Module sum + fillers (${lengthSum.computedTotal.toFixed(3)}") does not match ` +
          `total length (${lengthSum.totalLength.toFixed(3)}") within tolerance ` +
          `(${lengthSum.tolerance.toFixed(3)}"); delta ${lengthSum.delta.toFixed(3)}"`,
        value: { ...lengthSum },
      }),
    );
  }

  findings.push(...checkModuleWidths(record, config.LIMITS?.MODULE_WIDTH));
  findings.push(...checkFillers(record, config.LIMITS?.FILLER_WIDTH));

  const counterHeight = record.counter_height_in;
  const ada = config.ADA;
  if (counterHeight !== undefined && ada) {
    const [min, max] = ada.COUNTER_RANGE;
    if (counterHeight < min || counterHeight > max) {
      findings.push(
        recordFinding(record, {
          kind: "geometric",
          code: "counter-height-out-of-range",
          field: "counter_height_in",
          message: `Counter height ${counterHeight}" is outside the allowed range [${min}, ${max}] (ADA.COUNTER_RANGE)`,
          value: counterHeight,
        }),
      );
    }
  }

  return { ...toResult(findings, context.strict), lengthSum };
}

function checkModuleWidths(
  record: ParsedRoomData,
  limit: RangeLimit | undefined,
): Finding[] {
  const findings: Finding[] = [];

  record.module_widths.forEach((width, i) => {
    const n = i + 1;
    if (width <= 0) {
      findings.push(
        recordFinding(record, {
          kind: "geometric",
          code: "non-positive-width",
          field: "module_widths",
          message: `Module ${n} width must be positive: ${width}`,
          value: width,
        }),
      );
    } else if (limit?.MIN !== undefined && width < limit.MIN) {
      findings.push(
        recordFinding(record, {
          kind: "geometric",
          code: "module-width-small",
          severity: "warning",
          field: "module_widths",
          message: `Module ${n} width ${width}" is below LIMITS.MODULE_WIDTH.MIN (${limit.MIN}")`,
          value: width,
        }),
      );
    } else if (limit?.MAX !== undefined && width > limit.MAX) {
      findings.push(
        recordFinding(record, {
          kind: "geometric",
          code: "module-width-large",
          severity: "warning",
          field: "module_widths",
          message: `Module ${n} width ${width}" is above LIMITS.MODULE_WIDTH.MAX (${limit.MAX}")`,
          value: width,
        }),
      );
    }
  });

  return findings;
}

function checkFillers(
  record: ParsedRoomData,
  limit: RangeLimit | undefined,
): Finding[] {
  const findings: Finding[] = [];
  const fillers = [
    ["left_filler_in", record.left_filler_in],
    ["right_filler_in", record.right_filler_in],
  ] as const;

  for (const [field, width] of fillers) {
    if (width < 0) {
      findings.push(
        recordFinding(record, {
          kind: "geometric",
          code: "negative-filler",
          field,
          message: "Filler width cannot be negative",
          value: width,
        }),
      );
    } else if (width > 0 && limit?.MIN !== undefined && width < limit.MIN) {
      findings.push(
        recordFinding(record, {
          kind: "geometric",
          code: "filler-width-small",
          severity: "warning",
          field,
          message: `Filler width ${width}" is below LIMITS.FILLER_WIDTH.MIN (${limit.MIN}")`,
          value: width,
        }),
      );
    } else if (limit?.MAX !== undefined && width > limit.MAX) {
      findings.push(
        recordFinding(record, {
          kind: "geometric",
          code: "filler-width-large",
          severity: "warning",
          field,
          message: `Large filler width: ${width}" exceeds LIMITS.FILLER_WIDTH.MAX (${limit.MAX}"); consider adjusting module sizes`,
          value: width,
        }),
      );
    }
  }

  return findings;
}
