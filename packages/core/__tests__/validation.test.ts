import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, type MillworkConfig } from "../src/types/config.js";
import {
  errorsOf,
  mergeResults,
  toResult,
  warningsOf,
} from "../src/validation/findings.js";
import {
  checkGeometricConsistency,
  measureLengthSum,
} from "../src/validation/geometric.js";
import { checkReferentialIntegrity } from "../src/validation/referential.js";
import { checkTypeAndDomain } from "../src/validation/type-domain.js";
import { RECORD_CHECKS, validateRecord } from "../src/validation/validate-record.js";
import { makeRecord } from "./helpers.js";

function codes(findings: { code: string }[]): string[] {
  return findings.map((f) => f.code);
}

describe("checkTypeAndDomain", () => {
  it("passes a well-formed record", () => {
    expect(checkTypeAndDomain(makeRecord(), DEFAULT_CONFIG)).toEqual({
      findings: [],
      passed: true,
    });
  });

  it("flags ids already seen in the batch", () => {
    const result = checkTypeAndDomain(makeRecord(), DEFAULT_CONFIG, {
      seenIds: new Set(["K-101"]),
    });
    expect(result.passed).toBe(false);
    expect(result.findings[0]).toMatchObject({
      kind: "domain",
      code: "duplicate-room-id",
      message: "Duplicate room_id: K-101",
      rowNumber: 2,
      roomId: "K-101",
    });
  });

  it("rejects empty and overlong ids", () => {
    expect(codes(checkTypeAndDomain(makeRecord({ room_id: " " }), DEFAULT_CONFIG).findings)).toEqual([
      "empty-room-id",
    ]);
    expect(
      codes(checkTypeAndDomain(makeRecord({ room_id: "R".repeat(51) }), DEFAULT_CONFIG).findings),
    ).toEqual(["room-id-too-long"]);
  });

  it("rejects impossible counts and lengths", () => {
    const result = checkTypeAndDomain(
      makeRecord({ total_length_in: 0, num_modules: 1.5 }),
      DEFAULT_CONFIG,
    );
    expect(codes(result.findings)).toEqual([
      "invalid-total-length",
      "invalid-module-count",
      "module-count-mismatch",
    ]);
  });

  it("rejects non-finite widths", () => {
    const result = checkTypeAndDomain(
      makeRecord({ module_widths: [36, Number.NaN] }),
      DEFAULT_CONFIG,
    );
    expect(result.findings).toHaveLength(1);
    expect(result.findings[0]).toMatchObject({ kind: "type", code: "not-a-number" });
  });
});

describe("measureLengthSum", () => {
  it("sums modules and fillers against the total", () => {
    expect(measureLengthSum(makeRecord(), 0.125)).toEqual({
      moduleSum: 66,
      leftFiller: 3,
      rightFiller: 3,
      computedTotal: 72,
      totalLength: 72,
      delta: 0,
      tolerance: 0.125,
      withinTolerance: true,
    });
  });

  it("passes a delta exactly at the tolerance", () => {
    const report = measureLengthSum(makeRecord({ total_length_in: 72.125 }), 0.125);
    expect(report.delta).toBe(0.125);
    expect(report.withinTolerance).toBe(true);
  });

  it("passes a decimal delta at the tolerance despite round-off", () => {
    const record = makeRecord({
      total_length_in: 66.1,
      module_widths: [36.2, 30],
      left_filler_in: 0,
      right_filler_in: 0,
    });
    const report = measureLengthSum(record, 0.1);
    expect(report.delta).toBeGreaterThan(0.1);
    expect(report.delta).toBeCloseTo(0.1, 9);
    expect(report.withinTolerance).toBe(true);

    const config: MillworkConfig = {
      ...DEFAULT_CONFIG,
      TOLERANCES: { ...DEFAULT_CONFIG.TOLERANCES, LENGTH_SUM: 0.1 },
    };
    expect(checkGeometricConsistency(record, config).passed).toBe(true);
  });
});

describe("checkGeometricConsistency", () => {
  it("fails three 40s against 144 with a delta of 24", () => {
    const record = makeRecord({
      total_length_in: 144,
      num_modules: 3,
      module_widths: [40, 40, 40],
      left_filler_in: 0,
      right_filler_in: 0,
    });
    const result = checkGeometricConsistency(record, DEFAULT_CONFIG);

    expect(result.passed).toBe(false);
    expect(result.lengthSum.delta).toBe(24);
    expect(result.findings).toHaveLength(1);
    expect(result.findings[0]).toMatchObject({
      kind: "geometric",
      code: "length-sum-mismatch",
      field: "total_length_in",
      message:
        'Module sum + fillers (120.000") does not match total length (144.000") within tolerance (0.125"); delta 24.000"',
    });
  });

  it("fails just past the tolerance", () => {
    const result = checkGeometricConsistency(
      makeRecord({ total_length_in: 72.126 }),
      DEFAULT_CONFIG,
    );
    expect(result.passed).toBe(false);
  });

  it("cites the configured range for an out-of-range counter height", () => {
    const result = checkGeometricConsistency(
      makeRecord({ counter_height_in: 40 }),
      DEFAULT_CONFIG,
    );
    expect(result.passed).toBe(false);
    expect(result.findings[0]?.message).toBe(
      'Counter height 40" is outside the allowed range [28, 34] (ADA.COUNTER_RANGE)',
    );
  });

  it("accepts counter heights on the range boundary", () => {
    for (const h of [28, 34]) {
      const result = checkGeometricConsistency(
        makeRecord({ counter_height_in: h }),
        DEFAULT_CONFIG,
      );
      expect(result.passed).toBe(true);
    }
  });

  it("skips the counter height check without an accessibility profile", () => {
    const config: MillworkConfig = { ...DEFAULT_CONFIG, ADA: null };
    const result = checkGeometricConsistency(makeRecord({ counter_height_in: 40 }), config);
    expect(result.passed).toBe(true);
  });

  it("rejects non-positive widths and negative fillers", () => {
    const result = checkGeometricConsistency(
      makeRecord({
        total_length_in: 30,
        module_widths: [36, -6],
        left_filler_in: -3,
        right_filler_in: 3,
      }),
      DEFAULT_CONFIG,
    );
    expect(codes(errorsOf(result))).toEqual(["non-positive-width", "negative-filler"]);
  });

  it("warns about widths outside the sanity limits", () => {
    const result = checkGeometricConsistency(
      makeRecord({
        total_length_in: 82,
        module_widths: [4, 62],
        left_filler_in: 8,
        right_filler_in: 8,
      }),
      DEFAULT_CONFIG,
    );

    expect(result.passed).toBe(true);
    expect(codes(warningsOf(result))).toEqual([
      "module-width-small",
      "module-width-large",
      "filler-width-large",
      "filler-width-large",
    ]);
  });

  it("warns about a filler under the configured minimum", () => {
    const config: MillworkConfig = {
      ...DEFAULT_CONFIG,
      LIMITS: { FILLER_WIDTH: { MIN: 1 } },
    };
    const result = checkGeometricConsistency(
      makeRecord({ total_length_in: 66.5, left_filler_in: 0.5, right_filler_in: 0 }),
      config,
    );
    expect(codes(warningsOf(result))).toEqual(["filler-width-small"]);
  });

  it("elevates warnings in strict mode", () => {
    const record = makeRecord({
      total_length_in: 70,
      num_modules: 1,
      module_widths: [62],
      left_filler_in: 4,
      right_filler_in: 4,
    });

    expect(checkGeometricConsistency(record, DEFAULT_CONFIG).passed).toBe(true);
    const strict = checkGeometricConsistency(record, DEFAULT_CONFIG, { strict: true });
    expect(strict.passed).toBe(false);
    expect(strict.findings[0]?.severity).toBe("error");
  });
});

describe("checkReferentialIntegrity", () => {
  it("accepts known edge rules and hardware keys", () => {
    const result = checkReferentialIntegrity(
      makeRecord({ edge_rule: "PVC_EDGE", hardware_defaults: "HINGE" }),
      DEFAULT_CONFIG,
    );
    expect(result).toEqual({ findings: [], passed: true });
  });

  it("lists the allowed edge rules", () => {
    const result = checkReferentialIntegrity(makeRecord({ edge_rule: "FOO" }), DEFAULT_CONFIG);
    expect(result.passed).toBe(false);
    expect(result.findings[0]).toMatchObject({
      kind: "referential",
      code: "unknown-edge-rule",
      message: 'Invalid edge rule "FOO". Valid options: [MATCH_FACE, PVC_EDGE, SOLID_LUMBER, RADIUS]',
    });
  });

  it("rejects unknown hardware keys", () => {
    const result = checkReferentialIntegrity(
      makeRecord({ hardware_defaults: "LATCH" }),
      DEFAULT_CONFIG,
    );
    expect(result.findings[0]?.message).toBe(
      'Invalid hardware defaults "LATCH". Valid options: [HINGE, PULL, SLIDE]',
    );
  });

  it("reports a missing config key instead of guessing", () => {
    const config: MillworkConfig = { ...DEFAULT_CONFIG, EDGE_RULES: undefined };
    const result = checkReferentialIntegrity(makeRecord({ edge_rule: "PVC_EDGE" }), config);
    expect(codes(result.findings)).toEqual(["missing-config-key"]);
  });

  it("checks materials only against a configured catalog", () => {
    expect(checkReferentialIntegrity(makeRecord(), DEFAULT_CONFIG).passed).toBe(true);

    const config: MillworkConfig = {
      ...DEFAULT_CONFIG,
      MATERIALS: { "QTZ-1": "Quartz, 3cm" },
    };
    const result = checkReferentialIntegrity(makeRecord(), config);
    expect(result.findings).toHaveLength(1);
    expect(result.findings[0]).toMatchObject({
      code: "unknown-material",
      field: "material_casework",
      value: "PLAM-2",
    });
  });
});

describe("validateRecord", () => {
  it("runs every check without short-circuiting", () => {
    expect(RECORD_CHECKS).toHaveLength(3);

    const record = makeRecord({
      total_length_in: 144,
      num_modules: 3,
      module_widths: [40, 40, 40],
      left_filler_in: 0,
      right_filler_in: 0,
      edge_rule: "FOO",
    });
    const result = validateRecord(record, DEFAULT_CONFIG, { seenIds: new Set(["K-101"]) });

    expect(result.passed).toBe(false);
    expect(codes(result.findings)).toEqual([
      "duplicate-room-id",
      "length-sum-mismatch",
      "unknown-edge-rule",
    ]);
  });

  it("is independent of call order", () => {
    const record = makeRecord({ edge_rule: "FOO" });
    expect(validateRecord(record, DEFAULT_CONFIG)).toEqual(
      validateRecord(record, DEFAULT_CONFIG),
    );
  });
});

describe("findings helpers", () => {
  it("recomputes passed when merging results", () => {
    const warn = validateRecord(
      makeRecord({ total_length_in: 70, num_modules: 1, module_widths: [62], left_filler_in: 4, right_filler_in: 4 }),
      DEFAULT_CONFIG,
    );
    const fail = validateRecord(makeRecord({ edge_rule: "FOO" }), DEFAULT_CONFIG);

    expect(warn.passed).toBe(true);
    const merged = mergeResults(warn, fail);
    expect(merged.passed).toBe(false);
    expect(merged.findings).toHaveLength(2);
  });

  it("treats an empty list as passed", () => {
    expect(toResult([])).toEqual({ findings: [], passed: true });
  });
});
