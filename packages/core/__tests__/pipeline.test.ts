import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import { configFingerprint } from "../src/fingerprint.js";
import { runPipeline } from "../src/resolver/pipeline.js";
import { DEFAULT_CONFIG, type MillworkConfig } from "../src/types/config.js";
import { makeRecord } from "./helpers.js";

const COMPUTED_AT = "2026-03-04T08:00:00.000Z";

const RECORDS = [
  makeRecord(),
  makeRecord({
    room_id: "K-102",
    rowNumber: 3,
    total_length_in: 144,
    num_modules: 3,
    module_widths: [40, 40, 40],
    left_filler_in: 0,
    right_filler_in: 0,
  }),
  makeRecord({ room_id: "K-103", rowNumber: 4 }),
];

describe("runPipeline", () => {
  it("lays out accepted records only", () => {
    const result = runPipeline(RECORDS, DEFAULT_CONFIG, { computedAt: COMPUTED_AT });

    expect(result.layouts.map((l) => l.roomId)).toEqual(["K-101", "K-103"]);
    expect(result.validation.counts).toEqual({
      total: 3,
      accepted: 2,
      rejected: 1,
      successRate: 2 / 3,
    });
    expect(result.layoutFailures).toEqual([]);
    expect(result.configFingerprint).toBe(configFingerprint(DEFAULT_CONFIG));
  });

  it("stamps every layout with the batch fingerprints", () => {
    const result = runPipeline(RECORDS, DEFAULT_CONFIG, {
      computedAt: COMPUTED_AT,
      inputFingerprint: "batch-hash",
    });

    for (const layout of result.layouts) {
      expect(layout.metadata.inputFingerprint).toBe("batch-hash");
      expect(layout.metadata.configFingerprint).toBe(result.configFingerprint);
      expect(layout.metadata.computedAt).toBe(COMPUTED_AT);
    }
  });

  it("gives identical output on a second run", () => {
    const first = runPipeline(RECORDS, DEFAULT_CONFIG, { computedAt: COMPUTED_AT });
    const second = runPipeline(RECORDS, DEFAULT_CONFIG, { computedAt: COMPUTED_AT });
    expect(second).toEqual(first);
  });

  it("fails the whole batch on a malformed clearance", () => {
    const base = DEFAULT_CONFIG.ADA;
    if (!base) throw new Error("default ADA profile missing");
    const config: MillworkConfig = {
      ...DEFAULT_CONFIG,
      ADA: { ...base, KNEE_CLEAR: "27 H x 30 W" },
    };

    expect(() => runPipeline(RECORDS, config)).toThrow(ConfigurationError);
  });

  it("keeps laying out when one record's counter height leaves no box height", () => {
    const config: MillworkConfig = { ...DEFAULT_CONFIG, COUNTERTOP: { THICKNESS: 30 } };
    const records = [
      makeRecord({ counter_height_in: 34 }),
      makeRecord({ room_id: "K-102", rowNumber: 3, counter_height_in: 30 }),
    ];
    const result = runPipeline(records, config, { computedAt: COMPUTED_AT });

    expect(result.layouts.map((l) => l.roomId)).toEqual(["K-101"]);
    expect(result.layoutFailures.map((f) => [f.record.room_id, f.finding.field])).toEqual([
      ["K-102", "counter_height_in"],
    ]);
  });
});
