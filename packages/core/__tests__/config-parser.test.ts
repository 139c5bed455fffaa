import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import {
  dumpConfig,
  mergeDefaults,
  parseConfig,
  validateConfig,
} from "../src/parser/config-parser.js";
import { DEFAULT_CONFIG } from "../src/types/config.js";

describe("parseConfig", () => {
  it("returns the defaults for an empty document", () => {
    expect(parseConfig("")).toEqual(DEFAULT_CONFIG);
  });

  it("merges YAML overrides onto the defaults", () => {
    const config = parseConfig(`
COUNTER_HEIGHT: 34
ADA:
  CLEAR_WIDTHS: 36
`);

    expect(config.COUNTER_HEIGHT).toBe(34);
    expect(config.ADA?.CLEAR_WIDTHS).toBe(36);
    expect(config.ADA?.KNEE_CLEAR).toBe('27" H x 30" W x 17" D');
    expect(config.BASE_DEPTH).toBe(24);
  });

  it("accepts JSON", () => {
    const config = parseConfig('{"TOLERANCES": {"LENGTH_SUM": 0.25}}');
    expect(config.TOLERANCES).toEqual({ LENGTH_SUM: 0.25, LENGTH_ROUNDING: 2 });
  });

  it("disables the accessibility profile with null", () => {
    expect(parseConfig("ADA: null").ADA).toBeNull();
  });

  it("replaces lists instead of merging them", () => {
    const config = parseConfig("EDGE_RULES: [SQUARE, MATCH_FACE]");
    expect(config.EDGE_RULES).toEqual(["SQUARE", "MATCH_FACE"]);
  });

  it("requires the default edge rule to be an allowed one", () => {
    expect(() => parseConfig("EDGE_RULES: [SQUARE]")).toThrow(
      '  - EDGE_RULE: "MATCH_FACE" is not one of EDGE_RULES [SQUARE]',
    );
  });

  it("requires the countertop to be thinner than the counter height", () => {
    expect(() => parseConfig("COUNTERTOP:\n  THICKNESS: 36\n")).toThrow(
      "  - COUNTERTOP.THICKNESS: Must be less than COUNTER_HEIGHT (36)",
    );
  });

  it("rejects a malformed clearance string with its path", () => {
    const yaml = "ADA:\n  KNEE_CLEAR: tall\n";
    expect(() => parseConfig(yaml)).toThrow(ConfigurationError);
    expect(() => parseConfig(yaml)).toThrow(
      '  - ADA.KNEE_CLEAR: Invalid clearance specification: "tall". Expected format: 27" H x 30" W x 17" D',
    );
  });

  it("rejects a counter range that is not ascending", () => {
    expect(() => parseConfig("ADA:\n  COUNTER_RANGE: [34, 28]\n")).toThrow(
      "ADA.COUNTER_RANGE: First value must be less than second",
    );
  });

  it("reports the first failing path on the error", () => {
    try {
      parseConfig("TOLERANCES:\n  LENGTH_SUM: -1\n");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.path).toBe("TOLERANCES.LENGTH_SUM");
        expect(err.message.startsWith("Invalid millwork config:\n")).toBe(true);
      }
    }
  });

  it("rejects unknown page sizes and non-integer rounding", () => {
    expect(() => parseConfig("PAGE:\n  SIZE: A9\n")).toThrow("PAGE.SIZE");
    expect(() => parseConfig("TOLERANCES:\n  LENGTH_ROUNDING: 1.5\n")).toThrow(
      "TOLERANCES.LENGTH_ROUNDING",
    );
  });

  it("rejects documents that are not mappings", () => {
    expect(() => parseConfig("- a\n- b\n")).toThrow(
      "Configuration must be a mapping of keys",
    );
  });

  it("rejects unparsable text", () => {
    expect(() => parseConfig("a: [1, 2")).toThrow(
      "Failed to parse input as JSON or YAML",
    );
  });
});

describe("validateConfig", () => {
  it("does not fill in defaults", () => {
    expect(() => validateConfig({})).toThrow(ConfigurationError);
  });

  it("accepts the defaults as they are", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
  });
});

describe("dumpConfig", () => {
  it("writes YAML that parses back to the same config", () => {
    const text = dumpConfig(DEFAULT_CONFIG);
    expect(text).toContain("COUNTER_HEIGHT: 36\n");
    expect(parseConfig(text)).toEqual(DEFAULT_CONFIG);
  });
});

describe("mergeDefaults", () => {
  it("merges mappings key by key and lets scalars, arrays and null replace", () => {
    expect(
      mergeDefaults(
        { a: { b: 1, c: 2 }, list: [1, 2], keep: true, gone: { x: 1 } },
        { a: { c: 3 }, list: [9], gone: null },
      ),
    ).toEqual({ a: { b: 1, c: 3 }, list: [9], keep: true, gone: null });
  });
});
