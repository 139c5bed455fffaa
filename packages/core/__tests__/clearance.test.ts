import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import { parseClearance } from "../src/parser/clearance.js";

describe("parseClearance", () => {
  it("parses height, width and depth in inches", () => {
    expect(parseClearance('27" H x 30" W x 17" D')).toEqual({
      height: 27,
      width: 30,
      depth: 17,
    });
  });

  it("tolerates missing inch marks, decimals and loose spacing", () => {
    expect(parseClearance(' 9 H x 30.5W x 6"D ')).toEqual({
      height: 9,
      width: 30.5,
      depth: 6,
    });
  });

  it("throws ConfigurationError for malformed text", () => {
    for (const bad of ['27" H x 30" W', '30" W x 27" H x 17" D', "27 x 30 x 17", ""]) {
      expect(() => parseClearance(bad)).toThrow(ConfigurationError);
    }
  });

  it("names the config path and the expected format", () => {
    expect(() => parseClearance("knee room", "ADA.KNEE_CLEAR")).toThrow(
      'Invalid clearance specification at ADA.KNEE_CLEAR: "knee room". Expected format: 27" H x 30" W x 17" D',
    );
  });

  it("carries the offending text on the error", () => {
    try {
      parseClearance("bad", "ADA.TOE_CLEAR");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.path).toBe("ADA.TOE_CLEAR");
        expect(err.value).toBe("bad");
      }
    }
  });
});
