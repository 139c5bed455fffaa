import { describe, expect, it } from "vitest";
import {
  configFingerprint,
  inputFingerprint,
  sha256Hex,
  stableStringify,
} from "../src/fingerprint.js";
import { DEFAULT_CONFIG } from "../src/types/config.js";

describe("stableStringify", () => {
  it("sorts keys at every level and drops undefined members", () => {
    expect(stableStringify({ b: 1, a: { d: [2, { z: 1, y: 2 }], c: undefined } })).toBe(
      '{"a":{"d":[2,{"y":2,"z":1}]},"b":1}',
    );
  });
});

describe("fingerprints", () => {
  it("hashes with sha-256", () => {
    expect(sha256Hex("abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
    expect(inputFingerprint("abc")).toBe(sha256Hex("abc"));
  });

  it("ignores key order in configuration", () => {
    const { PAGE, ...rest } = DEFAULT_CONFIG;
    const reordered = { PAGE, ...rest };
    expect(configFingerprint(reordered)).toBe(configFingerprint(DEFAULT_CONFIG));
  });

  it("changes when a value changes", () => {
    expect(configFingerprint({ ...DEFAULT_CONFIG, COUNTER_HEIGHT: 34 })).not.toBe(
      configFingerprint(DEFAULT_CONFIG),
    );
  });
});
