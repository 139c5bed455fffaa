import { describe, expect, it } from "vitest";
import { boundingBox, spanUnion } from "../src/geometry/bounds.js";
import {
  applyScale,
  convertLength,
  formatLength,
  formatScale,
  nearlyEqual,
  roundTo,
} from "../src/geometry/units.js";

describe("convertLength", () => {
  it("converts between units", () => {
    expect(convertLength(1, "ft", "in")).toBeCloseTo(12);
    expect(convertLength(36, "in", "mm")).toBeCloseTo(914.4);
    expect(convertLength(72, "pt", "in")).toBeCloseTo(1);
    expect(convertLength(10, "cm", "mm")).toBeCloseTo(100);
  });

  it("returns the value untouched for the same unit", () => {
    expect(convertLength(0.1 + 0.2, "in", "in")).toBe(0.1 + 0.2);
  });
});

describe("scale and rounding", () => {
  it("applies a plan scale", () => {
    expect(applyScale(48, 0.25)).toBe(12);
  });

  it("rounds to places", () => {
    expect(roundTo(36.125, 2)).toBe(36.13);
    expect(roundTo(36.124, 2)).toBe(36.12);
  });

  it("treats the tolerance boundary as equal", () => {
    expect(nearlyEqual(72.125, 72, 0.125)).toBe(true);
    expect(nearlyEqual(72.25, 72, 0.125)).toBe(false);
    expect(nearlyEqual(66.2, 66.1, 0.1)).toBe(true);
  });
});

describe("formatLength", () => {
  it("formats inches without trailing zeros", () => {
    expect(formatLength(36, "in", 2)).toBe('36"');
    expect(formatLength(36.5, "in", 2)).toBe('36.5"');
  });

  it("formats millimetres", () => {
    expect(formatLength(36, "mm", 1)).toBe("914.4mm");
  });

  it("formats feet and inches with carry", () => {
    expect(formatLength(150, "ft-in", 2)).toBe(`12'-6"`);
    expect(formatLength(30, "ft-in", 2)).toBe(`2'-6"`);
    expect(formatLength(23.999, "ft-in", 2)).toBe(`2'-0"`);
  });
});

describe("formatScale", () => {
  it("writes architectural scale notes", () => {
    expect(formatScale(0.25)).toBe(`1/4" = 1'-0"`);
    expect(formatScale(0.125)).toBe(`1/8" = 1'-0"`);
    expect(formatScale(1.5)).toBe(`1-1/2" = 1'-0"`);
    expect(formatScale(3)).toBe(`3" = 1'-0"`);
  });
});

describe("boundingBox", () => {
  it("unions rectangles", () => {
    expect(
      boundingBox([
        { x: 0, y: 0, width: 36, height: 34.5 },
        { x: 36, y: -1.5, width: 30, height: 10 },
      ]),
    ).toEqual({ x: 0, y: -1.5, width: 66, height: 36 });
  });

  it("is a zero rect for no input", () => {
    expect(boundingBox([])).toEqual({ x: 0, y: 0, width: 0, height: 0 });
  });
});

describe("spanUnion", () => {
  it("covers every span", () => {
    expect(
      spanUnion([
        { x: 3, width: 36 },
        { x: 0, width: 3 },
        { x: 39, width: 30 },
      ]),
    ).toEqual({ x: 0, width: 69 });
  });
});
