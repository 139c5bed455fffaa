export type LengthUnit = "in" | "ft" | "mm" | "cm" | "pt";
export type DisplayUnit = "in" | "mm" | "ft-in";

// Millimetres per unit; the canonical internal unit is the inch.
const MM_PER_UNIT: Record<LengthUnit, number> = {
  in: 25.4,
  ft: 304.8,
  mm: 1,
  cm: 10,
  pt: 25.4 / 72,
};

/**
 * Convert a length between units.
 *
 *   convertLength(1, "ft", "in")  → 12
 *   convertLength(36, "in", "mm") → 914.4
 */
export function convertLength(
  value: number,
  from: LengthUnit,
  to: LengthUnit,
): number {
  if (from === to) return value;
  return (value * MM_PER_UNIT[from]) / MM_PER_UNIT[to];
}

/** Apply a drawing scale, e.g. 0.25 for 1/4" = 1'-0" */
export function applyScale(value: number, scale: number): number {
  return value * scale;
}

/** Round for display. Geometry returned by the engine is never rounded. */
export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/** Slack for binary round-off in decimal inch arithmetic */
export const LENGTH_EPSILON = 1e-9;

/** Tolerance-aware equality; the boundary is inclusive. */
export function nearlyEqual(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= tolerance + LENGTH_EPSILON;
}

/**
 * Format an inch value for display.
 *
 *   formatLength(36, "in", 2)     → 36"
 *   formatLength(36.125, "in", 2) → 36.13"
 *   formatLength(36, "mm", 1)     → 914.4mm
 *   formatLength(150, "ft-in", 2) → 12'-6"
 */
export function formatLength(
  inches: number,
  unit: DisplayUnit,
  places: number,
): string {
  switch (unit) {
    case "in":
      return `${trim(inches, places)}"`;
    case "mm":
      return `${trim(convertLength(inches, "in", "mm"), places)}mm`;
    case "ft-in":
      return formatFeetInches(inches, places);
  }
}

function formatFeetInches(inches: number, places: number): string {
  const negative = inches < 0;
  const abs = Math.abs(inches);
  let feet = Math.floor(abs / 12);
  let remaining = roundTo(abs - feet * 12, places);

  // Handle rounding 12 inches up to next foot
  if (remaining >= 12) {
    feet += 1;
    remaining = 0;
  }

  return `${negative ? "-" : ""}${feet}'-${trim(remaining, places)}"`;
}

function trim(value: number, places: number): string {
  return Number(value.toFixed(places)).toString();
}

/**
 * Architectural scale note for a plan scale given in paper inches per
 * foot.
 *
 *   formatScale(0.25)  → 1/4" = 1'-0"
 *   formatScale(1.5)   → 1-1/2" = 1'-0"
 *   formatScale(3)     → 3" = 1'-0"
 */
export function formatScale(inchesPerFoot: number): string {
  return `${formatFraction(inchesPerFoot)}" = 1'-0"`;
}

function formatFraction(value: number): string {
  const whole = Math.floor(value);
  const rest = value - whole;
  if (rest === 0) return String(whole);

  for (const denominator of [2, 4, 8, 16, 32]) {
    const numerator = rest * denominator;
    if (Number.isInteger(numerator)) {
      const fraction = `${numerator}/${denominator}`;
      return whole > 0 ? `${whole}-${fraction}` : fraction;
    }
  }
  return trim(value, 4);
}
