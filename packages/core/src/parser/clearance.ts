import { ConfigurationError } from "../errors.js";

export interface Clearance {
  height: number;
  width: number;
  depth: number;
}

const NUM = String.raw`(\d+(?:\.\d+)?)`;
const SUFFIX = (letter: string) => String.raw`\s*"?\s*${letter}`;

// `27" H x 30" W x 17" D`: exactly three dimensions, always in H, W, D order
const CLEARANCE = new RegExp(
  `^${NUM}${SUFFIX("H")}\\s*x\\s*${NUM}${SUFFIX("W")}\\s*x\\s*${NUM}${SUFFIX("D")}$`,
);

/**
 * Parse a textual clearance specification into inches.
 *
 *   `27" H x 30" W x 17" D` → { height: 27, width: 30, depth: 17 }
 *
 * Anything else (missing letter, reordered or partial tokens) is a
 * configuration error; there is no lenient fallback.
 */
export function parseClearance(text: string, path = ""): Clearance {
  const match = text.trim().match(CLEARANCE);
  if (!match) {
    throw new ConfigurationError(
      `Invalid clearance specification${path ? ` at ${path}` : ""}: "${text}". Expected format: 27" H x 30" W x 17" D`,
      path,
      text,
    );
  }

  return {
    height: parseFloat(match[1]),
    width: parseFloat(match[2]),
    depth: parseFloat(match[3]),
  };
}
