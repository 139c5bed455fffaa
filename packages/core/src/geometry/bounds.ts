import type { Rect } from "../types/geometry.js";

/**
 * Union of a list of rectangles: min of left/bottom edges, max of
 * right/top edges. An empty list yields a zero rect at the origin.
 */
export function boundingBox(rects: readonly Rect[]): Rect {
  if (rects.length === 0) {
    return { x: 0, y: 0, width: 0, height: 0 };
  }

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;

  for (const r of rects) {
    minX = Math.min(minX, r.x);
    minY = Math.min(minY, r.y);
    maxX = Math.max(maxX, r.x + r.width);
    maxY = Math.max(maxY, r.y + r.height);
  }

  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

/** Horizontal extent covered by a set of spans */
export function spanUnion(
  spans: readonly { x: number; width: number }[],
): { x: number; width: number } {
  if (spans.length === 0) return { x: 0, width: 0 };
  const minX = Math.min(...spans.map((s) => s.x));
  const maxX = Math.max(...spans.map((s) => s.x + s.width));
  return { x: minX, width: maxX - minX };
}
