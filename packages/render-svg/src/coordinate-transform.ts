import type { Point, Rect } from "@millwork/core";

export interface TransformContext {
  extents: Rect;
  margin: number;
  scale: number;
  svgWidth: number;
  svgHeight: number;
}

/**
 * Create a transform from elevation coordinates (inches, Y-up) to SVG
 * pixels (Y-down), fitting `extents` plus a margin into `svgWidth`.
 */
export function createTransform(
  extents: Rect,
  svgWidth: number,
  margin: number,
): TransformContext {
  const totalWidth = extents.width + 2 * margin;
  const totalHeight = extents.height + 2 * margin;

  const scale = svgWidth / totalWidth;
  const svgHeight = totalHeight * scale;

  return { extents, margin, scale, svgWidth, svgHeight };
}

export function toSvg(point: Point, ctx: TransformContext): Point {
  return {
    x: (point.x - ctx.extents.x + ctx.margin) * ctx.scale,
    y: ctx.svgHeight - (point.y - ctx.extents.y + ctx.margin) * ctx.scale,
  };
}

/** In SVG, (x,y) is the top-left corner. */
export function rectToSvg(rect: Rect, ctx: TransformContext): Rect {
  const topLeft = toSvg({ x: rect.x, y: rect.y + rect.height }, ctx);
  return {
    x: topLeft.x,
    y: topLeft.y,
    width: rect.width * ctx.scale,
    height: rect.height * ctx.scale,
  };
}

export function scaleValue(value: number, ctx: TransformContext): number {
  return value * ctx.scale;
}
