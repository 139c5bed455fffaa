import type { Rect } from "@millwork/core";

export interface StrokeStyle {
  stroke?: string;
  strokeWidth?: string;
  fill?: string;
  strokeDasharray?: string;
}

export type TextAnchor = "start" | "middle" | "end";

export interface TextStyle extends StrokeStyle {
  fontSize?: number;
  fontFamily?: string;
  fontWeight?: string;
  textAnchor?: TextAnchor;
  dominantBaseline?: string;
  transform?: string;
}

/**
 * Primitives the shop-drawing renderers draw with, in SVG pixel space.
 * Boxes come straight from `rectToSvg`; grouping lets a renderer tag a
 * module or filler so its parts can be styled or picked out together.
 */
export interface DrawingContext {
  line(x1: number, y1: number, x2: number, y2: number, style?: StrokeStyle): void;
  rect(box: Rect, style?: StrokeStyle): void;
  text(x: number, y: number, content: string, style?: TextStyle): void;
  openGroup(attrs?: Record<string, string>): void;
  closeGroup(): void;
  getOutput(): string;
}
