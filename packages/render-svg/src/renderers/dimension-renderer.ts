import {
  formatLength,
  type DisplayUnit,
  type LayoutResult,
  type Point,
} from "@millwork/core";
import {
  scaleValue,
  type TransformContext,
  toSvg,
} from "../coordinate-transform.js";
import type { DrawingContext } from "../drawing-context.js";
import { n } from "../svg-document.js";

// Dimension element sizes in elevation units (inches)
const TICK_SIZE_IN = 0.6;
const TEXT_OFFSET_IN = 0.8;
const FONT_SIZE_IN = 1.6;
const CHAR_WIDTH_RATIO = 0.6;
const LEADER_PAD_RATIO = 0.6;

const EXTENSION_GAP = 0.5;
const EXTENSION_OVERSHOOT = 0.75;

/** Distance from the floor line to each horizontal string */
export const CHAIN_OFFSET_IN = 6;
export const OVERALL_OFFSET_IN = 12;
/** Distance from the right end of the run to the height string */
export const HEIGHT_OFFSET_IN = 8;

const DIM_TEXT_STYLE = {
  fontFamily: "'Helvetica','Arial',sans-serif",
  fill: "#000",
  stroke: "none",
  textAnchor: "middle" as const,
};

export interface DimensionSegment {
  from: Point;
  to: Point;
  label: string;
}

/**
 * A string of dimensions sharing one baseline. `offset` is the signed
 * distance from the measured edge to the baseline; extension lines run
 * from the edge across the baseline.
 */
export interface DimensionChain {
  orientation: "horizontal" | "vertical";
  offset: number;
  segments: DimensionSegment[];
}

/**
 * Chain (fillers and modules), overall run and counter height strings for
 * a layout, labelled in the requested display unit.
 */
export function buildDimensionChains(
  layout: LayoutResult,
  units: DisplayUnit,
  places: number,
): DimensionChain[] {
  const fmt = (v: number): string => formatLength(v, units, places);
  const chains: DimensionChain[] = [];

  const parts = [...layout.fillers, ...layout.modules]
    .map((p) => ({ x: p.x, width: p.width }))
    .sort((a, b) => a.x - b.x);

  if (parts.length > 1) {
    chains.push({
      orientation: "horizontal",
      offset: -CHAIN_OFFSET_IN,
      segments: parts.map((p) => ({
        from: { x: p.x, y: -CHAIN_OFFSET_IN },
        to: { x: p.x + p.width, y: -CHAIN_OFFSET_IN },
        label: fmt(p.width),
      })),
    });
  }

  const top = layout.countertop;
  chains.push({
    orientation: "horizontal",
    offset: -OVERALL_OFFSET_IN,
    segments: [
      {
        from: { x: top.x, y: -OVERALL_OFFSET_IN },
        to: { x: top.x + top.width, y: -OVERALL_OFFSET_IN },
        label: fmt(layout.assemblyLength),
      },
    ],
  });

  const right = top.x + top.width;
  const surface = top.y + top.height;
  chains.push({
    orientation: "vertical",
    offset: HEIGHT_OFFSET_IN,
    segments: [
      {
        from: { x: right + HEIGHT_OFFSET_IN, y: 0 },
        to: { x: right + HEIGHT_OFFSET_IN, y: surface },
        label: fmt(surface),
      },
    ],
  });

  return chains;
}

type Orientation = DimensionChain["orientation"];

/**
 * Maps (along, across) coordinates onto elevation points so that one
 * drawing routine serves both orientations. `along` runs with the
 * measurement; `across` is the distance from the measured edge.
 */
interface Axis {
  point(along: number, across: number): Point;
  along(p: Point): number;
  across(p: Point): number;
}

const AXES: Record<Orientation, Axis> = {
  horizontal: {
    point: (along, across) => ({ x: along, y: across }),
    along: (p) => p.x,
    across: (p) => p.y,
  },
  vertical: {
    point: (along, across) => ({ x: across, y: along }),
    along: (p) => p.y,
    across: (p) => p.x,
  },
};

interface LabelMetrics {
  fontSize: number;
  textOffset: number;
  sign: number;
}

/**
 * Render a dimension string with extension lines, baseline, tick marks
 * and per-segment labels. Horizontal labels too wide for their segment
 * are pushed past its end on a leader.
 */
export function renderDimensionChain(
  chain: DimensionChain,
  ctx: TransformContext,
  dc: DrawingContext,
): void {
  const segments = chain.segments;
  const first = segments[0];
  const last = segments[segments.length - 1];
  if (!first || !last) return;

  const axis = AXES[chain.orientation];
  const tick = scaleValue(TICK_SIZE_IN, ctx);
  const metrics: LabelMetrics = {
    fontSize: scaleValue(FONT_SIZE_IN, ctx),
    textOffset: scaleValue(TEXT_OFFSET_IN, ctx),
    sign: chain.offset >= 0 ? 1 : -1,
  };

  const baseline = axis.across(first.from);
  const extStart = baseline - chain.offset + metrics.sign * EXTENSION_GAP;
  const extEnd = baseline + metrics.sign * EXTENSION_OVERSHOOT;
  const stops = [axis.along(first.from), ...segments.map((s) => axis.along(s.to))];

  const segmentLine = (a: Point, b: Point): void => {
    const p = toSvg(a, ctx);
    const q = toSvg(b, ctx);
    dc.line(p.x, p.y, q.x, q.y);
  };

  dc.openGroup({
    class: "dimension",
    stroke: "#555",
    "stroke-width": "0.18mm",
  });

  segmentLine(
    axis.point(axis.along(first.from), baseline),
    axis.point(axis.along(last.to), baseline),
  );

  for (const stop of stops) {
    segmentLine(axis.point(stop, extStart), axis.point(stop, extEnd));
    const c = toSvg(axis.point(stop, baseline), ctx);
    dc.line(c.x - tick, c.y + tick, c.x + tick, c.y - tick);
  }

  for (const segment of segments) {
    const from = toSvg(segment.from, ctx);
    const to = toSvg(segment.to, ctx);
    if (chain.orientation === "horizontal") {
      labelAlongRun(dc, from, to, segment.label, metrics);
    } else {
      labelAlongHeight(dc, from, to, segment.label, metrics);
    }
  }

  dc.closeGroup();
}

function estimateTextWidthPx(label: string, fontSize: number): number {
  return label.length * fontSize * CHAR_WIDTH_RATIO;
}

function labelAlongRun(
  dc: DrawingContext,
  from: Point,
  to: Point,
  label: string,
  { fontSize, textOffset }: LabelMetrics,
): void {
  const y = from.y - textOffset;
  const textWidth = estimateTextWidthPx(label, fontSize);
  const style = { ...DIM_TEXT_STYLE, fontSize };

  if (textWidth <= to.x - from.x) {
    dc.text((from.x + to.x) / 2, y, label, style);
    return;
  }

  const center = to.x + textWidth / 2 + fontSize * LEADER_PAD_RATIO;
  dc.text(center, y, label, style);
  dc.line(to.x, from.y, center + textWidth / 2, from.y);
}

function labelAlongHeight(
  dc: DrawingContext,
  from: Point,
  to: Point,
  label: string,
  { fontSize, textOffset, sign }: LabelMetrics,
): void {
  const x = from.x + sign * textOffset;
  const y = (from.y + to.y) / 2;
  dc.text(x, y, label, {
    ...DIM_TEXT_STYLE,
    fontSize,
    transform: `rotate(-90 ${n(x)} ${n(y)})`,
  });
}
