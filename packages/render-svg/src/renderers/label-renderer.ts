import type { CountertopLayout, ModuleLayout } from "@millwork/core";
import { scaleValue, toSvg, type TransformContext } from "../coordinate-transform.js";
import type { DrawingContext } from "../drawing-context.js";

// Label font size in elevation units (inches)
const LABEL_SIZE_IN = 1.8;

const LABEL_STYLE = {
  fontFamily: "'Helvetica','Arial',sans-serif",
  fill: "#000",
  textAnchor: "middle" as const,
  dominantBaseline: "central",
};

/**
 * Module tag (M1, M2, ...) centered in each box with the casework
 * material code beneath it.
 */
export function renderModuleLabels(
  modules: readonly ModuleLayout[],
  ctx: TransformContext,
  dc: DrawingContext,
): void {
  const fontSize = scaleValue(LABEL_SIZE_IN, ctx);

  for (const mod of modules) {
    const center = toSvg(
      { x: mod.x + mod.width / 2, y: mod.y + mod.height / 2 },
      ctx,
    );
    dc.text(center.x, center.y, `M${mod.index + 1}`, {
      ...LABEL_STYLE,
      fontSize,
      fontWeight: "bold",
    });
    dc.text(center.x, center.y + fontSize * 1.4, mod.materialCode, {
      ...LABEL_STYLE,
      fontSize: fontSize * 0.75,
    });
  }
}

/** Countertop material and edge rule, written just above the finished surface. */
export function renderCountertopLabel(
  countertop: CountertopLayout,
  ctx: TransformContext,
  dc: DrawingContext,
): void {
  const fontSize = scaleValue(LABEL_SIZE_IN, ctx) * 0.75;
  const pos = toSvg(
    {
      x: countertop.x + countertop.width / 2,
      y: countertop.y + countertop.height,
    },
    ctx,
  );
  dc.text(pos.x, pos.y - fontSize, `TOP: ${countertop.materialCode} (${countertop.edgeRule})`, {
    ...LABEL_STYLE,
    fontSize,
  });
}
