import type {
  CountertopLayout,
  FillerLayout,
  ModuleLayout,
} from "@millwork/core";
import { rectToSvg, type TransformContext } from "../coordinate-transform.js";
import type { DrawingContext } from "../drawing-context.js";

const CASEWORK_STYLE = {
  fill: "#f4efe6",
  stroke: "#000",
  strokeWidth: "1.2",
};

const FILLER_STYLE = {
  fill: "#d9d9d9",
  stroke: "#000",
  strokeWidth: "0.8",
};

const COUNTERTOP_STYLE = {
  fill: "#8c8c8c",
  stroke: "#000",
  strokeWidth: "1",
};

/**
 * Draw module boxes in elevation, one group per module so the index is
 * addressable in the output.
 */
export function renderModules(
  modules: readonly ModuleLayout[],
  ctx: TransformContext,
  dc: DrawingContext,
): void {
  for (const mod of modules) {
    const r = rectToSvg(mod, ctx);
    dc.openGroup({ class: "module", "data-index": String(mod.index) });
    dc.rect(r, CASEWORK_STYLE);
    dc.closeGroup();
  }
}

export function renderFillers(
  fillers: readonly FillerLayout[],
  ctx: TransformContext,
  dc: DrawingContext,
): void {
  for (const filler of fillers) {
    const r = rectToSvg(filler, ctx);
    dc.openGroup({ class: `filler filler-${filler.side}` });
    dc.rect(r, FILLER_STYLE);
    // Diagonal hatch marks the filler as non-functional casework
    dc.line(r.x, r.y + r.height, r.x + r.width, r.y, {
      stroke: "#000",
      strokeWidth: "0.5",
    });
    dc.closeGroup();
  }
}

export function renderCountertop(
  countertop: CountertopLayout,
  ctx: TransformContext,
  dc: DrawingContext,
): void {
  const r = rectToSvg(countertop, ctx);
  dc.openGroup({ class: "countertop" });
  dc.rect(r, COUNTERTOP_STYLE);
  dc.closeGroup();
}
