import {
  boundingBox,
  PAGE_DIMENSIONS,
  type DisplayUnit,
  type LayoutResult,
  type PageConfig,
  type Rect,
} from "@millwork/core";
import { createTransform } from "./coordinate-transform.js";
import { renderAdaClearances } from "./renderers/ada-renderer.js";
import {
  buildDimensionChains,
  renderDimensionChain,
} from "./renderers/dimension-renderer.js";
import {
  renderCountertop,
  renderFillers,
  renderModules,
} from "./renderers/elevation-renderer.js";
import {
  renderCountertopLabel,
  renderModuleLabels,
} from "./renderers/label-renderer.js";
import { renderTitleBlock } from "./renderers/title-block-renderer.js";
import { SvgDocument } from "./svg-document.js";
import { SvgDrawingContext } from "./svg-drawing-context.js";

export interface SvgRenderOptions {
  width?: number;
  background?: string;
  /** Margin around the elevation, in inches */
  margin?: number;
  units?: DisplayUnit;
  /** Decimal places for dimension labels */
  precision?: number;
  showDimensions?: boolean;
  showLabels?: boolean;
  showAda?: boolean;
  showTitleBlock?: boolean;
  title?: string;
  sheet?: string;
  /** Scale note for the title block, e.g. `1/4" = 1'-0"` */
  scale?: string;
  codeBasis?: string;
  /** Fit the drawing onto a sheet of this size and margins */
  page?: PageConfig;
  layers?: Record<string, { visible: boolean }>;
}

const DEFAULT_OPTIONS = {
  width: 1200,
  background: "white",
  units: "in",
  precision: 2,
  showDimensions: true,
  showLabels: true,
  showAda: true,
  showTitleBlock: true,
  title: "Casework Elevation",
} as const;

// Room for the overall dimension string below the floor line plus text
const DEFAULT_MARGIN = 18;

const BASE_TITLE_BLOCK_RESERVE = 170;
const REFERENCE_WIDTH = 1200;

function isLayerVisible(layerName: string, opts: SvgRenderOptions): boolean {
  return opts.layers?.[layerName]?.visible ?? true;
}

/** Everything the drawing shows, including clearance boxes outside the casework. */
function drawingExtents(layout: LayoutResult): Rect {
  const rects: Rect[] = [layout.bounds];
  if (layout.ada) {
    rects.push(layout.ada.kneeBox, layout.ada.toeBox);
  }
  return boundingBox(rects);
}

function physicalSize(page: PageConfig): { width: string; height: string } {
  const sheet = PAGE_DIMENSIONS[page.SIZE];
  return { width: `${sheet.width}in`, height: `${sheet.height}in` };
}

/**
 * Grow the content box by the page margins, measured at the scale that
 * makes the content span the printable width.
 */
function sheetViewBox(content: Rect, page: PageConfig): Rect {
  const [top, right, bottom, left] = page.MARGINS;
  const sheet = PAGE_DIMENSIONS[page.SIZE];
  const printable = sheet.width - left - right;
  const pxPerInch = printable > 0 ? content.width / printable : 1;

  return {
    x: content.x - left * pxPerInch,
    y: content.y - top * pxPerInch,
    width: content.width + (left + right) * pxPerInch,
    height: content.height + (top + bottom) * pxPerInch,
  };
}

/**
 * Render one room's front elevation as an SVG shop drawing: casework,
 * countertop, ADA clearance envelopes, dimension strings and title block.
 */
export function renderShopDrawing(
  layout: LayoutResult,
  options?: SvgRenderOptions,
): string {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const margin = options?.margin ?? DEFAULT_MARGIN;
  const ctx = createTransform(drawingExtents(layout), opts.width, margin);

  const titleBlockReserve =
    BASE_TITLE_BLOCK_RESERVE * (ctx.svgWidth / REFERENCE_WIDTH);
  const totalHeight = opts.showTitleBlock
    ? ctx.svgHeight + titleBlockReserve
    : ctx.svgHeight;

  const content = { x: 0, y: 0, width: ctx.svgWidth, height: totalHeight };
  const doc = options?.page
    ? new SvgDocument(
        sheetViewBox(content, options.page),
        opts.background,
        physicalSize(options.page),
      )
    : new SvgDocument(content, opts.background);
  doc.setTitle(`${opts.title}: ${layout.roomId}`);

  if (isLayerVisible("casework", opts)) {
    const dc = new SvgDrawingContext();
    renderFillers(layout.fillers, ctx, dc);
    renderModules(layout.modules, ctx, dc);
    renderCountertop(layout.countertop, ctx, dc);
    doc.addToLayer("casework", dc.getOutput());
  }

  if (opts.showAda && layout.ada && isLayerVisible("ada", opts)) {
    const dc = new SvgDrawingContext();
    renderAdaClearances(layout.ada, ctx, dc, opts.units, opts.precision);
    doc.addToLayer("ada", dc.getOutput());
  }

  if (opts.showLabels && isLayerVisible("labels", opts)) {
    const dc = new SvgDrawingContext();
    renderModuleLabels(layout.modules, ctx, dc);
    renderCountertopLabel(layout.countertop, ctx, dc);
    doc.addToLayer("labels", dc.getOutput());
  }

  if (opts.showDimensions && isLayerVisible("dimensions", opts)) {
    for (const chain of buildDimensionChains(layout, opts.units, opts.precision)) {
      const dc = new SvgDrawingContext();
      renderDimensionChain(chain, ctx, dc);
      doc.addToLayer("dimensions", dc.getOutput());
    }
  }

  if (opts.showTitleBlock) {
    const dc = new SvgDrawingContext();
    renderTitleBlock(
      {
        title: opts.title,
        sheet: options?.sheet,
        scale: options?.scale,
        codeBasis: options?.codeBasis ?? layout.ada?.codeBasis,
      },
      layout.metadata,
      ctx.svgWidth,
      totalHeight,
      dc,
    );
    doc.addToLayer("title-block", dc.getOutput());
  }

  return doc.toString();
}
