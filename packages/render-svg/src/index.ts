export { renderShopDrawing } from "./render-svg.js";
export type { SvgRenderOptions } from "./render-svg.js";
export {
  buildDimensionChains,
  CHAIN_OFFSET_IN,
  OVERALL_OFFSET_IN,
  HEIGHT_OFFSET_IN,
} from "./renderers/dimension-renderer.js";
export type {
  DimensionChain,
  DimensionSegment,
} from "./renderers/dimension-renderer.js";
export { GENERATOR_LABEL } from "./renderers/title-block-renderer.js";
export type { TitleBlockInfo } from "./renderers/title-block-renderer.js";
export { SvgDocument } from "./svg-document.js";
export { SvgDrawingContext } from "./svg-drawing-context.js";
export type {
  DrawingContext,
  StrokeStyle,
  TextAnchor,
  TextStyle,
} from "./drawing-context.js";
