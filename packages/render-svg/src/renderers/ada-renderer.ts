import { formatLength, type ADALayout, type DisplayUnit } from "@millwork/core";
import {
  rectToSvg,
  scaleValue,
  type TransformContext,
} from "../coordinate-transform.js";
import type { DrawingContext } from "../drawing-context.js";

const ADA_STROKE = "#0057b8";
const NOTE_FONT_SIZE_IN = 1.4;

/**
 * Dashed knee and toe clearance envelopes plus a short compliance note
 * written inside the knee box.
 */
export function renderAdaClearances(
  ada: ADALayout,
  ctx: TransformContext,
  dc: DrawingContext,
  units: DisplayUnit,
  places: number,
): void {
  const knee = rectToSvg(ada.kneeBox, ctx);
  const toe = rectToSvg(ada.toeBox, ctx);
  const fontSize = scaleValue(NOTE_FONT_SIZE_IN, ctx);
  const fmt = (v: number): string => formatLength(v, units, places);

  dc.openGroup({ class: "ada-clearance", fill: "none" });

  dc.rect(knee, {
    stroke: ADA_STROKE,
    strokeWidth: "1",
    strokeDasharray: "6 4",
    fill: "none",
  });
  dc.rect(toe, {
    stroke: ADA_STROKE,
    strokeWidth: "1",
    strokeDasharray: "2 3",
    fill: "none",
  });

  const [min, max] = ada.counterRange;
  const noteX = knee.x + knee.width / 2;
  const lines = [
    `${ada.codeBasis} KNEE CLEARANCE`,
    `${fmt(ada.kneeBox.height)} H x ${fmt(ada.kneeBox.width)} W x ${fmt(ada.kneeBox.depth)} D`,
    `COUNTER ${fmt(ada.counterHeight)} (RANGE ${fmt(min)} - ${fmt(max)})`,
    `CLEAR APPROACH ${fmt(ada.approachWidth)}`,
  ];

  let textY = knee.y + fontSize * 1.5;
  for (const line of lines) {
    dc.text(noteX, textY, line, {
      fontSize,
      fontFamily: "'Helvetica','Arial',sans-serif",
      fill: ADA_STROKE,
      textAnchor: "middle",
    });
    textY += fontSize * 1.3;
  }

  dc.closeGroup();
}
