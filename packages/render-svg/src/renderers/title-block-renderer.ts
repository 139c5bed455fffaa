import type { LayoutMetadata } from "@millwork/core";
import type { DrawingContext } from "../drawing-context.js";

export const GENERATOR_LABEL = "Millwork Drafter v0.1";

// Block geometry in pixels at a 1200px-wide drawing; scaled with the sheet
const REFERENCE_WIDTH = 1200;
const BLOCK = { width: 380, height: 150, inset: 20, divider: 80 };
const PAD_X = 12;
const SECOND_COLUMN_X = 200;

export interface TitleBlockInfo {
  title: string;
  sheet?: string;
  scale?: string;
  codeBasis?: string;
}

interface TitleCell {
  /** Baseline, measured from the top of the block */
  top: number;
  column: 0 | 1;
  text: string;
  fontSize: number;
  bold?: boolean;
  muted?: boolean;
}

function titleCells(info: TitleBlockInfo, metadata: LayoutMetadata): TitleCell[] {
  const d = BLOCK.divider;
  const cells: (TitleCell | false)[] = [
    { top: 24, column: 0, text: info.title, fontSize: 18, bold: true },
    { top: 48, column: 0, text: `Room: ${metadata.roomId}`, fontSize: 13 },
    !!metadata.sourceFile && {
      top: 68,
      column: 0,
      text: `Source: ${metadata.sourceFile} row ${metadata.rowNumber}`,
      fontSize: 11,
    },
    { top: d + 20, column: 0, text: `Date: ${metadata.computedAt.slice(0, 10)}`, fontSize: 12 },
    !!info.sheet && { top: d + 20, column: 1, text: `Sheet: ${info.sheet}`, fontSize: 12 },
    !!info.scale && { top: d + 38, column: 0, text: `Scale: ${info.scale}`, fontSize: 12 },
    !!info.codeBasis && { top: d + 38, column: 1, text: `Code: ${info.codeBasis}`, fontSize: 12 },
    {
      top: d + 58,
      column: 0,
      text: `Config ${metadata.configFingerprint.slice(0, 12)}`,
      fontSize: 10,
      muted: true,
    },
    { top: d + 58, column: 1, text: GENERATOR_LABEL, fontSize: 10, muted: true },
  ];
  return cells.filter((c): c is TitleCell => c !== false);
}

/**
 * Title block in the lower-right corner: room, source row, date, sheet,
 * scale, code basis and configuration fingerprint.
 */
export function renderTitleBlock(
  info: TitleBlockInfo,
  metadata: LayoutMetadata,
  svgWidth: number,
  svgHeight: number,
  dc: DrawingContext,
): void {
  const k = svgWidth / REFERENCE_WIDTH;
  const width = BLOCK.width * k;
  const height = BLOCK.height * k;
  const x = svgWidth - width - BLOCK.inset * k;
  const y = svgHeight - height - BLOCK.inset * k;
  const columns = [x + PAD_X * k, x + SECOND_COLUMN_X * k];

  dc.openGroup({
    class: "title-block",
    "font-family": "'Helvetica','Arial',sans-serif",
    fill: "#000",
  });

  dc.rect({ x, y, width, height }, {
    fill: "white",
    stroke: "#000",
    strokeWidth: (0.5 * k).toFixed(2),
  });
  const dividerY = y + BLOCK.divider * k;
  dc.line(x, dividerY, x + width, dividerY, {
    stroke: "#000",
    strokeWidth: (0.35 * k).toFixed(2),
  });

  for (const cell of titleCells(info, metadata)) {
    dc.text(columns[cell.column] ?? x, y + cell.top * k, cell.text, {
      fontSize: cell.fontSize * k,
      fontWeight: cell.bold ? "bold" : undefined,
      fill: cell.muted ? "#666" : undefined,
    });
  }

  dc.closeGroup();
}
