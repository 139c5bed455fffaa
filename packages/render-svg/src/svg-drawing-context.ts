import type { Rect } from "@millwork/core";
import type { DrawingContext, StrokeStyle, TextStyle } from "./drawing-context.js";
import { escapeXml, n } from "./svg-document.js";

type Attrs = [name: string, value: string | number | undefined][];

/**
 * DrawingContext that accumulates SVG markup. Numeric attributes are
 * rounded through n(); attributes left undefined are not written.
 */
export class SvgDrawingContext implements DrawingContext {
  private parts: string[] = [];

  line(x1: number, y1: number, x2: number, y2: number, opts?: StrokeStyle): void {
    this.emit("line", [["x1", x1], ["y1", y1], ["x2", x2], ["y2", y2], ...style(opts)]);
  }

  rect(box: Rect, opts?: StrokeStyle): void {
    this.emit("rect", [["x", box.x], ["y", box.y], ["width", box.width], ["height", box.height], ...style(opts)]);
  }

  text(x: number, y: number, content: string, opts?: TextStyle): void {
    const attrs: Attrs = [
      ["x", x],
      ["y", y],
      ["fill", opts?.fill],
      ["font-family", opts?.fontFamily],
      ["font-size", opts?.fontSize],
      ["font-weight", opts?.fontWeight],
      ["text-anchor", opts?.textAnchor],
      ["dominant-baseline", opts?.dominantBaseline],
      ["transform", opts?.transform],
    ];
    this.parts.push(`<text${serialize(attrs)}>${escapeXml(content)}</text>`);
  }

  openGroup(attrs?: Record<string, string>): void {
    this.parts.push(`<g${serialize(Object.entries(attrs ?? {}))}>`);
  }

  closeGroup(): void {
    this.parts.push("</g>");
  }

  getOutput(): string {
    return this.parts.join("\n");
  }

  private emit(tag: string, attrs: Attrs): void {
    this.parts.push(`<${tag}${serialize(attrs)}/>`);
  }
}

function style(opts?: StrokeStyle): Attrs {
  return [
    ["stroke", opts?.stroke],
    ["stroke-width", opts?.strokeWidth],
    ["fill", opts?.fill],
    ["stroke-dasharray", opts?.strokeDasharray],
  ];
}

function serialize(attrs: Attrs): string {
  return attrs
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([name, value]) =>
      ` ${name}="${typeof value === "number" ? n(value) : escapeXml(value)}"`,
    )
    .join("");
}
