import type { Rect } from "@millwork/core";

const SVG_NS = "http://www.w3.org/2000/svg";

/** Physical sheet dimensions as CSS lengths, e.g. `{ width: "11in", height: "8.5in" }` */
export interface SheetSize {
  width: string;
  height: string;
}

/**
 * One drawing page. Renderers add markup to named layers; each layer
 * becomes a `<g class="layer-NAME">` in the order it was first used.
 */
export class SvgDocument {
  private readonly layers = new Map<string, string[]>();
  private title = "";

  constructor(
    private readonly viewBox: Rect,
    private readonly background = "white",
    private readonly sheet?: SheetSize,
  ) {}

  setTitle(title: string): void {
    this.title = title;
  }

  addToLayer(layerName: string, markup: string): void {
    if (markup === "") return;
    const existing = this.layers.get(layerName) ?? [];
    existing.push(markup);
    this.layers.set(layerName, existing);
  }

  toString(): string {
    const box = this.viewBox;
    const viewBox = [box.x, box.y, box.width, box.height].map(n).join(" ");
    const width = this.sheet?.width ?? n(box.width);
    const height = this.sheet?.height ?? n(box.height);

    const lines = [
      `<svg xmlns="${SVG_NS}" viewBox="${viewBox}" width="${width}" height="${height}">`,
    ];
    if (this.title !== "") {
      lines.push(`<title>${escapeXml(this.title)}</title>`);
    }
    lines.push(
      `<rect x="${n(box.x)}" y="${n(box.y)}" width="${n(box.width)}" height="${n(box.height)}" fill="${escapeXml(this.background)}"/>`,
    );
    for (const [name, markup] of this.layers) {
      lines.push(`<g class="layer-${name}">`, ...markup, "</g>");
    }
    lines.push("</svg>");
    return lines.join("\n");
  }
}

/** Attribute-ready number: at most two decimals, no trailing zeros. */
export function n(value: number): string {
  return String(Math.round(value * 100) / 100);
}

const XML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => XML_ENTITIES[ch] ?? ch);
}
