import { element, openTag } from "./utils.js";

/**
 * Lightweight SVG document builder. No DOM dependency.
 */
export class SvgDocument {
  private elements: string[] = [];

  constructor(
    private width: number,
    private height: number,
    private background: string = "white",
  ) {}

  add(svg: string): void {
    this.elements.push(svg);
  }

  clear(): void {
    this.elements = [];
  }

  get size(): number {
    return this.elements.length;
  }

  toString(): string {
    const { width, height } = this;
    const parts: string[] = [];

    parts.push(
      openTag("svg", {
        xmlns: "http://www.w3.org/2000/svg",
        viewBox: `0 0 ${width} ${height}`,
        width,
        height,
      }),
    );
    parts.push(
      element("rect", { x: 0, y: 0, width, height, fill: this.background }),
    );

    parts.push(`<g class="drawing">`);
    for (const el of this.elements) {
      parts.push(el);
    }
    parts.push("</g>");

    parts.push("</svg>");
    return parts.join("\n");
  }
}
