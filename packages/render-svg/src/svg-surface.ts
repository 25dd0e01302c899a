import type { BoundingBox, DrawingSurface } from "@penscript/core";
import { SvgDocument } from "./svg-document.js";
import type { AttrValue } from "./utils.js";
import { element } from "./utils.js";

interface StyleOpts {
  stroke: string;
  strokeWidth: number;
  fill?: string | null;
}

/**
 * SVG implementation of DrawingSurface.
 * Elements are kept in call order; later ones paint over earlier ones.
 */
export class SvgSurface implements DrawingSurface {
  private readonly doc: SvgDocument;

  constructor(
    readonly width: number,
    readonly height: number,
    background = "white",
  ) {
    this.doc = new SvgDocument(width, height, background);
  }

  drawLine(
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    strokeColor: string,
    strokeWidth: number,
  ): void {
    this.doc.add(
      element("line", {
        x1,
        y1,
        x2,
        y2,
        ...styleAttrs({ stroke: strokeColor, strokeWidth }),
      }),
    );
  }

  drawEllipse(
    box: BoundingBox,
    outlineColor: string,
    fillColor: string | null,
    strokeWidth: number,
  ): void {
    const cx = (box.x1 + box.x2) / 2;
    const cy = (box.y1 + box.y2) / 2;
    const rx = Math.abs(box.x2 - box.x1) / 2;
    const ry = Math.abs(box.y2 - box.y1) / 2;
    this.doc.add(
      element("ellipse", {
        cx,
        cy,
        rx,
        ry,
        ...styleAttrs({ stroke: outlineColor, strokeWidth, fill: fillColor }),
      }),
    );
  }

  drawRectangle(
    box: BoundingBox,
    outlineColor: string,
    fillColor: string | null,
    strokeWidth: number,
  ): void {
    const x = Math.min(box.x1, box.x2);
    const y = Math.min(box.y1, box.y2);
    const width = Math.abs(box.x2 - box.x1);
    const height = Math.abs(box.y2 - box.y1);
    this.doc.add(
      element("rect", {
        x,
        y,
        width,
        height,
        ...styleAttrs({ stroke: outlineColor, strokeWidth, fill: fillColor }),
      }),
    );
  }

  clearAll(): void {
    this.doc.clear();
  }

  /** Number of elements currently on the surface. */
  get elementCount(): number {
    return this.doc.size;
  }

  toSvg(): string {
    return this.doc.toString();
  }
}

function styleAttrs(opts: StyleOpts): Record<string, AttrValue> {
  const attrs: Record<string, AttrValue> = {
    stroke: opts.stroke,
    "stroke-width": opts.strokeWidth,
  };
  // Lines carry no fill attribute; shapes without a fill are outlines
  if (opts.fill !== undefined) {
    attrs.fill = opts.fill ?? "none";
  }
  return attrs;
}
