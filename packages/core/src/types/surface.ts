/**
 * Drawing capability the executor renders onto.
 * Coordinates are integer pixels; colors are `#RRGGBB` strings.
 * Enables multiple backends (SVG, in-memory recorders) from the same executor.
 */

/** Axis-aligned box given by two opposite corners. */
export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface DrawingSurface {
  readonly width: number;
  readonly height: number;
  drawLine(
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    strokeColor: string,
    strokeWidth: number,
  ): void;
  drawEllipse(
    box: BoundingBox,
    outlineColor: string,
    fillColor: string | null,
    strokeWidth: number,
  ): void;
  drawRectangle(
    box: BoundingBox,
    outlineColor: string,
    fillColor: string | null,
    strokeWidth: number,
  ): void;
  clearAll(): void;
}
