export { SvgSurface } from "./svg-surface.js";
export { SvgDocument } from "./svg-document.js";
export { renderProgram } from "./render-svg.js";
export type { RenderResult } from "./render-svg.js";
