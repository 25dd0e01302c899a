import type { RunReport, SessionConfig } from "@penscript/core";
import { DEFAULT_SESSION_CONFIG, Executor, runProgram } from "@penscript/core";
import { SvgSurface } from "./svg-surface.js";

export interface RenderResult {
  svg: string;
  report: RunReport;
}

/**
 * Run a program on a fresh SVG surface.
 * Lexical and syntax errors propagate; nothing is rendered for them.
 */
export function renderProgram(
  source: string,
  config: SessionConfig = DEFAULT_SESSION_CONFIG,
): RenderResult {
  const { canvas } = config;
  const surface = new SvgSurface(canvas.width, canvas.height, canvas.background);
  const executor = new Executor(surface, { strokeWidth: config.stroke_width });

  const report = runProgram(source, executor);
  return { svg: surface.toSvg(), report };
}
