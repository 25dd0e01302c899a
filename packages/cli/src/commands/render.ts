import { readFileSync, writeFileSync } from "node:fs";
import type { SessionConfig } from "@penscript/core";
import {
  DEFAULT_SESSION_CONFIG,
  describeCommand,
  parseSessionConfig,
} from "@penscript/core";
import { renderProgram } from "@penscript/render-svg";

interface RenderOptions {
  output?: string;
  config?: string;
  width?: string;
  height?: string;
  background?: string;
  quiet?: boolean;
}

export function renderCommand(input: string, options: RenderOptions): void {
  try {
    const source = readFileSync(input, "utf-8");
    if (source.trim() === "") {
      console.log("No commands to execute");
      return;
    }

    const config = resolveConfig(options);
    const { svg, report } = renderProgram(source, config);

    if (!options.quiet) {
      console.log(`Parsed ${report.commands.length} command(s)`);
      for (const result of report.results) {
        const line = `[${result.index}] ${result.message}`;
        if (result.ok) {
          console.log(line);
        } else {
          const { command } = result;
          console.error(line);
          console.error(`    at line ${command.line}: ${describeCommand(command)}`);
        }
      }
    }

    const outputPath = options.output ?? input.replace(/(\.[^./\\]+)?$/, ".svg");
    writeFileSync(outputPath, svg, "utf-8");
    console.log(`Rendered: ${outputPath}`);
  } catch (err) {
    console.error(
      `Error: ${err instanceof Error ? err.message : String(err)}`,
    );
    process.exit(1);
  }
}

/** Config file values, then command-line overrides. */
function resolveConfig(options: RenderOptions): SessionConfig {
  const base = options.config
    ? parseSessionConfig(readFileSync(options.config, "utf-8"))
    : DEFAULT_SESSION_CONFIG;

  return {
    ...base,
    canvas: {
      width: parsePixels(options.width, "--width") ?? base.canvas.width,
      height: parsePixels(options.height, "--height") ?? base.canvas.height,
      background: options.background ?? base.canvas.background,
    },
  };
}

/** Whole positive pixel count; anything else is rejected. */
export function parsePixels(
  value: string | undefined,
  flag: string,
): number | undefined {
  if (value === undefined) return undefined;
  const px = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!(px > 0)) {
    throw new Error(`${flag} must be a positive integer, got "${value}"`);
  }
  return px;
}
