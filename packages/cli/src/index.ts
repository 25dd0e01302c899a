#!/usr/bin/env tsx
import { Command } from "commander";
import { renderCommand } from "./commands/render.js";
import { initCommand } from "./commands/init.js";
import { validateCommand } from "./commands/validate.js";

const program = new Command();

program
  .name("penscript")
  .description("Draw SVG pictures from a small pen-and-shapes language")
  .version("0.1.0");

program
  .command("render <input>")
  .description("Run a drawing program and write the result as SVG")
  .option("-o, --output <file>", "Output file path (default: <input>.svg)")
  .option("-c, --config <file>", "Session config file (YAML or JSON)")
  .option("--width <px>", "Canvas width in pixels (default: 800)")
  .option("--height <px>", "Canvas height in pixels (default: 600)")
  .option("--background <color>", "Canvas background color")
  .option("-q, --quiet", "Do not print the per-command transcript")
  .action(renderCommand);

program
  .command("validate <input>")
  .description("Check a drawing program for errors and likely mistakes")
  .action(validateCommand);

program
  .command("init")
  .description("Print a starter drawing program")
  .option("-t, --template <name>", "Template name (shapes, house)", "shapes")
  .action(initCommand);

program.parse();
