import { shapesTemplate } from "../templates/shapes.js";
import { houseTemplate } from "../templates/house.js";

export const TEMPLATE_NAMES = ["shapes", "house"] as const;

export type TemplateName = (typeof TEMPLATE_NAMES)[number];

export const templates: Readonly<Record<TemplateName, string>> = {
  shapes: shapesTemplate,
  house: houseTemplate,
};

export function isTemplateName(name: string): name is TemplateName {
  return (TEMPLATE_NAMES as readonly string[]).includes(name);
}

interface InitOptions {
  template: string;
}

export function initCommand(options: InitOptions): void {
  if (!isTemplateName(options.template)) {
    console.error(`Unknown template: ${options.template}`);
    console.error(`Available: ${TEMPLATE_NAMES.join(", ")}`);
    process.exit(1);
  }

  process.stdout.write(templates[options.template]);
}
