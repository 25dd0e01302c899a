import yaml from "js-yaml";
import type { SessionConfig } from "../types/session.js";
import { SessionConfigSchema } from "../types/session.js";

/**
 * Parse a JSON or YAML string into a validated SessionConfig.
 * Detects format automatically (tries JSON first, then YAML).
 * Missing fields take their defaults; an empty document is all defaults.
 */
export function parseSessionConfig(input: string): SessionConfig {
  let raw: unknown;

  try {
    raw = JSON.parse(input);
  } catch {
    try {
      raw = yaml.load(input);
    } catch (yamlErr) {
      throw new Error(
        `Failed to parse input as JSON or YAML: ${yamlErr instanceof Error ? yamlErr.message : String(yamlErr)}`,
      );
    }
  }

  const result = SessionConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid PenScript config:\n${issues}`);
  }

  return result.data;
}
