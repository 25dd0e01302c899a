import { readFileSync } from "node:fs";
import { checkSource } from "@penscript/core";

export function validateCommand(input: string): void {
  try {
    const source = readFileSync(input, "utf-8");
    const { errors, warnings } = checkSource(source);

    if (errors.length === 0 && warnings.length === 0) {
      console.log("✓ Program is valid. No issues found.");
      return;
    }

    if (errors.length > 0) {
      console.error(`\n${errors.length} error(s):`);
      for (const err of errors) {
        console.error(`  ✗ ${err.line}:${err.column} [${err.code}] ${err.message}`);
        if (err.suggestion) {
          console.error(`    → ${err.suggestion}`);
        }
      }
    }

    if (warnings.length > 0) {
      console.warn(`\n${warnings.length} warning(s):`);
      for (const warn of warnings) {
        console.warn(`  ⚠ ${warn.line}:${warn.column} [${warn.code}] ${warn.message}`);
        if (warn.suggestion) {
          console.warn(`    → ${warn.suggestion}`);
        }
      }
    }

    console.log(
      `\nSummary: ${errors.length} error(s), ${warnings.length} warning(s)`,
    );

    if (errors.length > 0) {
      process.exit(1);
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
