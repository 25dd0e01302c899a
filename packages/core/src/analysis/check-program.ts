import { LexError, ParseError } from "../errors.js";
import { isColorName } from "../executor/colors.js";
import { tokenize } from "../lexer/lexer.js";
import { parse } from "../parser/parser.js";
import type { Command } from "../types/command.js";

export interface CheckIssue {
  code: string;
  severity: "error" | "warning";
  message: string;
  line: number;
  column: number;
  suggestion: string | null;
}

export interface CheckResult {
  errors: CheckIssue[];
  warnings: CheckIssue[];
}

/**
 * Check program text. A lexical or syntax error is reported as the single
 * error of the result; otherwise the parsed program is linted.
 */
export function checkSource(source: string): CheckResult {
  let commands: Command[];
  try {
    commands = parse(tokenize(source));
  } catch (err) {
    if (err instanceof LexError || err instanceof ParseError) {
      return {
        errors: [
          {
            code: err instanceof LexError ? "lexical-error" : "syntax-error",
            severity: "error",
            message: err.detail,
            line: err.line,
            column: err.column,
            suggestion: null,
          },
        ],
        warnings: [],
      };
    }
    throw err;
  }
  return checkProgram(commands);
}

/**
 * Linter-style pass over a parsed program. Flags statements that are valid
 * but probably not what the author meant.
 */
export function checkProgram(commands: readonly Command[]): CheckResult {
  const warnings: CheckIssue[] = [];
  let penDown = true;

  for (const command of commands) {
    checkFractionalCoordinates(command, warnings);

    switch (command.kind) {
      case "set-color":
        if (!isColorName(command.name)) {
          warnings.push(
            issue(
              command,
              "unknown-color",
              `Unknown color "${command.name}" will draw in black`,
              "Use one of the named colors, e.g. red, blue or grey",
            ),
          );
        }
        break;
      case "draw-circle":
        if (command.radius < 0) {
          warnings.push(
            issue(
              command,
              "negative-radius",
              `Circle at (${command.x}, ${command.y}) has a negative radius`,
              "Use a positive radius",
            ),
          );
        } else if (command.radius === 0) {
          warnings.push(
            issue(
              command,
              "zero-radius",
              `Circle at (${command.x}, ${command.y}) has zero radius`,
              null,
            ),
          );
        }
        break;
      case "draw-rectangle":
        if (command.width < 0 || command.height < 0) {
          warnings.push(
            issue(
              command,
              "negative-size",
              `Rectangle at (${command.x}, ${command.y}) has a negative size`,
              "Give the top-left corner and a positive width and height",
            ),
          );
        } else if (command.width === 0 || command.height === 0) {
          warnings.push(
            issue(
              command,
              "empty-rectangle",
              `Rectangle at (${command.x}, ${command.y}) has zero width or height`,
              null,
            ),
          );
        }
        break;
      case "pen-up":
        if (!penDown) {
          warnings.push(
            issue(
              command,
              "redundant-pen-state",
              "Pen is already up",
              "Remove this 'pen up'",
            ),
          );
        }
        penDown = false;
        break;
      case "pen-down":
        if (penDown) {
          warnings.push(
            issue(
              command,
              "redundant-pen-state",
              "Pen is already down",
              "Remove this 'pen down'",
            ),
          );
        }
        penDown = true;
        break;
      default:
        break;
    }
  }

  return { errors: [], warnings };
}

/**
 * Surfaces draw at integer pixels, so decimals are truncated.
 */
function checkFractionalCoordinates(
  command: Command,
  warnings: CheckIssue[],
): void {
  const values = numericArguments(command);
  if (values.some((v) => !Number.isInteger(v))) {
    warnings.push(
      issue(
        command,
        "fractional-coordinate",
        "Decimal values are truncated to whole pixels when drawn",
        "Round the values to whole numbers",
      ),
    );
  }
}

function numericArguments(command: Command): number[] {
  switch (command.kind) {
    case "draw-line":
      return [command.x1, command.y1, command.x2, command.y2];
    case "draw-circle":
      return [command.x, command.y, command.radius];
    case "draw-rectangle":
      return [command.x, command.y, command.width, command.height];
    case "move":
      return [command.x, command.y];
    default:
      return [];
  }
}

function issue(
  command: Command,
  code: string,
  message: string,
  suggestion: string | null,
): CheckIssue {
  return {
    code,
    severity: "warning",
    message,
    line: command.line,
    column: command.column,
    suggestion,
  };
}
