import { isColorName } from "../executor/colors.js";

// ---- Command model ----

/** Source position of a command's leading keyword. */
export interface SourcePosition {
  readonly line: number;
  readonly column: number;
}

export interface DrawLineCommand extends SourcePosition {
  readonly kind: "draw-line";
  readonly x1: number;
  readonly y1: number;
  readonly x2: number;
  readonly y2: number;
}

export interface DrawCircleCommand extends SourcePosition {
  readonly kind: "draw-circle";
  readonly x: number;
  readonly y: number;
  readonly radius: number;
}

export interface DrawRectangleCommand extends SourcePosition {
  readonly kind: "draw-rectangle";
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export interface SetColorCommand extends SourcePosition {
  readonly kind: "set-color";
  /** Color name as written in the source (lowercase for bare names). */
  readonly name: string;
}

export interface ClearCommand extends SourcePosition {
  readonly kind: "clear";
}

export interface MoveCommand extends SourcePosition {
  readonly kind: "move";
  readonly x: number;
  readonly y: number;
}

export interface PenUpCommand extends SourcePosition {
  readonly kind: "pen-up";
}

export interface PenDownCommand extends SourcePosition {
  readonly kind: "pen-down";
}

export type Command =
  | DrawLineCommand
  | DrawCircleCommand
  | DrawRectangleCommand
  | SetColorCommand
  | ClearCommand
  | MoveCommand
  | PenUpCommand
  | PenDownCommand;

export type CommandKind = Command["kind"];

/**
 * Render a command back to a DSL statement that parses to the same command.
 * Names outside the color table are written as quoted strings. Numbers must
 * be finite and non-negative, as the lexer reads them.
 */
export function describeCommand(command: Command): string {
  switch (command.kind) {
    case "draw-line":
      return `draw line ${numbers(command.x1, command.y1, command.x2, command.y2)}`;
    case "draw-circle":
      return `draw circle ${numbers(command.x, command.y, command.radius)}`;
    case "draw-rectangle":
      return `draw rectangle ${numbers(command.x, command.y, command.width, command.height)}`;
    case "set-color":
      return isColorName(command.name) &&
        command.name === command.name.toLowerCase()
        ? `set color ${command.name}`
        : `set color ${quote(command.name)}`;
    case "clear":
      return "clear";
    case "move":
      return `move ${numbers(command.x, command.y)}`;
    case "pen-up":
      return "pen up";
    case "pen-down":
      return "pen down";
  }
}

function numbers(...values: number[]): string {
  return values.map(formatNumber).join(" ");
}

/** Plain decimal notation; the lexer has no exponent syntax. */
function formatNumber(value: number): string {
  const text = String(value);
  if (!text.includes("e")) return text;
  // Floats this large are whole numbers
  if (Math.abs(value) >= 1) return BigInt(value).toString();
  const [mantissa, exponent] = text.split("e");
  const digits = mantissa.replace(/[-.]/g, "").length;
  return value.toFixed(Math.min(100, digits - 1 - Number(exponent)));
}

/** Quote a string using only the escapes the lexer decodes. */
function quote(text: string): string {
  const escaped = text.replace(/[\\"\n\t]/g, (ch) =>
    ch === "\n" ? "\\n" : ch === "\t" ? "\\t" : `\\${ch}`,
  );
  return `"${escaped}"`;
}
