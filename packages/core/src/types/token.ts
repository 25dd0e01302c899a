// ---- Token vocabulary ----

export type TokenKind =
  | "Keyword"
  | "Number"
  | "String"
  | "ColorName"
  | "LParen"
  | "RParen"
  | "Comma"
  | "Unknown"
  | "EndOfInput";

/**
 * A classified lexical unit. `line` starts at 1, `column` at 0.
 * Keyword and ColorName text is always lowercase.
 */
export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly line: number;
  readonly column: number;
}

export const KEYWORDS: ReadonlySet<string> = new Set([
  "draw",
  "line",
  "circle",
  "rectangle",
  "set",
  "color",
  "clear",
  "move",
  "to",
  "from",
  "pen",
  "up",
  "down",
  "fill",
]);
