/**
 * Raised by the lexer. Only an unterminated string literal is a lexical error.
 */
export class LexError extends Error {
  constructor(
    readonly detail: string,
    readonly line: number,
    readonly column: number,
  ) {
    super(`Lexical error at line ${line}, column ${column}: ${detail}`);
    this.name = "LexError";
  }
}

/**
 * Raised by the parser on the first grammar violation. The whole parse is
 * abandoned; no commands are returned.
 */
export class ParseError extends Error {
  constructor(
    readonly detail: string,
    readonly line: number,
    readonly column: number,
  ) {
    super(`Parse error at line ${line}, column ${column}: ${detail}`);
    this.name = "ParseError";
  }
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
