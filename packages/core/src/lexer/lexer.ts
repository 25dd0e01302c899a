import { LexError } from "../errors.js";
import { isColorName } from "../executor/colors.js";
import type { Token, TokenKind } from "../types/token.js";
import { KEYWORDS } from "../types/token.js";

const WHITESPACE = /\s/;
const DIGIT = /[0-9]/;
const IDENT_START = /[\p{L}_]/u;
const IDENT_PART = /[\p{L}\p{N}_]/u;

const PUNCTUATION: Record<string, TokenKind> = {
  "(": "LParen",
  ")": "RParen",
  ",": "Comma",
};

/**
 * Convert source text into tokens. The result always ends with a single
 * EndOfInput token. Throws a LexError only for an unterminated string.
 */
export function tokenize(source: string): Token[] {
  const scanner = new Scanner(source);
  const tokens: Token[] = [];
  for (;;) {
    const token = scanner.next();
    tokens.push(token);
    if (token.kind === "EndOfInput") return tokens;
  }
}

class Scanner {
  private pos = 0;
  private line = 1;
  private column = 0;

  constructor(private readonly text: string) {}

  /** Character `offset` code points ahead; astral characters count as one. */
  private charAt(offset = 0): string | undefined {
    let index = this.pos;
    for (let i = 0; i < offset; i++) {
      const code = this.text.codePointAt(index);
      if (code === undefined) return undefined;
      index += code > 0xffff ? 2 : 1;
    }
    const code = this.text.codePointAt(index);
    return code === undefined ? undefined : String.fromCodePoint(code);
  }

  private advance(): void {
    const ch = this.charAt();
    if (ch === "\n") {
      this.line++;
      this.column = 0;
    } else {
      this.column++;
    }
    this.pos += ch?.length ?? 1;
  }

  private token(
    kind: TokenKind,
    text: string,
    line: number,
    column: number,
  ): Token {
    return { kind, text, line, column };
  }

  next(): Token {
    for (;;) {
      const ch = this.charAt();
      if (ch === undefined) {
        return this.token("EndOfInput", "", this.line, this.column);
      }

      if (WHITESPACE.test(ch)) {
        this.skipWhitespace();
        continue;
      }

      if (ch === "#") {
        this.skipComment();
        continue;
      }

      const { line, column } = this;

      if (DIGIT.test(ch) || (ch === "." && DIGIT.test(this.charAt(1) ?? ""))) {
        return this.token("Number", this.readNumber(), line, column);
      }

      if (ch === '"') {
        return this.token("String", this.readString(), line, column);
      }

      if (IDENT_START.test(ch)) {
        const word = this.readIdentifier().toLowerCase();
        if (KEYWORDS.has(word)) return this.token("Keyword", word, line, column);
        if (isColorName(word)) return this.token("ColorName", word, line, column);
        // Unknown identifiers are rejected by the parser, not here
        return this.token("Keyword", word, line, column);
      }

      this.advance();
      return this.token(PUNCTUATION[ch] ?? "Unknown", ch, line, column);
    }
  }

  private skipWhitespace(): void {
    for (let ch = this.charAt(); ch !== undefined && WHITESPACE.test(ch); ch = this.charAt()) {
      this.advance();
    }
  }

  /** Skip through the end of the line, newline included. */
  private skipComment(): void {
    for (let ch = this.charAt(); ch !== undefined && ch !== "\n"; ch = this.charAt()) {
      this.advance();
    }
    if (this.charAt() === "\n") this.advance();
  }

  /** Digits with at most one decimal point; a second point ends the number. */
  private readNumber(): string {
    let result = "";
    let seenDot = false;
    for (let ch = this.charAt(); ch !== undefined; ch = this.charAt()) {
      if (ch === ".") {
        if (seenDot) break;
        seenDot = true;
      } else if (!DIGIT.test(ch)) {
        break;
      }
      result += ch;
      this.advance();
    }
    return result;
  }

  private readString(): string {
    let result = "";
    this.advance(); // opening quote

    for (let ch = this.charAt(); ch !== undefined && ch !== '"'; ch = this.charAt()) {
      if (ch === "\\") {
        this.advance();
        const escaped = this.charAt();
        if (escaped === undefined) break;
        result += escaped === "n" ? "\n" : escaped === "t" ? "\t" : escaped;
      } else {
        result += ch;
      }
      this.advance();
    }

    if (this.charAt() === undefined) {
      throw new LexError("Unterminated string", this.line, this.column);
    }

    this.advance(); // closing quote
    return result;
  }

  private readIdentifier(): string {
    const start = this.pos;
    for (let ch = this.charAt(); ch !== undefined && IDENT_PART.test(ch); ch = this.charAt()) {
      this.advance();
    }
    return this.text.slice(start, this.pos);
  }
}
