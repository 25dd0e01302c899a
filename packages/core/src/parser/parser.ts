import { ParseError } from "../errors.js";
import type { Command, SourcePosition } from "../types/command.js";
import type { Token } from "../types/token.js";

const USAGE = {
  line: "draw line requires 4 numbers: x1 y1 x2 y2",
  circle: "draw circle requires 3 numbers: x y radius",
  rectangle: "draw rectangle requires 4 numbers: x y width height",
  move: "move requires 2 numbers: x y",
} as const;

/**
 * Parse a token sequence into commands. The EndOfInput sentinel is optional.
 * Throws a ParseError on the first grammar violation; nothing parsed before
 * it is returned.
 */
export function parse(tokens: readonly Token[]): Command[] {
  return new Parser(tokens).parseProgram();
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  /** Current token, or undefined once input is exhausted. */
  private current(): Token | undefined {
    const token = this.tokens[this.pos];
    return token === undefined || token.kind === "EndOfInput"
      ? undefined
      : token;
  }

  private advance(): void {
    this.pos++;
  }

  /**
   * Error positioned at the current token, or at the last token when
   * input has run out.
   */
  private error(detail: string): ParseError {
    const at =
      this.tokens[Math.min(this.pos, this.tokens.length - 1)] ??
      ({ line: 1, column: 0 } satisfies SourcePosition);
    return new ParseError(detail, at.line, at.column);
  }

  private errorAt(token: Token, detail: string): ParseError {
    return new ParseError(detail, token.line, token.column);
  }

  parseProgram(): Command[] {
    const commands: Command[] = [];
    while (this.current() !== undefined) {
      commands.push(this.parseCommand());
    }
    return commands;
  }

  private parseCommand(): Command {
    const token = this.current();
    if (token === undefined) throw this.error("Unexpected end of input");
    if (token.kind !== "Keyword") {
      throw this.error(`Expected command keyword, got ${token.kind}`);
    }

    const at: SourcePosition = { line: token.line, column: token.column };
    this.advance();

    switch (token.text) {
      case "draw":
        return this.parseDraw(at);
      case "set":
        return this.parseSetColor(at);
      case "clear":
        return { kind: "clear", ...at };
      case "move": {
        const [x, y] = this.numbers(2, USAGE.move);
        return { kind: "move", x, y, ...at };
      }
      case "pen":
        return this.parsePen(at);
      default:
        throw this.errorAt(token, `Unknown command: ${token.text}`);
    }
  }

  private parseDraw(at: SourcePosition): Command {
    const shape = this.current();
    if (shape === undefined || shape.kind !== "Keyword") {
      throw this.error("Expected shape type after 'draw'");
    }
    this.advance();

    switch (shape.text) {
      case "line": {
        const [x1, y1, x2, y2] = this.numbers(4, USAGE.line);
        return { kind: "draw-line", x1, y1, x2, y2, ...at };
      }
      case "circle": {
        const [x, y, radius] = this.numbers(3, USAGE.circle);
        return { kind: "draw-circle", x, y, radius, ...at };
      }
      case "rectangle": {
        const [x, y, width, height] = this.numbers(4, USAGE.rectangle);
        return { kind: "draw-rectangle", x, y, width, height, ...at };
      }
      default:
        throw this.errorAt(shape, `Unknown shape type: ${shape.text}`);
    }
  }

  private parseSetColor(at: SourcePosition): Command {
    const keyword = this.current();
    if (keyword === undefined || keyword.text.toLowerCase() !== "color") {
      throw this.error("Expected 'color' after 'set'");
    }
    this.advance();

    const name = this.current();
    if (
      name === undefined ||
      (name.kind !== "ColorName" && name.kind !== "String")
    ) {
      throw this.error("Expected color name after 'set color'");
    }
    this.advance();

    return { kind: "set-color", name: name.text, ...at };
  }

  private parsePen(at: SourcePosition): Command {
    const action = this.current();
    if (action === undefined) {
      throw this.error("Expected 'up' or 'down' after 'pen'");
    }

    if (action.text === "up") {
      this.advance();
      return { kind: "pen-up", ...at };
    }
    if (action.text === "down") {
      this.advance();
      return { kind: "pen-down", ...at };
    }
    throw this.errorAt(action, `Expected 'up' or 'down', got '${action.text}'`);
  }

  /** Read `count` numeric arguments; any failure reports the usage line. */
  private numbers(count: number, usage: string): number[] {
    const values: number[] = [];
    for (let i = 0; i < count; i++) {
      try {
        values.push(this.number());
      } catch {
        throw this.error(usage);
      }
    }
    return values;
  }

  private number(): number {
    const token = this.current();
    if (token === undefined) throw this.error("Unexpected end of input, expected Number");
    if (token.kind !== "Number") {
      throw this.error(`Expected Number, got ${token.kind}`);
    }
    const value = Number(token.text);
    if (Number.isNaN(value)) throw this.error(`Invalid number: ${token.text}`);
    this.advance();
    return value;
  }
}
