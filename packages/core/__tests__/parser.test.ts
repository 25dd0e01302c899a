import { describe, expect, it } from "vitest";
import { ParseError } from "../src/errors.js";
import { tokenize } from "../src/lexer/lexer.js";
import { parse } from "../src/parser/parser.js";
import { describeCommand } from "../src/types/command.js";

function parseText(source: string) {
  return parse(tokenize(source));
}

/** Tokens the way a host hands them over: sentinel removed. */
function parseStripped(source: string) {
  return parse(tokenize(source).filter((t) => t.kind !== "EndOfInput"));
}

describe("parse", () => {
  describe("commands", () => {
    it("parses draw line", () => {
      expect(parseText("draw line 1 2 3 4")).toEqual([
        { kind: "draw-line", x1: 1, y1: 2, x2: 3, y2: 4, line: 1, column: 0 },
      ]);
    });

    it("parses draw circle and draw rectangle with decimals", () => {
      expect(parseText("draw circle 400 300 50\ndraw rectangle 1.5 2 .25 4")).toEqual([
        { kind: "draw-circle", x: 400, y: 300, radius: 50, line: 1, column: 0 },
        {
          kind: "draw-rectangle",
          x: 1.5,
          y: 2,
          width: 0.25,
          height: 4,
          line: 2,
          column: 0,
        },
      ]);
    });

    it("parses set color with a color name or a string", () => {
      expect(parseText('set color Red\n  SET COLOR "Sky Blue"')).toEqual([
        { kind: "set-color", name: "red", line: 1, column: 0 },
        { kind: "set-color", name: "Sky Blue", line: 2, column: 2 },
      ]);
    });

    it("parses clear, move and pen commands", () => {
      expect(parseText("clear\nmove 10 20\npen up\npen down")).toEqual([
        { kind: "clear", line: 1, column: 0 },
        { kind: "move", x: 10, y: 20, line: 2, column: 0 },
        { kind: "pen-up", line: 3, column: 0 },
        { kind: "pen-down", line: 4, column: 0 },
      ]);
    });

    it("parses several statements on one line", () => {
      expect(parseText("pen up move 5 5 pen down").map((c) => c.kind)).toEqual([
        "pen-up",
        "move",
        "pen-down",
      ]);
    });

    it("gives the same commands with or without the EndOfInput sentinel", () => {
      const source = "set color blue\ndraw circle 400 300 50";
      expect(parseStripped(source)).toEqual(parseText(source));
    });

    it("is deterministic", () => {
      const source = "# house\ndraw rectangle 10 10 50 40\nmove 1 2";
      expect(parseText(source)).toEqual(parseText(source));
    });

    it("returns no commands for comment-only or empty input", () => {
      expect(parseText("# nothing here\n\n")).toEqual([]);
      expect(parseStripped("   ")).toEqual([]);
      expect(parse([])).toEqual([]);
    });
  });

  describe("errors", () => {
    it("rejects draw line with three numbers", () => {
      expect(() => parseText("draw line 1 2 3")).toThrow(
        "Parse error at line 1, column 15: draw line requires 4 numbers: x1 y1 x2 y2",
      );
    });

    it("positions exhausted input at the last token", () => {
      expect(() => parseStripped("draw line 1 2 3")).toThrow(
        "Parse error at line 1, column 14: draw line requires 4 numbers: x1 y1 x2 y2",
      );
    });

    it("returns nothing when a later statement fails", () => {
      let commands: unknown;
      expect(() => {
        commands = parseText("clear\nmove 1 1\ndraw line 1 2 3");
      }).toThrow(ParseError);
      expect(commands).toBeUndefined();
    });

    it("reports draw circle and draw rectangle usage", () => {
      expect(() => parseText("draw circle 1 2 red")).toThrow(
        "Parse error at line 1, column 16: draw circle requires 3 numbers: x y radius",
      );
      expect(() => parseText("draw rectangle 1 2 3")).toThrow(
        "draw rectangle requires 4 numbers: x y width height",
      );
    });

    it("reports move usage with its position", () => {
      try {
        parseText("clear\nmove 1 x");
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ParseError);
        if (err instanceof ParseError) {
          expect(err.detail).toBe("move requires 2 numbers: x y");
          expect(err.line).toBe(2);
          expect(err.column).toBe(7);
        }
      }
    });

    it("rejects a missing or unknown shape", () => {
      expect(() => parseText("draw 1 2")).toThrow(
        "Parse error at line 1, column 5: Expected shape type after 'draw'",
      );
      expect(() => parseText("draw")).toThrow(
        "Parse error at line 1, column 4: Expected shape type after 'draw'",
      );
      expect(() => parseText("draw triangle 1 2 3")).toThrow(
        "Parse error at line 1, column 5: Unknown shape type: triangle",
      );
    });

    it("rejects malformed set color", () => {
      expect(() => parseText("set colour red")).toThrow(
        "Parse error at line 1, column 4: Expected 'color' after 'set'",
      );
      expect(() => parseText("set color teal")).toThrow(
        "Parse error at line 1, column 10: Expected color name after 'set color'",
      );
      expect(() => parseText("set color 5")).toThrow(
        "Expected color name after 'set color'",
      );
    });

    it("rejects malformed pen commands", () => {
      expect(() => parseText("pen sideways")).toThrow(
        "Parse error at line 1, column 4: Expected 'up' or 'down', got 'sideways'",
      );
      expect(() => parseText("pen")).toThrow(
        "Parse error at line 1, column 3: Expected 'up' or 'down' after 'pen'",
      );
      expect(() => parseStripped("pen")).toThrow(
        "Parse error at line 1, column 0: Expected 'up' or 'down' after 'pen'",
      );
    });

    it("rejects unknown leading keywords, fill included", () => {
      expect(() => parseText("fill")).toThrow(
        "Parse error at line 1, column 0: Unknown command: fill",
      );
      expect(() => parseText("clear\n  jump 3")).toThrow(
        "Parse error at line 2, column 2: Unknown command: jump",
      );
    });

    it("rejects a statement that does not start with a keyword", () => {
      expect(() => parseText("42")).toThrow(
        "Parse error at line 1, column 0: Expected command keyword, got Number",
      );
      expect(() => parseText("red")).toThrow(
        "Expected command keyword, got ColorName",
      );
    });
  });

  describe("describeCommand", () => {
    it("renders commands back to statements that parse the same", () => {
      const source =
        'draw line 1 2 3 4\ndraw circle 5 6 7.5\ndraw rectangle 1 1 2 2\nset color red\nset color "Sky Blue"\nclear\nmove 8 9\npen up\npen down';
      const commands = parseText(source);
      expect(commands.map(describeCommand)).toEqual([
        "draw line 1 2 3 4",
        "draw circle 5 6 7.5",
        "draw rectangle 1 1 2 2",
        "set color red",
        'set color "Sky Blue"',
        "clear",
        "move 8 9",
        "pen up",
        "pen down",
      ]);
      const reparsed = parseText(commands.map(describeCommand).join("\n"));
      expect(reparsed).toEqual(commands);
    });

    it("writes very large and very small numbers without exponents", () => {
      const move = { kind: "move", x: 1e21, y: 1.5e-7, line: 1, column: 0 } as const;
      expect(describeCommand(move)).toBe(
        "move 1000000000000000000000 0.00000015",
      );
      expect(parseText(describeCommand(move))).toEqual([move]);
    });

    it("escapes only what the lexer decodes in quoted names", () => {
      const name = 'a"b\\c\nd\te\rf\u0001';
      const setColor = { kind: "set-color", name, line: 1, column: 0 } as const;
      expect(describeCommand(setColor)).toBe(
        'set color "a\\"b\\\\c\\nd\\te\rf\u0001"',
      );
      expect(parseText(describeCommand(setColor))).toEqual([setColor]);
    });
  });
});
