import { describe, expect, it } from "vitest";
import { parseSessionConfig } from "../src/parser/config-parser.js";
import { DEFAULT_SESSION_CONFIG } from "../src/types/session.js";

const YAML_CONFIG = `
canvas:
  width: 1024
  background: "#fafafa"
stroke_width: 3
`;

describe("parseSessionConfig", () => {
  it("parses YAML and fills in defaults", () => {
    expect(parseSessionConfig(YAML_CONFIG)).toEqual({
      canvas: { width: 1024, height: 600, background: "#fafafa" },
      stroke_width: 3,
    });
  });

  it("parses JSON", () => {
    expect(parseSessionConfig('{"stroke_width": 1.5}')).toEqual({
      canvas: { width: 800, height: 600, background: "white" },
      stroke_width: 1.5,
    });
  });

  it("treats an empty document as all defaults", () => {
    expect(parseSessionConfig("")).toEqual(DEFAULT_SESSION_CONFIG);
    expect(parseSessionConfig("{}")).toEqual(DEFAULT_SESSION_CONFIG);
  });

  it("rejects invalid values with their paths", () => {
    expect(() => parseSessionConfig("canvas:\n  width: -5\n")).toThrow(
      /Invalid PenScript config:\n {2}- canvas\.width: /,
    );
    expect(() => parseSessionConfig("canvas:\n  height: 10.5\n")).toThrow(
      /canvas\.height/,
    );
    expect(() => parseSessionConfig("stroke_width: thick\n")).toThrow(
      /stroke_width/,
    );
  });

  it("rejects input that is neither JSON nor YAML", () => {
    expect(() => parseSessionConfig("canvas: [")).toThrow(
      /Failed to parse input as JSON or YAML/,
    );
  });
});
