/** Hex value every unrecognized color name resolves to. */
export const DEFAULT_COLOR = "#000000";

export const COLOR_TABLE: Readonly<Record<string, string>> = Object.freeze({
  red: "#FF0000",
  green: "#00FF00",
  blue: "#0000FF",
  yellow: "#FFFF00",
  orange: "#FFA500",
  purple: "#800080",
  pink: "#FFC0CB",
  black: "#000000",
  white: "#FFFFFF",
  gray: "#808080",
  grey: "#808080",
  brown: "#A52A2A",
  cyan: "#00FFFF",
  magenta: "#FF00FF",
});

export function isColorName(name: string): boolean {
  return Object.hasOwn(COLOR_TABLE, name.toLowerCase());
}

/** Case-insensitive lookup; unknown names resolve to black. */
export function resolveColor(name: string): string {
  const key = name.toLowerCase();
  return Object.hasOwn(COLOR_TABLE, key) ? COLOR_TABLE[key] : DEFAULT_COLOR;
}
