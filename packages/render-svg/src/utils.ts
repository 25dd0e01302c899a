export type AttrValue = string | number;

/** Self-closing SVG element, attributes in insertion order. */
export function element(tag: string, attrs: Record<string, AttrValue>): string {
  return `<${tag}${formatAttrs(attrs)}/>`;
}

/** Opening tag of an SVG container element. */
export function openTag(tag: string, attrs: Record<string, AttrValue>): string {
  return `<${tag}${formatAttrs(attrs)}>`;
}

/** Numbers are rounded to two decimals; strings are XML-escaped. */
function formatAttrs(attrs: Record<string, AttrValue>): string {
  return Object.entries(attrs)
    .map(([name, value]) => ` ${name}="${formatValue(value)}"`)
    .join("");
}

function formatValue(value: AttrValue): string {
  if (typeof value === "number") return Number(value.toFixed(2)).toString();
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
