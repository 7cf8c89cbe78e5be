export type TemplateSegment =
  | { kind: "text"; value: string }
  | { kind: "variable"; name: string };

// Only a well-formed `{name}` is a placeholder; every other brace is literal text
const PLACEHOLDER_PATTERN = /\{([A-Za-z_][\w.-]*)\}/g;

export function parseTemplate(template: string): TemplateSegment[] {
  const segments: TemplateSegment[] = [];
  let cursor = 0;

  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const offset = match.index ?? 0;
    if (offset > cursor) segments.push({ kind: "text", value: template.slice(cursor, offset) });
    segments.push({ kind: "variable", name: match[1] });
    cursor = offset + match[0].length;
  }

  if (cursor < template.length) segments.push({ kind: "text", value: template.slice(cursor) });
  return segments;
}

/** Distinct placeholder names in first-occurrence order. */
export function variableNames(segments: readonly TemplateSegment[]): string[] {
  const names = new Set<string>();
  for (const segment of segments) {
    if (segment.kind === "variable") names.add(segment.name);
  }
  return [...names];
}

export function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (Array.isArray(value) || isPlainObject(value)) return JSON.stringify(value);
  return String(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
