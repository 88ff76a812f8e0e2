/**
 * Note parsing: structured-field header + Markdown body.
 *
 * NOTE FORMAT:
 *
 *   ---
 *   title: "Claude Code: tips"
 *   author: someone
 *   tags:
 *     - source/twitter
 *   ---
 *   Body text…
 *
 * Rules:
 *   - The header exists only when the FIRST line is exactly `---` and a
 *     later line is exactly `---`. Anything else is treated as "no fields,
 *     the whole content is body". Parsing never fails.
 *   - `key: value` sets a scalar. Matching surrounding quotes are removed;
 *     double-quoted values have `\"` and `\\` decoded, single-quoted values
 *     have `''` decoded. Empty scalars are ignored.
 *   - `key:` starts a list; following `  - item` lines append to it.
 *   - Other lines are ignored.
 *   - The body is everything after the closing marker, including the line
 *     break that follows it.
 */

export const FIELD_MARKER = "---";

export type FieldValue = string | readonly string[];

/**
 * A parsed note. Field order is the order keys first appeared.
 */
export interface Note {
  readonly fields: ReadonlyMap<string, FieldValue>;
  readonly body: string;
  readonly raw: string;
}

/** Characters that force a scalar to be double-quoted on output. */
const QUOTE_TRIGGERS = /[:#"'[\]{}]/;

/**
 * Render a scalar so that parsing it back yields the same string.
 */
export function formatScalar(value: string): string {
  if (QUOTE_TRIGGERS.test(value) || value !== value.trim()) {
    return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
  }
  return value;
}

/**
 * Inverse of formatScalar for a trimmed raw value.
 */
export function parseScalar(raw: string): string {
  if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) {
    return raw.slice(1, -1).replace(/\\(["\\])/g, "$1");
  }
  if (raw.length >= 2 && raw.startsWith("'") && raw.endsWith("'")) {
    return raw.slice(1, -1).replace(/''/g, "'");
  }
  return raw;
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Locate the header block. Returns the header text and the offset where the
 * body begins, or undefined when the content has no valid header.
 */
function findHeader(content: string): { header: string; bodyStart: number } | undefined {
  const firstBreak = content.indexOf("\n");
  const firstLine = firstBreak === -1 ? content : content.slice(0, firstBreak);
  if (stripCarriageReturn(firstLine) !== FIELD_MARKER || firstBreak === -1) {
    return undefined;
  }

  let lineStart = firstBreak + 1;
  while (lineStart <= content.length) {
    const lineEnd = content.indexOf("\n", lineStart);
    const end = lineEnd === -1 ? content.length : lineEnd;
    const line = content.slice(lineStart, end);
    if (stripCarriageReturn(line) === FIELD_MARKER) {
      return {
        header: content.slice(firstBreak + 1, lineStart),
        bodyStart: lineStart + FIELD_MARKER.length,
      };
    }
    if (lineEnd === -1) break;
    lineStart = lineEnd + 1;
  }

  return undefined;
}

/**
 * Parse header lines into an ordered field map.
 */
export function parseFields(header: string): Map<string, FieldValue> {
  const fields = new Map<string, FieldValue>();
  let listKey: string | undefined;
  let listItems: string[] = [];

  const flush = (): void => {
    if (listKey !== undefined) {
      fields.set(listKey, listItems);
      listKey = undefined;
      listItems = [];
    }
  };

  for (const rawLine of header.trim().split("\n")) {
    const line = stripCarriageReturn(rawLine);

    if (line.startsWith("  - ")) {
      if (listKey !== undefined) {
        listItems.push(line.trim().slice(2).trim());
      }
      continue;
    }

    flush();

    const separator = line.indexOf(": ");
    if (separator !== -1) {
      const key = line.slice(0, separator).trim();
      const value = parseScalar(line.slice(separator + 2).trim());
      if (value) {
        fields.set(key, value);
      }
    } else if (line.trim().endsWith(":")) {
      listKey = line.trim().slice(0, -1);
      listItems = [];
    }
  }

  flush();
  return fields;
}

/**
 * Parse note content. Never throws.
 */
export function parseNote(content: string): Note {
  const found = findHeader(content);
  if (found === undefined) {
    return { fields: new Map(), body: content, raw: content };
  }

  return {
    fields: parseFields(found.header),
    body: content.slice(found.bodyStart),
    raw: content,
  };
}

/**
 * A scalar field, or undefined when absent or list-valued.
 */
export function getScalar(note: Note, key: string): string | undefined {
  const value = note.fields.get(key);
  return typeof value === "string" ? value : undefined;
}
