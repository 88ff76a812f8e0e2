/**
 * Idempotent note rewriter.
 *
 * Rebuilds a note's header and body with freshly computed tags,
 * cross-references and curated-index pointer. Rewriting a rewritten note
 * with the same inputs yields byte-identical output:
 *
 *   rewriteNote(parseNote(rewriteNote(n, e)), e) === rewriteNote(n, e)
 *
 * OUTPUT LAYOUT:
 *
 *   ---
 *   title / author / source / type   (when present, in this order)
 *   up: "[[<index target>]]"         (when an index target exists)
 *   tags:                            (always; replaces any earlier list)
 *     - …
 *   <other scalar fields, original order>
 *   ---
 *   <body without earlier Topics sections or processor footers>
 *
 *   ## Topics                        (when there are links)
 *
 *   [[A]] · [[B]]
 *
 *
 *   ---
 *   *Processed by bookmark-enricher v0.2.0*
 *
 * The rewriter owns `tags` and `up`: earlier values of both are discarded.
 * List-valued fields other than `tags` are dropped.
 */

import { FIELD_MARKER, formatScalar, type Note } from "./frontmatter.js";

export const TOPICS_HEADING = "## Topics";
export const LINK_SEPARATOR = " · ";
export const DEFAULT_PROCESSOR_NAME = "bookmark-enricher";
export const DEFAULT_PROCESSOR_VERSION = "0.2.0";

/** Fields emitted first, in this order. */
export const LEADING_FIELDS = ["title", "author", "source", "type"] as const;

/** Fields whose earlier values are always replaced. */
const OWNED_FIELDS: ReadonlySet<string> = new Set(["tags", "up"]);

export interface NoteMetadata {
  tags: readonly string[];
  links: readonly string[];
  indexTarget: string | undefined;
}

export interface RewriteOptions {
  /** Name stamped into the footer; footers carrying it are replaced. */
  processorName?: string;
  processorVersion?: string;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * `[[A]] · [[B]]`
 */
export function renderLinks(links: readonly string[]): string {
  return links.map((link) => `[[${link}]]`).join(LINK_SEPARATOR);
}

export function renderFooter(name: string, version: string): string {
  return `${FIELD_MARKER}\n*Processed by ${name} v${version}*`;
}

/**
 * Header lines between (and excluding) the two markers.
 */
function buildHeaderLines(note: Note, metadata: NoteMetadata): string[] {
  const lines: string[] = [];
  const leading: ReadonlySet<string> = new Set(LEADING_FIELDS);

  for (const key of LEADING_FIELDS) {
    const value = note.fields.get(key);
    if (typeof value === "string") {
      lines.push(`${key}: ${formatScalar(value)}`);
    }
  }

  if (metadata.indexTarget !== undefined) {
    lines.push(`up: "[[${metadata.indexTarget}]]"`);
  }

  lines.push("tags:");
  for (const tag of metadata.tags) {
    lines.push(`  - ${tag}`);
  }

  for (const [key, value] of note.fields) {
    if (leading.has(key) || OWNED_FIELDS.has(key)) continue;
    if (typeof value !== "string") continue;
    lines.push(`${key}: ${formatScalar(value)}`);
  }

  return lines;
}

/**
 * Remove generated Topics sections and processor footers until none remain,
 * then drop trailing whitespace.
 *
 * A Topics section runs from its heading to the next `## ` heading, a `---`
 * separator line, or the end of the body. A footer is the separator plus
 * the single "Processed by <name> …" line at the very end. Either may open
 * the body.
 */
export function stripGeneratedSections(body: string, processorName: string): string {
  const topicsSection = new RegExp(
    `\\n${escapeRegExp(TOPICS_HEADING)}[ \\t]*(?:\\n|$)[\\s\\S]*?(?=\\n## |\\n---\\n|$)`,
    "g"
  );
  const footer = new RegExp(
    `\\n---\\n\\*Processed by ${escapeRegExp(processorName)}[^\\n]*\\*\\s*$`
  );

  // Both patterns anchor on a preceding line break; a body that opens with a
  // generated section gets one for the duration of the scan.
  const padded = !body.startsWith("\n");
  let current = padded ? `\n${body}` : body;
  for (;;) {
    const next = current.replace(topicsSection, "").replace(footer, "").trimEnd();
    if (next === current) break;
    current = next;
  }
  return padded && current.startsWith("\n") ? current.slice(1) : current;
}

/**
 * Rebuild a note with the given metadata.
 */
export function rewriteNote(note: Note, metadata: NoteMetadata, options: RewriteOptions = {}): string {
  const name = options.processorName ?? DEFAULT_PROCESSOR_NAME;
  const version = options.processorVersion ?? DEFAULT_PROCESSOR_VERSION;

  const header = [FIELD_MARKER, ...buildHeaderLines(note, metadata), FIELD_MARKER].join("\n");

  let body = stripGeneratedSections(note.body, name);
  if (body !== "" && !body.startsWith("\n")) {
    body = `\n${body}`;
  }

  let result = header + body;
  if (metadata.links.length > 0) {
    result += `\n\n${TOPICS_HEADING}\n\n${renderLinks(metadata.links)}\n`;
  }
  result += `\n\n${renderFooter(name, version)}\n`;

  return result;
}
