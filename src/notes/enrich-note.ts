/**
 * Parse, enrich and rewrite a single note.
 */

import { enrich, type Enrichment, type EnrichmentContext } from "../enrichment/enrich.js";
import { getScalar, parseNote, type Note } from "./frontmatter.js";
import {
  DEFAULT_PROCESSOR_NAME,
  rewriteNote,
  stripGeneratedSections,
  type RewriteOptions,
} from "./rewriter.js";

export const DEFAULT_CONTENT_TYPE = "tweet";

export interface EnrichNoteOptions extends RewriteOptions {
  /** Title used when the note has no `title` field (usually the file stem). */
  fallbackTitle?: string;
}

export interface EnrichedNote {
  note: Note;
  enrichment: Enrichment;
  /** Rewritten content. */
  content: string;
  /** Whether the rewritten content differs from the input. */
  changed: boolean;
}

export function enrichNote(
  raw: string,
  context: EnrichmentContext,
  options: EnrichNoteOptions = {}
): EnrichedNote {
  const { fallbackTitle = "", ...rewriteOptions } = options;
  const note = parseNote(raw);

  // Generated sections are not matched, so a rerun sees the same text.
  const body = stripGeneratedSections(note.body, rewriteOptions.processorName ?? DEFAULT_PROCESSOR_NAME);

  const enrichment = enrich(
    {
      title: getScalar(note, "title") ?? fallbackTitle,
      body,
      contentType: getScalar(note, "type") ?? DEFAULT_CONTENT_TYPE,
      author: getScalar(note, "author") ?? "",
    },
    context
  );

  const content = rewriteNote(note, enrichment, rewriteOptions);
  return { note, enrichment, content, changed: content !== raw };
}
