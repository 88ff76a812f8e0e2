/**
 * Note documents: parsing, idempotent rewriting and one-call enrichment.
 */

export {
  FIELD_MARKER,
  formatScalar,
  parseScalar,
  parseFields,
  parseNote,
  getScalar,
  type FieldValue,
  type Note,
} from "./frontmatter.js";

export {
  TOPICS_HEADING,
  LINK_SEPARATOR,
  DEFAULT_PROCESSOR_NAME,
  DEFAULT_PROCESSOR_VERSION,
  LEADING_FIELDS,
  renderLinks,
  renderFooter,
  stripGeneratedSections,
  rewriteNote,
  type NoteMetadata,
  type RewriteOptions,
} from "./rewriter.js";

export {
  DEFAULT_CONTENT_TYPE,
  enrichNote,
  type EnrichNoteOptions,
  type EnrichedNote,
} from "./enrich-note.js";
