/**
 * Graph metadata for notes: hierarchical tags, [[cross-references]] and
 * the curated-index pointer.
 */

export {
  normalizeHandle,
  buildTags,
  buildLinks,
  resolveIndexTarget,
} from "./builders.js";

export {
  enrich,
  type Enrichment,
  type EnrichmentInput,
  type EnrichmentContext,
} from "./enrich.js";
