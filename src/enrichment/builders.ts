/**
 * Tag, cross-reference and curated-index builders.
 *
 * All three are pure functions of the match result, the author handle and
 * the taxonomy. Their output order is significant: tags and links are
 * written to the note in the order returned.
 */

import type { TaxonomyConfig } from "../config/taxonomy/schema.js";
import type { MatchResult } from "../topics/matcher.js";

/**
 * Normalize an author handle: lowercase, leading "@" removed, trimmed.
 *
 * @example
 *   normalizeHandle("@SimonW ") // "simonw"
 */
export function normalizeHandle(author: string): string {
  return author.toLowerCase().replace(/^@+/, "").trim();
}

/**
 * Append `value` unless it is already present.
 */
function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) {
    list.push(value);
  }
}

/**
 * Build the hierarchical tag list for a note.
 *
 * Order: source tag, content-type tag (default when the type is unknown),
 * `person/<handle>` when the handle is non-empty, then one tag per matched
 * topic. Never contains duplicates.
 */
export function buildTags(
  matched: MatchResult,
  contentType: string,
  author: string,
  taxonomy: TaxonomyConfig
): string[] {
  const tags: string[] = [];
  pushUnique(tags, taxonomy.sourceTag);

  const typeTag = Object.hasOwn(taxonomy.contentTypeTags, contentType)
    ? taxonomy.contentTypeTags[contentType]
    : undefined;
  pushUnique(tags, typeTag ?? taxonomy.defaultContentTypeTag);

  const handle = normalizeHandle(author);
  if (handle) {
    pushUnique(tags, `person/${handle}`);
  }

  for (const topic of matched) {
    pushUnique(tags, topic.tag);
  }

  return tags;
}

/**
 * Build the cross-reference display names for a note's Topics section.
 * A known person comes first, then topic names in match order.
 */
export function buildLinks(matched: MatchResult, author: string, taxonomy: TaxonomyConfig): string[] {
  const links: string[] = [];

  const handle = normalizeHandle(author);
  const person = Object.hasOwn(taxonomy.people, handle) ? taxonomy.people[handle] : undefined;
  if (person !== undefined) {
    links.push(person);
  }

  for (const topic of matched) {
    pushUnique(links, topic.wikilink);
  }

  return links;
}

/**
 * Curated index for the note's `up:` field.
 *
 * Returns the target of the first matched topic that declares one. This is
 * first-in-registration-order, not most-specific: a broad topic registered
 * before a narrow one wins.
 */
export function resolveIndexTarget(matched: MatchResult): string | undefined {
  return matched.find((topic) => topic.indexTarget !== undefined)?.indexTarget;
}
