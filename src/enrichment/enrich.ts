/**
 * One-call note enrichment: match, then build tags, links and index pointer.
 */

import type { TaxonomyConfig } from "../config/taxonomy/schema.js";
import type { TopicRegistry } from "../topics/registry.js";
import { matchTopics, type MatchResult } from "../topics/matcher.js";
import { buildLinks, buildTags, resolveIndexTarget } from "./builders.js";

export interface EnrichmentInput {
  title: string;
  body: string;
  /** Note type ("tweet", "thread", "video", "link"); unknown types get the default tag. */
  contentType: string;
  author: string;
}

export interface Enrichment {
  matched: MatchResult;
  tags: string[];
  links: string[];
  indexTarget: string | undefined;
}

/**
 * Read-only tables the enrichment step needs.
 */
export interface EnrichmentContext {
  registry: TopicRegistry;
  taxonomy: TaxonomyConfig;
}

export function enrich(input: EnrichmentInput, context: EnrichmentContext): Enrichment {
  const matched = matchTopics(context.registry, input.title, input.body);
  return {
    matched,
    tags: buildTags(matched, input.contentType, input.author, context.taxonomy),
    links: buildLinks(matched, input.author, context.taxonomy),
    indexTarget: resolveIndexTarget(matched),
  };
}
