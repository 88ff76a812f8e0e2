/**
 * Topic registry and matcher.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * ```typescript
 * import { loadTopicsFileOrThrow, matchTopics } from "./topics/index.js";
 *
 * const registry = loadTopicsFileOrThrow("config/topics.json");
 * const matched = matchTopics(registry, note.title, note.body);
 * ```
 *
 * Registration order is the priority order: match results, tag order, link
 * order and the curated-index pointer all follow it.
 */

// Schema
export {
  TopicDefinitionSchema,
  TopicCollectionSchema,
  TopicPatternSchema,
  compileTopic,
  type Topic,
  type TopicDefinition,
  type TopicCollection,
} from "./schema.js";

// Registry
export { TopicRegistry, type RegistryStats } from "./registry.js";

// Loading
export {
  loadTopics,
  loadTopicsOrThrow,
  loadTopicsFile,
  loadTopicsFileOrThrow,
  TopicValidationError,
  type TopicIssue,
  type LoadTopicsOptions,
  type TopicValidationResult,
} from "./loader.js";

// Matching
export { matchTopics, firstMatchingPattern, type MatchResult } from "./matcher.js";
