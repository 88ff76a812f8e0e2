/**
 * Multi-label topic matcher.
 *
 * Scans the registry in registration order and keeps every topic with at
 * least one matching pattern. Within a topic, patterns are tried in order
 * and the first hit ends the scan for that topic.
 *
 * Overlapping topics are all retained: a note about "Claude Code" can match
 * both the specific "claude-code" topic and the broader "ai-coding" one.
 */

import type { TopicRegistry } from "./registry.js";
import type { Topic } from "./schema.js";

/**
 * Matched topics, unique by id, in registration order.
 */
export type MatchResult = ReadonlyArray<Topic>;

/**
 * Index of the first pattern of `topic` that matches `normalized`, or -1.
 */
export function firstMatchingPattern(topic: Topic, normalized: string): number {
  return topic.patterns.findIndex((pattern) => pattern.test(normalized));
}

/**
 * Match a note's title and body against the registry.
 *
 * @example
 *   matchTopics(registry, "Claude Code tips", "Using cursor rules").map((t) => t.id);
 *   // ["claude-code", "ai-coding", ...]
 */
export function matchTopics(registry: TopicRegistry, title: string, body: string): MatchResult {
  const normalized = `${title}\n${body}`.toLowerCase();
  const matched: Topic[] = [];
  const seen = new Set<string>();

  for (const topic of registry.topics) {
    if (seen.has(topic.id)) continue;
    if (firstMatchingPattern(topic, normalized) !== -1) {
      matched.push(topic);
      seen.add(topic.id);
    }
  }

  return Object.freeze(matched);
}
