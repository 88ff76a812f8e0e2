/**
 * Topic registry with registration-order indexing.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ORDER-PRESERVING, IMMUTABLE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The TopicRegistry is the central access point for topic definitions
 * during classification. Unlike an id-sorted catalogue, it keeps topics in
 * the order they were registered, because that order decides:
 *
 *   - the order of match results (and therefore of tags and links)
 *   - which curated index a note points to (first matched topic with one)
 *
 * Once created the registry cannot be modified. It is built once at
 * startup and passed by reference to the matcher and builders.
 */

import type { Topic } from "./schema.js";

/**
 * Statistics about the registry contents.
 */
export interface RegistryStats {
  totalTopics: number;
  totalPatterns: number;
  /** Topics per index target, in first-registration order of the target. */
  byIndexTarget: ReadonlyArray<readonly [target: string, count: number]>;
  withoutIndexTarget: number;
}

/**
 * Immutable topic registry.
 *
 * @example
 *   const registry = TopicRegistry.create(topics);
 *   const matched = matchTopics(registry, title, body);
 *   registry.getStats().totalPatterns;
 */
export class TopicRegistry {
  /**
   * All topics, in registration order.
   */
  private readonly _topics: ReadonlyArray<Topic>;

  private constructor(topics: readonly Topic[]) {
    this._topics = Object.freeze(
      topics.map((t) => Object.freeze({ ...t, patterns: Object.freeze([...t.patterns]) }))
    );

    const seen = new Set<string>();
    this._topics.forEach((topic, position) => {
      if (seen.has(topic.id)) {
        throw new Error(`Duplicate topic ID "${topic.id}" at position ${position}`);
      }
      seen.add(topic.id);
    });
  }

  /**
   * Create a new TopicRegistry from compiled topics.
   *
   * @throws Error if two topics share an ID (the loader reports this as
   *         a validation issue before it gets here)
   */
  static create(topics: readonly Topic[]): TopicRegistry {
    return new TopicRegistry(topics);
  }

  /**
   * All topics in registration order.
   */
  get topics(): ReadonlyArray<Topic> {
    return this._topics;
  }

  get size(): number {
    return this._topics.length;
  }

  /**
   * Get statistics about the registry.
   */
  getStats(): RegistryStats {
    const byIndexTarget = new Map<string, number>();
    let withoutIndexTarget = 0;
    let totalPatterns = 0;

    for (const topic of this._topics) {
      totalPatterns += topic.patterns.length;
      if (topic.indexTarget === undefined) {
        withoutIndexTarget++;
      } else {
        byIndexTarget.set(topic.indexTarget, (byIndexTarget.get(topic.indexTarget) ?? 0) + 1);
      }
    }

    return {
      totalTopics: this._topics.length,
      totalPatterns,
      byIndexTarget: [...byIndexTarget.entries()],
      withoutIndexTarget,
    };
  }
}
