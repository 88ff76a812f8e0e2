/**
 * Topic schema and type definitions.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * TOPIC DEFINITIONS: ORDER IS PRIORITY
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A topic is a taxonomy entry detected by an ordered list of regular
 * expressions tested against a note's lowercased title and body.
 *
 * Each topic contributes:
 *   1. A hierarchical tag  "topic/claude-code"
 *   2. A cross-reference name  "Claude Code"  (rendered as [[Claude Code]])
 *   3. An optional curated index  "+Atlas/AI-Coding" (rendered as up: "[[…]]")
 *
 * Topics are registered in a fixed order. That order is the ONLY priority
 * signal in the system: match results follow it, and the index pointer is
 * taken from the first matched topic that declares one.
 *
 * VALID EXAMPLE:
 *   {
 *     "id": "react",
 *     "patterns": ["\\breact\\b", "\\bnext\\.?js\\b"],
 *     "tag": "topic/react",
 *     "wikilink": "React",
 *     "indexTarget": "+Atlas/Software-Engineering"
 *   }
 *
 * WORD BOUNDARIES:
 *   `\b` only knows ASCII word characters, so an accented letter counts as a
 *   boundary: `\bclaude\b` matches inside "éclaude". Patterns that must not
 *   fire next to accented letters spell the boundary out with a lookbehind,
 *   e.g. `(?<![a-zà-ÿ])árbitro\b`.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { z } from "zod";
import { TagSchema } from "../config/taxonomy/schema.js";
import { isCompilablePattern } from "../config/validation.js";

/**
 * Detection pattern source. Compiled case-insensitively.
 */
export const TopicPatternSchema = z
  .string()
  .min(1, "Pattern must not be empty")
  .refine(isCompilablePattern, {
    message: "Pattern must be a valid regular expression",
  });

/**
 * A topic as written in the registry file.
 */
export const TopicDefinitionSchema = z
  .object({
    /**
     * Unique identifier, stable across runs.
     * Convention: lowercase kebab-case ("coding-agents").
     */
    id: z
      .string()
      .min(1)
      .regex(
        /^[a-z][a-z0-9-]*$/,
        "Topic ID must be lowercase alphanumeric with hyphens, starting with a letter"
      ),

    /** Ordered detection patterns; the first hit wins. */
    patterns: z.array(TopicPatternSchema).min(1, "Topic needs at least one pattern"),

    /** Tag added to matching notes. */
    tag: TagSchema,

    /** Display name used for the [[cross-reference]]. */
    wikilink: z
      .string()
      .min(1)
      .refine((val) => !/[[\]|\n]/.test(val), "Wikilink name must not contain brackets, pipes or newlines"),

    /** Curated index document this topic rolls up into. */
    indexTarget: z
      .string()
      .min(1)
      .refine((val) => !/[[\]\n"]/.test(val), "Index target must not contain brackets, quotes or newlines")
      .optional(),
  })
  .strict();

export type TopicDefinition = z.infer<typeof TopicDefinitionSchema>;

/**
 * Schema for a topic registry file.
 */
export const TopicCollectionSchema = z.object({
  /**
   * Schema version for migration support.
   */
  version: z.string().regex(/^\d+\.\d+\.\d+$/),

  /** Topics in priority order. */
  topics: z.array(TopicDefinitionSchema),
});

export type TopicCollection = z.infer<typeof TopicCollectionSchema>;

/**
 * A registered topic with its patterns compiled.
 */
export interface Topic {
  readonly id: string;
  readonly patterns: readonly RegExp[];
  readonly tag: string;
  readonly wikilink: string;
  readonly indexTarget?: string;
}

/**
 * Compile a validated definition. Patterns use the "i" flag only, never
 * "g", so RegExp.test carries no state between calls.
 */
export function compileTopic(definition: TopicDefinition): Topic {
  const topic: Topic = {
    id: definition.id,
    patterns: definition.patterns.map((source) => new RegExp(source, "i")),
    tag: definition.tag,
    wikilink: definition.wikilink,
  };
  return definition.indexTarget !== undefined
    ? { ...topic, indexTarget: definition.indexTarget }
    : topic;
}
