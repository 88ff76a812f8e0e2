/**
 * Topic loader and validator.
 *
 * Responsible for:
 * - Loading topic registries from JSON
 * - Validating topic schema (including that every pattern compiles)
 * - Rejecting duplicate topic IDs
 * - Flagging overlaps that are legal but usually unintended
 * - Compiling patterns and building the TopicRegistry
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ERRORS VS WARNINGS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Errors block loading: schema violations, uncompilable patterns and
 * duplicate IDs.
 *
 * Warnings do not: two topics sharing a tag or wikilink name, or a topic
 * tag shadowing a taxonomy tag. The builders de-duplicate these, so the
 * later topic simply contributes nothing.
 */

import type { TaxonomyConfig } from "../config/taxonomy/schema.js";
import { readJsonFile } from "../config/validation.js";
import { TopicCollectionSchema, compileTopic, type TopicDefinition } from "./schema.js";
import { TopicRegistry } from "./registry.js";

/**
 * Validation error for topic loading.
 */
export class TopicValidationError extends Error {
  public readonly issues: TopicIssue[];

  constructor(message: string, issues: TopicIssue[]) {
    super(message);
    this.name = "TopicValidationError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Topic validation failed:"];
    for (const issue of this.issues) {
      const location = issue.topicId ? `[${issue.topicId}]` : "[collection]";
      lines.push(`  - ${location} ${issue.field}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual topic validation issue.
 */
export interface TopicIssue {
  /** Topic ID if applicable */
  topicId?: string;
  /** Field that has the issue */
  field: string;
  /** Human-readable error message */
  message: string;
  /** Error type for programmatic handling */
  type: "schema" | "duplicate" | "overlap" | "json";
  severity: "error" | "warning";
}

/**
 * Options for topic loading.
 */
export interface LoadTopicsOptions {
  /**
   * Taxonomy whose reserved tags (source and content-type tags) topic
   * tags are checked against.
   */
  taxonomy?: TaxonomyConfig;

  /**
   * Whether to include overlap warnings in the result.
   * Default: true
   */
  includeWarnings?: boolean;
}

/**
 * Result of topic validation.
 */
export interface TopicValidationResult {
  success: boolean;
  registry?: TopicRegistry;
  errors?: TopicIssue[];
  warnings?: TopicIssue[];
  /** Summary statistics */
  stats?: {
    total: number;
    patterns: number;
    withIndexTarget: number;
    schemaErrors: number;
    duplicateErrors: number;
    overlapWarnings: number;
  };
}

/**
 * Check for duplicate topic IDs.
 */
function findDuplicateIds(topics: readonly TopicDefinition[]): TopicIssue[] {
  const seen = new Map<string, number>();
  const issues: TopicIssue[] = [];

  topics.forEach((topic, i) => {
    const firstIndex = seen.get(topic.id);

    if (firstIndex !== undefined) {
      issues.push({
        topicId: topic.id,
        field: "id",
        message: `Duplicate topic ID "${topic.id}" (first seen at index ${firstIndex}, duplicate at index ${i})`,
        type: "duplicate",
        severity: "error",
      });
    } else {
      seen.set(topic.id, i);
    }
  });

  return issues;
}

/**
 * Find tags and wikilink names claimed by more than one topic, and topic
 * tags that collide with the taxonomy's own tags.
 */
function findOverlaps(
  topics: readonly TopicDefinition[],
  taxonomy: TaxonomyConfig | undefined
): TopicIssue[] {
  const issues: TopicIssue[] = [];
  const tagOwners = new Map<string, string>();
  const linkOwners = new Map<string, string>();
  const reserved = new Set<string>(
    taxonomy
      ? [taxonomy.sourceTag, taxonomy.defaultContentTypeTag, ...Object.values(taxonomy.contentTypeTags)]
      : []
  );

  for (const topic of topics) {
    const tagOwner = tagOwners.get(topic.tag);
    if (tagOwner !== undefined) {
      issues.push({
        topicId: topic.id,
        field: "tag",
        message: `Tag "${topic.tag}" is already contributed by "${tagOwner}"`,
        type: "overlap",
        severity: "warning",
      });
    } else {
      tagOwners.set(topic.tag, topic.id);
    }

    if (reserved.has(topic.tag)) {
      issues.push({
        topicId: topic.id,
        field: "tag",
        message: `Tag "${topic.tag}" is reserved by the taxonomy`,
        type: "overlap",
        severity: "warning",
      });
    }

    const linkOwner = linkOwners.get(topic.wikilink);
    if (linkOwner !== undefined) {
      issues.push({
        topicId: topic.id,
        field: "wikilink",
        message: `Wikilink "${topic.wikilink}" is already contributed by "${linkOwner}"`,
        type: "overlap",
        severity: "warning",
      });
    } else {
      linkOwners.set(topic.wikilink, topic.id);
    }
  }

  return issues;
}

/**
 * Load and validate topics from a raw input object.
 *
 * @param input - Raw topic collection data
 * @param options - Loading options
 * @returns A TopicRegistry in registration order, or validation errors
 */
export function loadTopics(
  input: unknown,
  options: LoadTopicsOptions = {}
): TopicValidationResult {
  const { taxonomy, includeWarnings = true } = options;

  const collectionResult = TopicCollectionSchema.safeParse(input);
  if (!collectionResult.success) {
    const topicIds = topicIdsOf(input);
    const issues: TopicIssue[] = collectionResult.error.issues.map((issue) => {
      const [root, index] = issue.path;
      const topicId =
        root === "topics" && typeof index === "number" ? topicIds[index] : undefined;
      return {
        ...(topicId !== undefined ? { topicId } : {}),
        field: issue.path.join(".") || "(root)",
        message: issue.message,
        type: "schema" as const,
        severity: "error" as const,
      };
    });
    return {
      success: false,
      errors: issues,
      stats: {
        total: topicIds.length,
        patterns: 0,
        withIndexTarget: 0,
        schemaErrors: issues.length,
        duplicateErrors: 0,
        overlapWarnings: 0,
      },
    };
  }

  const definitions = collectionResult.data.topics;
  const duplicates = findDuplicateIds(definitions);
  const overlaps = findOverlaps(definitions, taxonomy);
  const warnings = includeWarnings && overlaps.length > 0 ? overlaps : undefined;

  const stats = {
    total: definitions.length,
    patterns: definitions.reduce((sum, t) => sum + t.patterns.length, 0),
    withIndexTarget: definitions.filter((t) => t.indexTarget !== undefined).length,
    schemaErrors: 0,
    duplicateErrors: duplicates.length,
    overlapWarnings: overlaps.length,
  };

  if (duplicates.length > 0) {
    return { success: false, errors: duplicates, warnings, stats };
  }

  return {
    success: true,
    registry: TopicRegistry.create(definitions.map(compileTopic)),
    warnings,
    stats,
  };
}

/**
 * Best-effort topic IDs from unvalidated input, for error locations.
 */
function topicIdsOf(input: unknown): (string | undefined)[] {
  if (typeof input !== "object" || input === null || !("topics" in input)) return [];
  const { topics } = input;
  if (!Array.isArray(topics)) return [];
  return topics.map((t: unknown) =>
    typeof t === "object" && t !== null && "id" in t && typeof t.id === "string" ? t.id : undefined
  );
}

/**
 * Load and validate topics, throwing on error.
 *
 * @throws TopicValidationError if validation fails
 */
export function loadTopicsOrThrow(
  input: unknown,
  options: LoadTopicsOptions = {}
): TopicRegistry {
  const result = loadTopics(input, options);

  if (!result.success || result.registry === undefined) {
    const errors = result.errors ?? [];
    throw new TopicValidationError(`Topic validation failed: ${errors.length} error(s)`, errors);
  }

  return result.registry;
}

/**
 * Read a topic registry JSON file and validate it.
 * File-system errors propagate unchanged.
 */
export function loadTopicsFile(filePath: string, options: LoadTopicsOptions = {}): TopicValidationResult {
  const json = readJsonFile(filePath);
  if (!json.ok) {
    return {
      success: false,
      errors: [{ field: "(root)", message: json.issue.message, type: "json", severity: "error" }],
    };
  }
  return loadTopics(json.value, options);
}

/**
 * Read a topic registry JSON file, throwing on any validation error.
 */
export function loadTopicsFileOrThrow(filePath: string, options: LoadTopicsOptions = {}): TopicRegistry {
  const result = loadTopicsFile(filePath, options);
  if (!result.success || result.registry === undefined) {
    const errors = result.errors ?? [];
    throw new TopicValidationError(
      `Topic validation failed for ${filePath}: ${errors.length} error(s)`,
      errors
    );
  }
  return result.registry;
}
