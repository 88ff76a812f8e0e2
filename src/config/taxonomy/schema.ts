/**
 * Taxonomy configuration schema.
 *
 * The taxonomy holds everything the tag and link builders need besides the
 * topic registry itself: the fixed source tag, the content-type tag table
 * and the known-person alias table.
 *
 * Tags are opaque hierarchical identifiers ("source/twitter",
 * "person/jane"). They are never derived from display names.
 */

import { z } from "zod";

/** Hierarchical tag: slash-separated lowercase segments. */
export const TagSchema = z
  .string()
  .min(1)
  .regex(
    /^[a-z0-9][a-z0-9_-]*(\/[a-z0-9][a-z0-9_-]*)*$/,
    "Tag must be lowercase slash-separated segments (e.g. \"topic/react\")"
  );

/**
 * Normalized author handle: lowercase, no leading "@", no whitespace.
 */
export const HandleSchema = z
  .string()
  .min(1)
  .regex(/^[a-z0-9_]+$/, "Handle must be lowercase letters, digits or underscores without '@'");

export const TaxonomyConfigSchema = z
  .object({
    /** Schema version for migration support. */
    version: z.string().regex(/^\d+\.\d+\.\d+$/),

    /** Tag every enriched note receives first. */
    sourceTag: TagSchema,

    /** Note `type` field value -> tag. */
    contentTypeTags: z.record(z.string().min(1), TagSchema),

    /** Tag used when the note type is missing from contentTypeTags. */
    defaultContentTypeTag: TagSchema,

    /**
     * Known people: normalized handle -> display name.
     * Used only for cross-reference links, never for tags.
     */
    people: z.record(HandleSchema, z.string().min(1)).default({}),
  })
  .strict();

export type TaxonomyConfig = z.infer<typeof TaxonomyConfigSchema>;
