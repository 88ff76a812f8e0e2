/**
 * Content-shape schema and rule-table definitions.
 *
 * A content shape is the fine-grained nature of a bookmark (a list, a
 * tutorial, a code snippet…). It selects the prompt template used for
 * summarization and is distinct from the coarse note `type`.
 */

import { z } from "zod";
import { isCompilablePattern } from "../config/validation.js";

export const CONTENT_SHAPES = [
  "article_link",
  "top_list",
  "tutorial_guide",
  "tool_announcement",
  "code_snippet",
  "opinion_take",
  "news_update",
  "thread_content",
  "video_content",
  "screenshot_info",
  "meme_humor",
  "unknown",
] as const;

export const ContentShapeSchema = z.enum(CONTENT_SHAPES);

export type ContentShape = z.infer<typeof ContentShapeSchema>;

/**
 * One text rule: the shape wins when any of its patterns matches.
 */
export const ShapeRuleSchema = z
  .object({
    shape: ContentShapeSchema,
    patterns: z
      .array(
        z.string().min(1).refine(isCompilablePattern, {
          message: "Pattern must be a valid regular expression",
        })
      )
      .min(1, "Rule needs at least one pattern"),
  })
  .strict();

export const ShapeRulesSchema = z
  .object({
    version: z.string().regex(/^\d+\.\d+\.\d+$/),

    /** Image posts with fewer characters than this are screenshots. */
    screenshotMaxLength: z.number().int().positive().default(100),

    /** Text rules in priority order. */
    rules: z.array(ShapeRuleSchema).superRefine((rules, ctx) => {
      const seen = new Set<ContentShape>();
      rules.forEach((rule, i) => {
        if (seen.has(rule.shape)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [i, "shape"],
            message: `Duplicate rule for shape "${rule.shape}"`,
          });
        }
        seen.add(rule.shape);
      });
    }),
  })
  .strict();

export type ShapeRulesDefinition = z.infer<typeof ShapeRulesSchema>;

export interface CompiledShapeRule {
  readonly shape: ContentShape;
  readonly patterns: readonly RegExp[];
}

/**
 * Rule table ready for classification.
 */
export interface ShapeRules {
  readonly version: string;
  readonly screenshotMaxLength: number;
  readonly rules: readonly CompiledShapeRule[];
}
