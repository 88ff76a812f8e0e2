/**
 * Prompt catalog: one template per content shape.
 *
 * CATALOG FILE (prompts/catalog.json):
 *
 *   {
 *     "version": "1.0.0",
 *     "templates": [
 *       { "shape": "top_list", "file": "top-list.md",
 *         "systemPrompt": "…", "expectedOutput": "…" },
 *       …
 *     ]
 *   }
 *
 * Every shape has exactly one entry except `meme_humor`, which has none
 * and always resolves to the `unknown` template. Listing `meme_humor` in
 * the catalog is an error, as is leaving any other shape out.
 */

import { join } from "node:path";
import { z } from "zod";

import {
  deepFreeze,
  formatIssueList,
  formatZodIssues,
  readJsonFile,
  type ConfigValidationIssue,
} from "../config/validation.js";
import { CONTENT_SHAPES, ContentShapeSchema, type ContentShape } from "../shapes/schema.js";
import { PromptTemplateLoader } from "./loader.js";
import type { ParsedTemplate } from "./template.js";

export const CATALOG_FILE = "catalog.json";

/** Shapes that own a template. */
export type TemplatedShape = Exclude<ContentShape, "meme_humor">;

export const TEMPLATED_SHAPES: readonly TemplatedShape[] = CONTENT_SHAPES.filter(
  (shape): shape is TemplatedShape => shape !== "meme_humor"
);

/**
 * The shape whose template serves `shape`.
 */
export function resolveTemplateShape(shape: ContentShape): TemplatedShape {
  switch (shape) {
    case "meme_humor":
      return "unknown";
    default:
      return shape;
  }
}

export interface PromptTemplate {
  readonly shape: TemplatedShape;
  /** Template filename within the prompts directory */
  readonly file: string;
  readonly template: ParsedTemplate;
  readonly systemPrompt: string;
  /** What a good answer contains; informational. */
  readonly expectedOutput: string;
}

const CatalogEntrySchema = z
  .object({
    shape: ContentShapeSchema,
    file: z.string().min(1),
    systemPrompt: z.string().min(1),
    expectedOutput: z.string().min(1),
  })
  .strict();

export const PromptCatalogSchema = z
  .object({
    version: z.string().regex(/^\d+\.\d+\.\d+$/),
    templates: z.array(CatalogEntrySchema),
  })
  .strict()
  .superRefine((catalog, ctx) => {
    const seen = new Set<ContentShape>();
    catalog.templates.forEach((entry, i) => {
      if (entry.shape === "meme_humor") {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["templates", i, "shape"],
          message: `"meme_humor" has no template of its own; it uses "unknown"`,
        });
      }
      if (seen.has(entry.shape)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["templates", i, "shape"],
          message: `Duplicate template for shape "${entry.shape}"`,
        });
      }
      seen.add(entry.shape);
    });

    for (const shape of TEMPLATED_SHAPES) {
      if (!seen.has(shape)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["templates"],
          message: `Missing template for shape "${shape}"`,
        });
      }
    }
  });

export type PromptCatalogDefinition = z.infer<typeof PromptCatalogSchema>;

export class PromptCatalogError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "PromptCatalogError";
    this.issues = issues;
  }

  format(): string {
    return formatIssueList("Prompt catalog validation failed:", this.issues);
  }
}

/**
 * Immutable shape → template table.
 */
export class PromptCatalog {
  private readonly templates: ReadonlyMap<TemplatedShape, PromptTemplate>;

  private constructor(
    public readonly version: string,
    templates: readonly PromptTemplate[]
  ) {
    const byShape = new Map<TemplatedShape, PromptTemplate>();
    for (const entry of templates) {
      byShape.set(entry.shape, deepFreeze({ ...entry }));
    }
    const missing = TEMPLATED_SHAPES.filter((shape) => !byShape.has(shape));
    if (missing.length > 0) {
      throw new PromptCatalogError(
        `Prompt catalog is missing ${missing.length} template(s)`,
        missing.map((shape) => ({
          path: ["templates"],
          message: `Missing template for shape "${shape}"`,
          code: "custom",
        }))
      );
    }
    this.templates = byShape;
  }

  /**
   * @throws PromptCatalogError unless every templated shape is covered
   */
  static create(version: string, templates: readonly PromptTemplate[]): PromptCatalog {
    return new PromptCatalog(version, templates);
  }

  get size(): number {
    return this.templates.size;
  }

  /**
   * Template for a shape, after meme_humor → unknown resolution.
   */
  get(shape: ContentShape): PromptTemplate {
    const resolved = resolveTemplateShape(shape);
    const template = this.templates.get(resolved);
    if (template === undefined) {
      // create() rejects catalogs with gaps
      throw new PromptCatalogError(`No template for shape "${resolved}"`, []);
    }
    return template;
  }

  entries(): PromptTemplate[] {
    return TEMPLATED_SHAPES.map((shape) => this.get(shape));
  }
}

/**
 * Build a catalog from a validated definition, loading each template
 * through `loader`.
 *
 * @throws PromptCatalogError if the definition is invalid
 * @throws TemplateLoadError / TemplateParseError for bad template files
 */
export function loadPromptCatalog(input: unknown, loader: PromptTemplateLoader): PromptCatalog {
  const result = PromptCatalogSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new PromptCatalogError(`Invalid prompt catalog: ${issues.length} validation error(s)`, issues);
  }

  const templates: PromptTemplate[] = [];
  for (const entry of result.data.templates) {
    const shape = resolveTemplateShape(entry.shape);
    templates.push({
      shape,
      file: entry.file,
      template: loader.load(entry.file),
      systemPrompt: entry.systemPrompt,
      expectedOutput: entry.expectedOutput,
    });
  }

  return PromptCatalog.create(result.data.version, templates);
}

/**
 * Load `catalog.json` and its templates from a prompts directory.
 * File-system errors propagate unchanged.
 */
export function loadPromptCatalogDir(dir: string): PromptCatalog {
  const loader = new PromptTemplateLoader(dir);
  const catalogPath = join(loader.directory, CATALOG_FILE);
  const json = readJsonFile(catalogPath);
  if (!json.ok) {
    throw new PromptCatalogError(`Invalid prompt catalog: ${catalogPath}`, [json.issue]);
  }
  return loadPromptCatalog(json.value, loader);
}
