/**
 * Prompt engine: classify a bookmark, pick the template for its shape and
 * fill it.
 *
 *   const engine = PromptEngine.fromFiles(config.shapeRulesPath, config.promptsDir);
 *   const { shape, prompt, systemPrompt } = engine.buildPrompt({
 *     text: "Top 10 AI tools for 2025",
 *     author: "someone",
 *     hasLink: true,
 *   });
 *
 * buildPrompt never throws: the rule table and catalog are validated when
 * the engine is constructed.
 */

import { classifyShape, describeShape } from "../shapes/classifier.js";
import { loadShapeRulesFile } from "../shapes/loader.js";
import type { ContentShape, ShapeRules } from "../shapes/schema.js";
import { loadPromptCatalogDir, type PromptCatalog, type TemplatedShape } from "./catalog.js";
import { buildPromptContext, type PromptInput } from "./context.js";
import { renderPrompt } from "./renderer.js";

export interface BuiltPrompt {
  /** Detected shape. */
  shape: ContentShape;
  /** Shape whose template was used (differs only for meme_humor). */
  templateShape: TemplatedShape;
  prompt: string;
  systemPrompt: string;
  expectedOutput: string;
}

export class PromptEngine {
  constructor(
    private readonly rules: ShapeRules,
    private readonly catalog: PromptCatalog
  ) {}

  static fromFiles(shapeRulesPath: string, promptsDir: string): PromptEngine {
    return new PromptEngine(loadShapeRulesFile(shapeRulesPath), loadPromptCatalogDir(promptsDir));
  }

  classify(input: PromptInput): ContentShape {
    return classifyShape(input, this.rules);
  }

  describe(shape: ContentShape): string {
    return describeShape(shape);
  }

  buildPrompt(input: PromptInput): BuiltPrompt {
    const shape = this.classify(input);
    const entry = this.catalog.get(shape);
    const prompt = renderPrompt(entry.template, buildPromptContext(input));

    return {
      shape,
      templateShape: entry.shape,
      prompt,
      systemPrompt: entry.systemPrompt,
      expectedOutput: entry.expectedOutput,
    };
  }
}
