/**
 * bookmark-enricher library entry point.
 *
 * Topic matching and note enrichment:
 *
 *   const taxonomy = loadTaxonomyConfigFile(config.taxonomyPath);
 *   const registry = loadTopicsFileOrThrow(config.topicsPath, { taxonomy });
 *   const { content } = enrichNote(raw, { registry, taxonomy });
 *
 * Prompt building:
 *
 *   const engine = PromptEngine.fromFiles(config.shapeRulesPath, config.promptsDir);
 *   const { prompt, systemPrompt } = engine.buildPrompt({ text, author, hasLink: true });
 */

export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./topics/index.js";
export * from "./enrichment/index.js";
export * from "./notes/index.js";
export * from "./shapes/index.js";
export * from "./prompts/index.js";
