/**
 * Prompt template system.
 *
 * Templates use `{{variable}}` placeholders validated against the bookmark
 * context. Each content shape maps to one template file through
 * `prompts/catalog.json`.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * ```typescript
 * import { PromptEngine } from "./prompts/index.js";
 *
 * const engine = PromptEngine.fromFiles(config.shapeRulesPath, config.promptsDir);
 * const { shape, prompt, systemPrompt } = engine.buildPrompt({
 *   text: bookmark.text,
 *   author: bookmark.author,
 *   likes: bookmark.likes,
 *   hasImage: true,
 *   imageAnalysis: visionOutput,
 * });
 * ```
 *
 * Lower-level pieces (loader, parser, renderer) are exported for tools that
 * render a single template directly.
 */

// Context
export {
  PROMPT_VARIABLES,
  DEFAULT_AUTHOR,
  buildPromptContext,
  wrapFragment,
  type PromptVariable,
  type PromptContext,
  type PromptInput,
} from "./context.js";

// Template parsing
export {
  PLACEHOLDER_RE,
  parseTemplate,
  extractVariables,
  isValidVariable,
  TemplateParseError,
  type ParsedTemplate,
} from "./template.js";

// Rendering
export { renderPrompt, PromptRenderError } from "./renderer.js";

// Loading
export { PromptTemplateLoader, TemplateLoadError } from "./loader.js";

// Catalog
export {
  CATALOG_FILE,
  TEMPLATED_SHAPES,
  PromptCatalog,
  PromptCatalogError,
  PromptCatalogSchema,
  loadPromptCatalog,
  loadPromptCatalogDir,
  resolveTemplateShape,
  type PromptTemplate,
  type PromptCatalogDefinition,
  type TemplatedShape,
} from "./catalog.js";

// Engine
export { PromptEngine, type BuiltPrompt } from "./engine.js";
