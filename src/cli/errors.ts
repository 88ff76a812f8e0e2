/**
 * Error rendering shared by the CLI entry points.
 */

import { TaxonomyConfigError } from "../config/index.js";
import { PromptCatalogError } from "../prompts/index.js";
import { ShapeRulesError } from "../shapes/index.js";
import { TopicValidationError } from "../topics/index.js";

/**
 * Message for an error that reached a CLI's top level. Validation errors
 * print their full issue list.
 */
export function formatCliError(err: unknown): string {
  if (
    err instanceof TaxonomyConfigError ||
    err instanceof TopicValidationError ||
    err instanceof ShapeRulesError ||
    err instanceof PromptCatalogError
  ) {
    return err.format();
  }
  return err instanceof Error ? err.message : String(err);
}
