/**
 * Prompt renderer.
 *
 * Takes a ParsedTemplate and a PromptContext and produces the final
 * prompt string.
 *
 * Processing pipeline:
 *
 *   1. Every {{variable}} in the template MUST exist in the context.
 *   2. Placeholders are replaced in a single pass, so placeholder-like
 *      text inside a substituted value is left as is.
 *
 * Context values the template does not reference are ignored: each shape
 * template uses its own subset of the bookmark context.
 */

import { PLACEHOLDER_RE, isValidVariable, type ParsedTemplate } from "./template.js";
import type { PromptContext } from "./context.js";

export class PromptRenderError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly missingVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Cannot render template "${templateName}": context is missing ` +
          `value(s) for: ${missingVariables.join(", ")}`
    );
    this.name = "PromptRenderError";
  }
}

/**
 * Render a parsed template against a prompt context.
 *
 * @throws PromptRenderError if a referenced variable has no value
 */
export function renderPrompt(template: ParsedTemplate, context: PromptContext): string {
  const templateName = template.name ?? "(anonymous)";

  const missing = template.variables.filter((variable) => context[variable] === undefined);
  if (missing.length > 0) {
    throw new PromptRenderError(templateName, missing);
  }

  return template.source.replace(PLACEHOLDER_RE, (match: string, name: string) => {
    if (!isValidVariable(name)) return match;
    return context[name] ?? match;
  });
}
