/**
 * Shape rule loader.
 *
 * Validates the rule table, compiles every pattern case-insensitively and
 * freezes the result.
 */

import {
  deepFreeze,
  formatIssueList,
  formatZodIssues,
  readJsonFile,
  type ConfigValidationIssue,
} from "../config/validation.js";
import { ShapeRulesSchema, type ShapeRules, type ShapeRulesDefinition } from "./schema.js";

export class ShapeRulesError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "ShapeRulesError";
    this.issues = issues;
  }

  format(): string {
    return formatIssueList("Shape rules validation failed:", this.issues);
  }
}

export function compileShapeRules(definition: ShapeRulesDefinition): ShapeRules {
  return deepFreeze({
    version: definition.version,
    screenshotMaxLength: definition.screenshotMaxLength,
    rules: definition.rules.map((rule) => ({
      shape: rule.shape,
      patterns: rule.patterns.map((source) => new RegExp(source, "i")),
    })),
  });
}

/**
 * @throws ShapeRulesError if validation fails
 */
export function loadShapeRules(input: unknown): ShapeRules {
  const result = ShapeRulesSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ShapeRulesError(`Invalid shape rules: ${issues.length} validation error(s)`, issues);
  }
  return compileShapeRules(result.data);
}

/**
 * Read and load a shape rule file. File-system errors propagate unchanged.
 */
export function loadShapeRulesFile(filePath: string): ShapeRules {
  const json = readJsonFile(filePath);
  if (!json.ok) {
    throw new ShapeRulesError(`Invalid shape rules: ${filePath}`, [json.issue]);
  }
  return loadShapeRules(json.value);
}
