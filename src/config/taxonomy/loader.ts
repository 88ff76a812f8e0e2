/**
 * Taxonomy configuration loader and validator.
 *
 * Responsible for:
 * - Validating against the schema with fail-fast behavior
 * - Producing clear, structured error messages
 * - Freezing configuration to enforce immutability
 */

import {
  deepFreeze,
  formatIssueList,
  formatZodIssues,
  readJsonFile,
  type ConfigValidationIssue,
} from "../validation.js";
import { TaxonomyConfigSchema, type TaxonomyConfig } from "./schema.js";

/**
 * Structured validation error for taxonomy configuration.
 */
export class TaxonomyConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "TaxonomyConfigError";
    this.issues = issues;
  }

  format(): string {
    return formatIssueList("Taxonomy configuration validation failed:", this.issues);
  }
}

/**
 * Validate and load taxonomy configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen TaxonomyConfig
 * @throws TaxonomyConfigError if validation fails
 */
export function loadTaxonomyConfig(input: unknown): Readonly<TaxonomyConfig> {
  const result = TaxonomyConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new TaxonomyConfigError(
      `Invalid taxonomy configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Read, validate and freeze a taxonomy JSON file.
 * File-system errors propagate unchanged.
 */
export function loadTaxonomyConfigFile(filePath: string): Readonly<TaxonomyConfig> {
  const json = readJsonFile(filePath);
  if (!json.ok) {
    throw new TaxonomyConfigError(`Invalid taxonomy configuration: ${filePath}`, [json.issue]);
  }
  return loadTaxonomyConfig(json.value);
}

