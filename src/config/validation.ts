/**
 * Shared helpers for schema-validated configuration files.
 *
 * Every static table the classifier depends on (taxonomy, topics, shape
 * rules, prompt catalog) is loaded through zod, reported as a list of
 * path-addressed issues and deep frozen before it is handed out.
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "json" when the file could not be parsed */
  code: string;
}

/**
 * Convert Zod issues to our structured format.
 */
export function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Render issues as indented lines under a heading.
 */
export function formatIssueList(heading: string, issues: ConfigValidationIssue[]): string {
  const lines = [heading];
  for (const issue of issues) {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    lines.push(`  - ${path}: ${issue.message}`);
  }
  return lines.join("\n");
}

/**
 * Deep freeze an object to enforce runtime immutability.
 * RegExp instances are left unfrozen; the engine writes their lastIndex.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value instanceof RegExp) continue;
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return Object.freeze(obj);
}

/**
 * Read and parse a JSON file.
 *
 * Read errors propagate unchanged. A parse failure is returned as an issue
 * so callers can report it next to schema issues.
 */
export function readJsonFile(
  filePath: string
): { ok: true; value: unknown } | { ok: false; issue: ConfigValidationIssue } {
  const text = readFileSync(filePath, "utf-8");
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return {
      ok: false,
      issue: {
        path: [],
        message: `${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        code: "json",
      },
    };
  }
}

/**
 * Check that a pattern string compiles as a case-insensitive RegExp.
 */
export function isCompilablePattern(pattern: string): boolean {
  try {
    new RegExp(pattern, "i");
    return true;
  } catch {
    return false;
  }
}
