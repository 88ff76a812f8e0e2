/**
 * Prompt template loader.
 *
 * Loads prompt templates from disk (.md or .txt files), parses and validates
 * them, and exposes them for rendering.
 *
 * USAGE:
 *
 *   const loader = new PromptTemplateLoader("prompts/");
 *
 *   const tmpl = loader.load("top-list.md");
 *
 *   // Template files present on disk, referenced or not
 *   PromptTemplateLoader.listTemplates("prompts/");
 *
 * Templates are loaded and parsed once, then cached in memory, so catalog
 * entries that share a file share one parsed template. Trailing
 * whitespace (the file's final newline) is not part of the template.
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join, extname, basename, resolve } from "node:path";

import { parseTemplate, type ParsedTemplate } from "./template.js";

export class TemplateLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load template: ${filePath}`);
    this.name = "TemplateLoadError";
  }
}

/** File extensions recognized as prompt templates. */
const TEMPLATE_EXTENSIONS = new Set([".md", ".txt"]);

export class PromptTemplateLoader {
  private readonly baseDir: string;
  private readonly cache = new Map<string, ParsedTemplate>();

  /**
   * @param baseDir - Directory containing prompt template files
   */
  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir)) {
      throw new TemplateLoadError(
        this.baseDir,
        `Template directory does not exist: ${this.baseDir}`
      );
    }
  }

  get directory(): string {
    return this.baseDir;
  }

  /**
   * Load and parse a single template file. Results are cached.
   *
   * @param filename - Filename relative to baseDir (e.g. "top-list.md")
   * @throws TemplateLoadError   if file is missing or has the wrong extension
   * @throws TemplateParseError  if template contains invalid variables
   */
  load(filename: string): ParsedTemplate {
    const cached = this.cache.get(filename);
    if (cached) return cached;

    const filePath = join(this.baseDir, filename);

    if (!existsSync(filePath)) {
      throw new TemplateLoadError(
        filePath,
        `Template file not found: ${filePath}`
      );
    }

    const ext = extname(filename).toLowerCase();
    if (!TEMPLATE_EXTENSIONS.has(ext)) {
      throw new TemplateLoadError(
        filePath,
        `Unsupported template extension "${ext}". Use: ${[...TEMPLATE_EXTENSIONS].join(", ")}`
      );
    }

    const source = readFileSync(filePath, "utf-8").trimEnd();
    const parsed = parseTemplate(source, basename(filename, ext));

    this.cache.set(filename, parsed);
    return parsed;
  }

  /**
   * Template filenames in a directory, sorted, without loading them.
   * Subdirectories are not traversed.
   */
  static listTemplates(dir: string): string[] {
    const resolved = resolve(dir);
    if (!existsSync(resolved)) return [];

    return readdirSync(resolved)
      .filter((entry) => {
        const full = join(resolved, entry);
        if (!statSync(full).isFile()) return false;
        return TEMPLATE_EXTENSIONS.has(extname(entry).toLowerCase());
      })
      .sort();
  }
}
