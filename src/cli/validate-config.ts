#!/usr/bin/env node
/**
 * CLI command to validate every loadable table.
 *
 * Validates:
 * - Environment configuration
 * - Taxonomy (source tag, content-type tags, people)
 * - Topic registry (schema, duplicate ids, overlap warnings)
 * - Shape rules
 * - Prompt catalog and its templates (template files the catalog never
 *   references are reported as warnings)
 *
 * Usage:
 *   npm run validate-config -- [options]
 *
 * Options:
 *   --taxonomy <path>   Taxonomy JSON (default: TAXONOMY_FILE or bundled)
 *   --topics <path>     Topic registry JSON (default: TOPICS_FILE or bundled)
 *   --rules <path>      Shape rules JSON (default: SHAPE_RULES_FILE or bundled)
 *   --prompts <dir>     Prompts directory (default: PROMPTS_DIR or bundled)
 *   --verbose           Show detailed output
 *   --json              Output entire report as JSON (for CI parsing)
 *   --strict            Stop at the first failed step
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - All validations passed
 *   1 - One or more validations failed
 */

import "dotenv/config";
import { existsSync } from "node:fs";
import { parseArgs } from "node:util";

import {
  ConfigError,
  loadAppConfig,
  loadTaxonomyConfigFile,
  type AppConfig,
  type TaxonomyConfig,
} from "../config/index.js";
import { CATALOG_FILE, PromptTemplateLoader, loadPromptCatalogDir } from "../prompts/index.js";
import { loadShapeRulesFile } from "../shapes/index.js";
import { loadTopicsFile } from "../topics/index.js";
import { formatCliError } from "./errors.js";

// ============================================================
// Types
// ============================================================

export interface StepResult {
  success: boolean;
  component: string;
  message: string;
  details?: string[];
  warnings?: string[];
}

export interface ValidationPaths {
  taxonomyPath: string;
  topicsPath: string;
  shapeRulesPath: string;
  promptsDir: string;
}

export interface ValidationReport {
  timestamp: string;
  steps: StepResult[];
  summary: {
    stepsPassed: number;
    stepsFailed: number;
    stepsTotal: number;
    warnings: number;
  };
}

// ============================================================
// Terminal colors
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

const useColors = process.stdout.isTTY === true && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printStep(step: StepResult, verbose: boolean): void {
  if (step.success) {
    console.log(`${c("green", "✓")} ${c("bold", step.component)}: ${step.message}`);
    if (verbose) {
      step.details?.forEach((d) => console.log(`  ${c("dim", "•")} ${d}`));
    }
  } else {
    console.log(`${c("red", "✗")} ${c("bold", step.component)}: ${step.message}`);
    step.details?.forEach((d) => console.log(`    ${c("red", "•")} ${d}`));
  }
  step.warnings?.forEach((w) => console.log(`    ${c("yellow", "!")} ${w}`));
  console.log("");
}

// ============================================================
// Validation Step Functions
// ============================================================

function failure(component: string, err: unknown): StepResult {
  return {
    success: false,
    component,
    message: "validation failed",
    details: formatCliError(err).split("\n"),
  };
}

function missingFile(component: string, path: string): StepResult {
  return { success: false, component, message: `not found: ${path}` };
}

export function runEnvironmentStep(env: NodeJS.ProcessEnv = process.env): {
  step: StepResult;
  config?: Readonly<AppConfig>;
} {
  try {
    const config = loadAppConfig(env);
    return {
      step: {
        success: true,
        component: "Environment",
        message: config.env,
        details: [`Log level: ${config.logLevel}`, `Log to file: ${config.logToFile}`],
      },
      config,
    };
  } catch (err) {
    if (err instanceof ConfigError) {
      return { step: failure("Environment", err) };
    }
    throw err;
  }
}

export function runTaxonomyStep(path: string): { step: StepResult; taxonomy?: TaxonomyConfig } {
  if (!existsSync(path)) return { step: missingFile("Taxonomy", path) };
  try {
    const taxonomy = loadTaxonomyConfigFile(path);
    return {
      step: {
        success: true,
        component: "Taxonomy",
        message: `version ${taxonomy.version}`,
        details: [
          `Source tag: ${taxonomy.sourceTag}`,
          `Content-type tags: ${Object.keys(taxonomy.contentTypeTags).length}`,
          `Known people: ${Object.keys(taxonomy.people).length}`,
        ],
      },
      taxonomy,
    };
  } catch (err) {
    return { step: failure("Taxonomy", err) };
  }
}

export function runTopicsStep(path: string, taxonomy: TaxonomyConfig | undefined): StepResult {
  if (!existsSync(path)) return missingFile("Topics", path);

  const result = loadTopicsFile(path, taxonomy ? { taxonomy } : {});
  const warnings = result.warnings?.map(
    (w) => `[${w.topicId ?? "collection"}] ${w.field}: ${w.message}`
  );

  if (!result.success || result.registry === undefined) {
    return {
      success: false,
      component: "Topics",
      message: "validation failed",
      details: result.errors?.map((e) => `[${e.topicId ?? "collection"}] ${e.field}: ${e.message}`),
      ...(warnings ? { warnings } : {}),
    };
  }

  const stats = result.registry.getStats();
  return {
    success: true,
    component: "Topics",
    message: `loaded ${stats.totalTopics} topics`,
    details: [
      `Patterns: ${stats.totalPatterns}`,
      `Without index target: ${stats.withoutIndexTarget}`,
      ...stats.byIndexTarget.map(([target, count]) => `${target}: ${count}`),
    ],
    ...(warnings ? { warnings } : {}),
  };
}

export function runShapeRulesStep(path: string): StepResult {
  if (!existsSync(path)) return missingFile("Shape Rules", path);
  try {
    const rules = loadShapeRulesFile(path);
    return {
      success: true,
      component: "Shape Rules",
      message: `loaded ${rules.rules.length} rules`,
      details: [
        `Screenshot threshold: ${rules.screenshotMaxLength} characters`,
        ...rules.rules.map((r) => `${r.shape}: ${r.patterns.length} patterns`),
      ],
    };
  } catch (err) {
    return failure("Shape Rules", err);
  }
}

export function runPromptCatalogStep(dir: string): StepResult {
  if (!existsSync(dir)) return missingFile("Prompt Catalog", dir);
  try {
    const catalog = loadPromptCatalogDir(dir);
    const referenced = new Set(catalog.entries().map((e) => e.file));
    const unreferenced = PromptTemplateLoader.listTemplates(dir).filter((file) => !referenced.has(file));
    return {
      success: true,
      component: "Prompt Catalog",
      message: `loaded ${catalog.size} templates`,
      details: catalog
        .entries()
        .map((e) => `${e.shape}: ${e.template.variables.join(", ") || "(no variables)"}`),
      ...(unreferenced.length > 0
        ? { warnings: unreferenced.map((file) => `${file}: not referenced by ${CATALOG_FILE}`) }
        : {}),
    };
  } catch (err) {
    return failure("Prompt Catalog", err);
  }
}

/**
 * Run every table step. With `strict`, stops after the first failure.
 */
export function runValidation(paths: ValidationPaths, strict = false): StepResult[] {
  const steps: StepResult[] = [];

  const taxonomyResult = runTaxonomyStep(paths.taxonomyPath);
  steps.push(taxonomyResult.step);
  if (strict && !taxonomyResult.step.success) return steps;

  const runners: (() => StepResult)[] = [
    () => runTopicsStep(paths.topicsPath, taxonomyResult.taxonomy),
    () => runShapeRulesStep(paths.shapeRulesPath),
    () => runPromptCatalogStep(paths.promptsDir),
  ];

  for (const run of runners) {
    const step = run();
    steps.push(step);
    if (strict && !step.success) break;
  }

  return steps;
}

export function buildReport(steps: StepResult[]): ValidationReport {
  return {
    timestamp: new Date().toISOString(),
    steps,
    summary: {
      stepsPassed: steps.filter((s) => s.success).length,
      stepsFailed: steps.filter((s) => !s.success).length,
      stepsTotal: steps.length,
      warnings: steps.reduce((sum, s) => sum + (s.warnings?.length ?? 0), 0),
    },
  };
}

// ============================================================
// CLI Parsing
// ============================================================

const USAGE = `
Usage: validate-config [options]

Options:
  --taxonomy <path>   Taxonomy JSON
  --topics <path>     Topic registry JSON
  --rules <path>      Shape rules JSON
  --prompts <dir>     Prompts directory
  --verbose           Show detailed output
  --json              Output entire report as JSON
  --strict            Stop at the first failed step
  -h, --help          Show this help message
`;

function parseCliArgs(argv: string[]) {
  const { values } = parseArgs({
    args: argv,
    options: {
      taxonomy: { type: "string" },
      topics: { type: "string" },
      rules: { type: "string" },
      prompts: { type: "string" },
      verbose: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      strict: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  return values;
}

// ============================================================
// Main
// ============================================================

/**
 * Run the CLI and return its exit code.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const args = parseCliArgs(argv);

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const environment = runEnvironmentStep();
  const steps = [environment.step];
  const config = environment.config;

  if (config !== undefined) {
    steps.push(
      ...runValidation(
        {
          taxonomyPath: args.taxonomy ?? config.taxonomyPath,
          topicsPath: args.topics ?? config.topicsPath,
          shapeRulesPath: args.rules ?? config.shapeRulesPath,
          promptsDir: args.prompts ?? config.promptsDir,
        },
        args.strict
      )
    );
  }

  const report = buildReport(steps);

  if (args.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log("");
    console.log(c("bold", "═".repeat(60)));
    console.log(c("bold", " Configuration Validation"));
    console.log(c("bold", "═".repeat(60)));
    console.log("");
    steps.forEach((step) => printStep(step, args.verbose));
    console.log("─".repeat(60));
    const { stepsPassed, stepsFailed } = report.summary;
    if (stepsFailed === 0) {
      console.log(c("green", `✓ All validations passed (${stepsPassed}/${stepsPassed})`));
    } else {
      console.log(c("red", `✗ Validation failed: ${stepsFailed} error(s)`));
    }
    console.log("─".repeat(60));
    console.log("");
  }

  return report.summary.stepsFailed === 0 ? 0 : 1;
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("validate-config.ts") ||
   process.argv[1].endsWith("validate-config.js"));

if (isDirectExecution) {
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      console.error(c("red", `Error: ${formatCliError(err)}`));
      process.exit(1);
    });
}
