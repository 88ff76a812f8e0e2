#!/usr/bin/env node
/**
 * CLI tool to enrich a directory of bookmark notes.
 *
 * For every `.md` note (sorted by filename): match topics, rebuild tags,
 * cross-references and the curated-index pointer, and write the note back.
 * Rewriting is idempotent, so running the tool twice leaves notes as the
 * first run wrote them.
 *
 * Usage:
 *   npm run enrich-notes -- <notes-dir> [options]
 *
 * Options:
 *   --dry-run            Report what would change without writing
 *   --limit <n>          Process only the first n notes
 *   --topics <path>      Topic registry JSON (default: TOPICS_FILE or bundled)
 *   --taxonomy <path>    Taxonomy JSON (default: TAXONOMY_FILE or bundled)
 *   --json               Print the report as JSON
 *   -h, --help           Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Bad arguments, not a directory, invalid configuration or I/O error
 */

import "dotenv/config";
import { existsSync, readFileSync, readdirSync, statSync, writeFileSync } from "node:fs";
import { basename, join } from "node:path";
import { parseArgs } from "node:util";

import { loadAppConfig, loadTaxonomyConfigFile } from "../config/index.js";
import type { EnrichmentContext } from "../enrichment/index.js";
import { createLogger, createRunId, loggerOptionsFromConfig, type Logger } from "../logging/index.js";
import { enrichNote } from "../notes/index.js";
import { loadTopicsFileOrThrow } from "../topics/index.js";
import { formatCliError } from "./errors.js";

// ============================================================
// Types
// ============================================================

export interface ProcessNotesOptions {
  dryRun?: boolean;
  /** Process only the first `limit` notes; 0 or absent means all. */
  limit?: number;
  logger?: Logger;
}

export interface NotePreview {
  file: string;
  topics: string[];
}

export interface NoteBatchStats {
  total: number;
  enriched: number;
  /** Notes no topic matched. They still receive base tags. */
  noMatch: number;
  /** Notes whose content changed (written unless dry run). */
  changed: number;
  /** Topic id -> notes matched, in discovery order. */
  topicCounts: Map<string, number>;
  /** Index target -> notes pointing at it, in discovery order. */
  indexCounts: Map<string, number>;
  /** Matched notes, filled in dry-run mode. */
  previews: NotePreview[];
}

export const TOP_TOPICS_LIMIT = 15;

// ============================================================
// Batch processing
// ============================================================

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

/**
 * Note filenames in processing order.
 */
export function listNoteFiles(dir: string, limit = 0): string[] {
  const files = readdirSync(dir)
    .filter((name) => name.endsWith(".md"))
    .sort();
  return limit > 0 ? files.slice(0, limit) : files;
}

/**
 * Enrich every note in `dir`. File-system errors propagate.
 */
export function processNotes(
  dir: string,
  context: EnrichmentContext,
  options: ProcessNotesOptions = {}
): NoteBatchStats {
  const { dryRun = false, limit = 0, logger } = options;
  const stats: NoteBatchStats = {
    total: 0,
    enriched: 0,
    noMatch: 0,
    changed: 0,
    topicCounts: new Map(),
    indexCounts: new Map(),
    previews: [],
  };

  for (const file of listNoteFiles(dir, limit)) {
    const filePath = join(dir, file);
    const raw = readFileSync(filePath, "utf-8");
    stats.total++;

    const result = enrichNote(raw, context, { fallbackTitle: basename(file, ".md") });
    const { matched, indexTarget } = result.enrichment;

    if (matched.length === 0) {
      stats.noMatch++;
    }
    for (const topic of matched) {
      increment(stats.topicCounts, topic.id);
    }
    if (indexTarget !== undefined) {
      increment(stats.indexCounts, indexTarget);
    }
    stats.enriched++;

    if (result.changed) {
      stats.changed++;
    }

    if (dryRun) {
      if (matched.length > 0) {
        stats.previews.push({ file, topics: matched.map((t) => t.id) });
      }
    } else if (result.changed) {
      writeFileSync(filePath, result.content);
    }

    logger?.debug("Note enriched", {
      file,
      topics: matched.length,
      changed: result.changed,
    });
  }

  return stats;
}

/**
 * Entries sorted by count, highest first. Ties keep discovery order.
 */
export function rankCounts(counts: ReadonlyMap<string, number>, limit?: number): [string, number][] {
  const ranked = [...counts.entries()].sort((a, b) => b[1] - a[1]);
  return limit === undefined ? ranked : ranked.slice(0, limit);
}

// ============================================================
// Reporting
// ============================================================

export function formatPreviewLine(preview: NotePreview): string {
  return `  ${preview.file.slice(0, 60).padEnd(62)} → ${preview.topics.slice(0, 5).join(", ")}`;
}

export function formatBatchReport(stats: NoteBatchStats): string {
  const lines: string[] = [];

  if (stats.previews.length > 0) {
    for (const preview of stats.previews) {
      lines.push(formatPreviewLine(preview));
    }
    lines.push("");
  }

  lines.push("=".repeat(50));
  lines.push("Results:");
  lines.push(`  Total:    ${stats.total}`);
  lines.push(`  Enriched: ${stats.enriched}`);
  lines.push(`  Changed:  ${stats.changed}`);
  lines.push(`  No topic match: ${stats.noMatch}`);

  const topics = rankCounts(stats.topicCounts, TOP_TOPICS_LIMIT);
  if (topics.length > 0) {
    lines.push("");
    lines.push("Top topics:");
    for (const [id, count] of topics) {
      lines.push(`  ${String(count).padStart(3)}x  ${id}`);
    }
  }

  const targets = rankCounts(stats.indexCounts);
  if (targets.length > 0) {
    lines.push("");
    lines.push("Index assignments:");
    for (const [target, count] of targets) {
      lines.push(`  ${String(count).padStart(3)}x  ${target}`);
    }
  }

  return lines.join("\n");
}

export function batchReportToJson(stats: NoteBatchStats): Record<string, unknown> {
  return {
    total: stats.total,
    enriched: stats.enriched,
    changed: stats.changed,
    noMatch: stats.noMatch,
    topTopics: rankCounts(stats.topicCounts, TOP_TOPICS_LIMIT).map(([id, count]) => ({ id, count })),
    indexAssignments: rankCounts(stats.indexCounts).map(([target, count]) => ({ target, count })),
    previews: stats.previews,
  };
}

// ============================================================
// CLI Parsing
// ============================================================

const USAGE = "Usage: enrich-notes <notes-dir> [--dry-run] [--limit N] [--topics <path>] [--taxonomy <path>] [--json]";

function parseCliArgs(argv: string[]) {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      "dry-run": { type: "boolean", default: false },
      limit: { type: "string" },
      topics: { type: "string" },
      taxonomy: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  return { values, positionals };
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

// ============================================================
// Main
// ============================================================

/**
 * Run the CLI and return its exit code.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const { values: args, positionals } = parseCliArgs(argv);

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const dir = positionals[0];
  if (dir === undefined) {
    console.error(USAGE);
    return 1;
  }

  let limit = 0;
  if (args.limit !== undefined) {
    if (!/^\d+$/.test(args.limit)) {
      console.error(`Error: --limit must be a non-negative integer, got "${args.limit}"`);
      return 1;
    }
    limit = Number(args.limit);
  }

  if (!isDirectory(dir)) {
    console.error(`Error: Not a directory: ${dir}`);
    return 1;
  }

  const config = loadAppConfig();
  const logger = createLogger(loggerOptionsFromConfig(config, "enrich-notes", createRunId()));

  const taxonomy = loadTaxonomyConfigFile(args.taxonomy ?? config.taxonomyPath);
  const registry = loadTopicsFileOrThrow(args.topics ?? config.topicsPath, { taxonomy });

  const dryRun = args["dry-run"];
  logger.info("Processing notes", {
    dir,
    mode: dryRun ? "dry-run" : "live",
    ...(limit > 0 ? { limit } : {}),
    topics: registry.size,
  });

  const stats = processNotes(dir, { registry, taxonomy }, { dryRun, limit, logger });

  if (args.json) {
    console.log(JSON.stringify(batchReportToJson(stats), null, 2));
  } else {
    console.log(formatBatchReport(stats));
  }

  logger.info("Done", { total: stats.total, changed: stats.changed });
  return 0;
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("enrich-notes.ts") ||
   process.argv[1].endsWith("enrich-notes.js"));

if (isDirectExecution) {
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      console.error(`Error: ${formatCliError(err)}`);
      process.exit(1);
    });
}
