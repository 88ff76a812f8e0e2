#!/usr/bin/env node
/**
 * CLI tool to preview the summarization prompt for a bookmark.
 *
 * Classifies the bookmark text into a content shape, fills that shape's
 * template and prints the result, so template edits and rule changes can
 * be checked before any language-model call is made.
 *
 * Usage:
 *   npm run preview-prompt -- --text "Top 10 AI tools for 2025" --link
 *   npm run preview-prompt -- --file tweet.txt --author someone --image \
 *     --image-analysis vision.txt
 *
 * Options:
 *   --text <text>             Bookmark text
 *   --file <path>             Read bookmark text from a file instead
 *   --author <handle>         Author handle (default: unknown)
 *   --likes <n>               Engagement count (default: 0)
 *   --video                   Bookmark has a video
 *   --image                   Bookmark has images
 *   --link                    Bookmark has an external link
 *   --link-content <path>     Pre-fetched article text
 *   --image-analysis <path>   Vision model output
 *   --video-analysis <path>   Video analysis output
 *   --rules <path>            Shape rules JSON (default: SHAPE_RULES_FILE or bundled)
 *   --prompts <dir>           Prompts directory (default: PROMPTS_DIR or bundled)
 *   --no-color                Disable ANSI colors
 *   --json                    Output as JSON (includes metadata)
 *   -h, --help                Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (missing text, unreadable file, invalid rules or templates)
 */

import "dotenv/config";
import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";

import { loadAppConfig } from "../config/index.js";
import { PromptEngine, type BuiltPrompt, type PromptInput } from "../prompts/index.js";
import { formatCliError } from "./errors.js";

// ============================================================
// Types
// ============================================================

export interface PreviewResult extends BuiltPrompt {
  description: string;
  metadata: {
    lineCount: number;
    charCount: number;
  };
}

// ============================================================
// Terminal colors
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  cyan: "\x1b[36m",
};

let useColors = process.stdout.isTTY === true;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

// ============================================================
// Preview
// ============================================================

export function buildPreview(engine: PromptEngine, input: PromptInput): PreviewResult {
  const built = engine.buildPrompt(input);
  return {
    ...built,
    description: engine.describe(built.shape),
    metadata: {
      lineCount: built.prompt.split("\n").length,
      charCount: built.prompt.length,
    },
  };
}

export function formatPreviewHeader(result: PreviewResult): string {
  const template =
    result.templateShape === result.shape
      ? result.templateShape
      : `${result.templateShape} (fallback for ${result.shape})`;

  return [
    "",
    c("bold", "═".repeat(60)),
    c("bold", " Prompt Preview"),
    c("bold", "═".repeat(60)),
    "",
    `  ${c("cyan", "Shape:")}       ${result.shape}`,
    `  ${c("cyan", "Meaning:")}     ${result.description}`,
    `  ${c("cyan", "Template:")}    ${template}`,
    `  ${c("cyan", "Expected:")}    ${result.expectedOutput}`,
    `  ${c("cyan", "Lines:")}       ${result.metadata.lineCount}`,
    `  ${c("cyan", "Characters:")}  ${result.metadata.charCount}`,
    "",
    c("dim", "── System prompt " + "─".repeat(43)),
    result.systemPrompt,
    "",
    c("dim", "── Prompt " + "─".repeat(50)),
  ].join("\n");
}

// ============================================================
// CLI Parsing
// ============================================================

const USAGE = `
Usage: preview-prompt (--text <text> | --file <path>) [options]

Options:
  --text <text>             Bookmark text
  --file <path>             Read bookmark text from a file instead
  --author <handle>         Author handle (default: unknown)
  --likes <n>               Engagement count (default: 0)
  --video                   Bookmark has a video
  --image                   Bookmark has images
  --link                    Bookmark has an external link
  --link-content <path>     Pre-fetched article text
  --image-analysis <path>   Vision model output
  --video-analysis <path>   Video analysis output
  --rules <path>            Shape rules JSON
  --prompts <dir>           Prompts directory
  --no-color                Disable ANSI colors
  --json                    Output as JSON (includes metadata)
  -h, --help                Show this help message
`;

function parseCliArgs(argv: string[]) {
  const { values } = parseArgs({
    args: argv,
    options: {
      text: { type: "string" },
      file: { type: "string" },
      author: { type: "string" },
      likes: { type: "string" },
      video: { type: "boolean", default: false },
      image: { type: "boolean", default: false },
      link: { type: "boolean", default: false },
      "link-content": { type: "string" },
      "image-analysis": { type: "string" },
      "video-analysis": { type: "string" },
      rules: { type: "string" },
      prompts: { type: "string" },
      "no-color": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  return values;
}

function readOptional(path: string | undefined): string | undefined {
  return path === undefined ? undefined : readFileSync(path, "utf-8");
}

// ============================================================
// Main
// ============================================================

/**
 * Run the CLI and return its exit code.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const args = parseCliArgs(argv);

  if (args["no-color"]) {
    useColors = false;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const text = args.text ?? readOptional(args.file);
  if (text === undefined) {
    console.error(c("red", "Error: --text or --file is required"));
    return 1;
  }

  let likes = 0;
  if (args.likes !== undefined) {
    if (!/^\d+$/.test(args.likes)) {
      console.error(c("red", `Error: --likes must be a non-negative integer, got "${args.likes}"`));
      return 1;
    }
    likes = Number(args.likes);
  }

  const config = loadAppConfig();
  const engine = PromptEngine.fromFiles(
    args.rules ?? config.shapeRulesPath,
    args.prompts ?? config.promptsDir
  );

  const input: PromptInput = {
    text,
    likes,
    hasVideo: args.video,
    hasImage: args.image,
    hasLink: args.link,
  };
  if (args.author !== undefined) input.author = args.author;
  const linkContent = readOptional(args["link-content"]);
  if (linkContent !== undefined) input.linkContent = linkContent;
  const imageAnalysis = readOptional(args["image-analysis"]);
  if (imageAnalysis !== undefined) input.imageAnalysis = imageAnalysis;
  const videoAnalysis = readOptional(args["video-analysis"]);
  if (videoAnalysis !== undefined) input.videoAnalysis = videoAnalysis;

  const preview = buildPreview(engine, input);

  if (args.json) {
    console.log(JSON.stringify(preview, null, 2));
  } else {
    console.log(formatPreviewHeader(preview));
    console.log(preview.prompt);
  }

  return 0;
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("preview-prompt.ts") ||
   process.argv[1].endsWith("preview-prompt.js"));

if (isDirectExecution) {
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      console.error(c("red", `Error: ${formatCliError(err)}`));
      process.exit(1);
    });
}
