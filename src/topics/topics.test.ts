/**
 * Topic registry, loader and matcher tests.
 *
 * Run: node --import tsx --test src/topics/topics.test.ts
 *
 * Tests cover:
 *   1. Loading: valid registries, schema errors, duplicates, overlap warnings
 *   2. Registry: order, lookups, statistics, immutability
 *   3. Matching: registration order, case folding, first-pattern scan
 *   4. Bundled registry: loads cleanly and matches representative text
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, describe, test } from "node:test";

import { DEFAULT_TAXONOMY_PATH, DEFAULT_TOPICS_PATH } from "../config/paths.js";
import { loadTaxonomyConfig, loadTaxonomyConfigFile } from "../config/taxonomy/loader.js";
import {
  TopicValidationError,
  loadTopics,
  loadTopicsFile,
  loadTopicsFileOrThrow,
  loadTopicsOrThrow,
} from "./loader.js";
import { firstMatchingPattern, matchTopics } from "./matcher.js";
import { TopicRegistry } from "./registry.js";
import { compileTopic } from "./schema.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const RUST = {
  id: "rust",
  patterns: ["\\brust\\b", "\\bcargo\\b"],
  tag: "topic/rust",
  wikilink: "Rust",
  indexTarget: "+Atlas/Software-Engineering",
};

const EDITORS = {
  id: "editors",
  patterns: ["\\bneovim\\b", "\\bzed\\b"],
  tag: "topic/editors",
  wikilink: "Editors",
  indexTarget: "+Atlas/Tools",
};

const NOTES = {
  id: "notes",
  patterns: ["\\bnote.?taking\\b"],
  tag: "topic/notes",
  wikilink: "Note Taking",
};

function collection(...topics: Record<string, unknown>[]): Record<string, unknown> {
  return { version: "1.0.0", topics };
}

const registry = loadTopicsOrThrow(collection(RUST, EDITORS, NOTES));

const tmp = mkdtempSync(join(tmpdir(), "topics-test-"));
after(() => rmSync(tmp, { recursive: true, force: true }));

// ═══════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════

describe("loadTopics", () => {
  test("valid collection produces a registry and stats", () => {
    const result = loadTopics(collection(RUST, EDITORS, NOTES));
    assert.equal(result.success, true);
    assert.equal(result.registry?.size, 3);
    assert.equal(result.errors, undefined);
    assert.equal(result.warnings, undefined);
    assert.deepEqual(result.stats, {
      total: 3,
      patterns: 5,
      withIndexTarget: 2,
      schemaErrors: 0,
      duplicateErrors: 0,
      overlapWarnings: 0,
    });
  });

  test("empty collection is valid", () => {
    const result = loadTopics(collection());
    assert.equal(result.success, true);
    assert.equal(result.registry?.size, 0);
  });

  test("uncompilable pattern is a schema error located at the topic", () => {
    const result = loadTopics(collection(RUST, { ...EDITORS, patterns: ["(unclosed"] }));
    assert.equal(result.success, false);
    assert.equal(result.errors?.length, 1);
    const [issue] = result.errors ?? [];
    assert.equal(issue?.topicId, "editors");
    assert.equal(issue?.field, "topics.1.patterns.0");
    assert.equal(issue?.message, "Pattern must be a valid regular expression");
    assert.equal(issue?.type, "schema");
  });

  test("topic without patterns is rejected", () => {
    const result = loadTopics(collection({ ...RUST, patterns: [] }));
    assert.equal(result.success, false);
    assert.equal(result.errors?.[0]?.message, "Topic needs at least one pattern");
  });

  test("malformed id and tag are rejected", () => {
    const result = loadTopics(collection({ ...RUST, id: "Rust_Lang", tag: "Topic/Rust" }));
    assert.equal(result.success, false);
    assert.deepEqual(
      result.errors?.map((e) => e.field).sort(),
      ["topics.0.id", "topics.0.tag"]
    );
  });

  test("wikilink with brackets is rejected", () => {
    const result = loadTopics(collection({ ...RUST, wikilink: "[[Rust]]" }));
    assert.equal(result.success, false);
    assert.equal(result.errors?.[0]?.field, "topics.0.wikilink");
  });

  test("unknown keys are rejected", () => {
    const result = loadTopics(collection({ ...RUST, priority: "high" }));
    assert.equal(result.success, false);
    assert.equal(result.errors?.[0]?.field, "topics.0");
  });

  test("bad version is a collection-level error", () => {
    const result = loadTopics({ version: "1", topics: [] });
    assert.equal(result.success, false);
    assert.equal(result.errors?.[0]?.field, "version");
    assert.equal(result.errors?.[0]?.topicId, undefined);
  });

  test("non-object input fails without throwing", () => {
    const result = loadTopics("not a collection");
    assert.equal(result.success, false);
    assert.equal(result.errors?.[0]?.field, "(root)");
  });

  test("duplicate ids block loading", () => {
    const result = loadTopics(collection(RUST, EDITORS, { ...NOTES, id: "rust" }));
    assert.equal(result.success, false);
    assert.equal(result.registry, undefined);
    assert.equal(result.errors?.length, 1);
    assert.equal(result.errors?.[0]?.type, "duplicate");
    assert.equal(
      result.errors?.[0]?.message,
      'Duplicate topic ID "rust" (first seen at index 0, duplicate at index 2)'
    );
  });

  test("shared tag and wikilink are warnings, not errors", () => {
    const result = loadTopics(
      collection(RUST, { ...NOTES, id: "rust-lang", tag: "topic/rust", wikilink: "Rust" })
    );
    assert.equal(result.success, true);
    assert.deepEqual(
      result.warnings?.map((w) => `${w.topicId}:${w.field}`),
      ["rust-lang:tag", "rust-lang:wikilink"]
    );
    assert.equal(result.stats?.overlapWarnings, 2);
  });

  test("topic tag reserved by the taxonomy is a warning", () => {
    const taxonomy = loadTaxonomyConfig({
      version: "1.0.0",
      sourceTag: "source/twitter",
      contentTypeTags: { tweet: "twitter/tweet" },
      defaultContentTypeTag: "twitter/tweet",
    });
    const result = loadTopics(collection({ ...RUST, tag: "source/twitter" }), { taxonomy });
    assert.equal(result.success, true);
    assert.equal(result.warnings?.[0]?.message, 'Tag "source/twitter" is reserved by the taxonomy');
  });

  test("warnings can be suppressed", () => {
    const result = loadTopics(
      collection(RUST, { ...NOTES, id: "rust-lang", tag: "topic/rust" }),
      { includeWarnings: false }
    );
    assert.equal(result.warnings, undefined);
    assert.equal(result.stats?.overlapWarnings, 1);
  });
});

describe("loadTopicsOrThrow", () => {
  test("throws TopicValidationError with formatted issues", () => {
    assert.throws(
      () => loadTopicsOrThrow(collection(RUST, RUST)),
      (err: unknown) => {
        assert.ok(err instanceof TopicValidationError);
        assert.equal(err.issues.length, 1);
        assert.equal(
          err.format(),
          'Topic validation failed:\n  - [rust] id: Duplicate topic ID "rust" (first seen at index 0, duplicate at index 1)'
        );
        return true;
      }
    );
  });
});

describe("loadTopicsFile", () => {
  test("reads a registry from disk", () => {
    const path = join(tmp, "topics.json");
    writeFileSync(path, JSON.stringify(collection(NOTES)));
    assert.equal(loadTopicsFileOrThrow(path).topics[0]?.wikilink, "Note Taking");
  });

  test("invalid JSON is reported as an issue", () => {
    const path = join(tmp, "broken.json");
    writeFileSync(path, "{ not json");
    const result = loadTopicsFile(path);
    assert.equal(result.success, false);
    assert.equal(result.errors?.[0]?.type, "json");
    assert.throws(() => loadTopicsFileOrThrow(path), TopicValidationError);
  });

  test("missing file propagates the read error", () => {
    assert.throws(() => loadTopicsFile(join(tmp, "missing.json")), /ENOENT/);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════

describe("TopicRegistry", () => {
  test("keeps registration order", () => {
    assert.deepEqual(
      registry.topics.map((t) => t.id),
      ["rust", "editors", "notes"]
    );
    assert.equal(registry.size, 3);
  });

  test("reports statistics", () => {
    assert.deepEqual(registry.getStats(), {
      totalTopics: 3,
      totalPatterns: 5,
      byIndexTarget: [
        ["+Atlas/Software-Engineering", 1],
        ["+Atlas/Tools", 1],
      ],
      withoutIndexTarget: 1,
    });
  });

  test("is frozen", () => {
    assert.ok(Object.isFrozen(registry.topics));
    assert.ok(Object.isFrozen(registry.topics[0]));
  });

  test("rejects duplicate ids when created directly", () => {
    const topic = compileTopic(RUST);
    assert.throws(() => TopicRegistry.create([topic, topic]), /Duplicate topic ID "rust"/);
  });

  test("compiled topics omit an absent index target", () => {
    assert.equal("indexTarget" in compileTopic(NOTES), false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// MATCHING
// ═══════════════════════════════════════════════════════════════════════════

describe("matchTopics", () => {
  test("returns every matching topic in registration order", () => {
    const matched = matchTopics(registry, "Note-taking in Zed", "Written in Rust.");
    assert.deepEqual(
      matched.map((t) => t.id),
      ["rust", "editors", "notes"]
    );
  });

  test("is case-insensitive", () => {
    assert.deepEqual(
      matchTopics(registry, "", "NEOVIM config").map((t) => t.id),
      ["editors"]
    );
  });

  test("matches on the title alone", () => {
    assert.deepEqual(
      matchTopics(registry, "cargo tricks", "").map((t) => t.id),
      ["rust"]
    );
  });

  test("returns an empty frozen list when nothing matches", () => {
    const matched = matchTopics(registry, "Gardening", "Tomatoes and basil");
    assert.equal(matched.length, 0);
    assert.ok(Object.isFrozen(matched));
  });

  test("respects word boundaries", () => {
    assert.equal(matchTopics(registry, "", "trusty rusted zedonk").length, 0);
  });

  test("accented letters count as word boundaries unless a lookbehind excludes them", () => {
    const boundaries = loadTopicsOrThrow(
      collection(
        { id: "ascii", patterns: ["\\bclaude\\b"], tag: "topic/ascii", wikilink: "Ascii" },
        { id: "latin", patterns: ["(?<![a-zà-ÿ])claude\\b"], tag: "topic/latin", wikilink: "Latin" }
      )
    );
    assert.deepEqual(
      matchTopics(boundaries, "", "éclaude").map((t) => t.id),
      ["ascii"]
    );
    assert.deepEqual(
      matchTopics(boundaries, "", "ask claude").map((t) => t.id),
      ["ascii", "latin"]
    );
  });

  test("firstMatchingPattern reports the winning pattern", () => {
    const rust = registry.topics[0];
    assert.ok(rust);
    assert.equal(firstMatchingPattern(rust, "cargo build"), 1);
    assert.equal(firstMatchingPattern(rust, "rust and cargo"), 0);
    assert.equal(firstMatchingPattern(rust, "python"), -1);
  });

  test("repeated matching gives the same result", () => {
    const first = matchTopics(registry, "rust", "").map((t) => t.id);
    const second = matchTopics(registry, "rust", "").map((t) => t.id);
    assert.deepEqual(first, second);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// BUNDLED REGISTRY
// ═══════════════════════════════════════════════════════════════════════════

describe("bundled topics.json", () => {
  const taxonomy = loadTaxonomyConfigFile(DEFAULT_TAXONOMY_PATH);
  const bundled = loadTopicsFileOrThrow(DEFAULT_TOPICS_PATH, { taxonomy });

  test("loads without errors", () => {
    assert.equal(bundled.size, 47);
    assert.equal(bundled.topics[0]?.id, "claude-code");
  });

  test("specific and broad coding topics both match", () => {
    const ids = matchTopics(bundled, "Claude Code tips", "Using cursor rules").map((t) => t.id);
    assert.deepEqual(ids.slice(0, 2), ["claude-code", "ai-coding"]);
    assert.equal(ids.includes("claude"), false);
  });

  test("accented word is matched only as a whole word", () => {
    const whole = matchTopics(bundled, "", "o árbitro errou").map((t) => t.id);
    const embedded = matchTopics(bundled, "", "superárbitro").map((t) => t.id);
    assert.ok(whole.includes("var"));
    assert.equal(embedded.includes("var"), false);
  });
});
