/**
 * Tag, link and index builder tests.
 *
 * Run: node --import tsx --test src/enrichment/enrichment.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import { loadTaxonomyConfig } from "../config/taxonomy/loader.js";
import { loadTopicsOrThrow } from "../topics/loader.js";
import { matchTopics } from "../topics/matcher.js";
import { buildLinks, buildTags, normalizeHandle, resolveIndexTarget } from "./builders.js";
import { enrich } from "./enrich.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const taxonomy = loadTaxonomyConfig({
  version: "1.0.0",
  sourceTag: "source/twitter",
  contentTypeTags: { tweet: "twitter/tweet", thread: "twitter/thread", video: "twitter/video" },
  defaultContentTypeTag: "twitter/tweet",
  people: { janedoe: "Jane Doe", dev_sam: "Sam Dev" },
});

const registry = loadTopicsOrThrow({
  version: "1.0.0",
  topics: [
    { id: "notes", patterns: ["\\bnotes\\b"], tag: "topic/notes", wikilink: "Notes" },
    {
      id: "ai-coding",
      patterns: ["\\bai coding\\b", "\\bcursor\\b"],
      tag: "topic/ai-coding",
      wikilink: "AI Coding",
      indexTarget: "+Atlas/AI-Coding",
    },
    {
      id: "claude-code",
      patterns: ["\\bclaude code\\b"],
      tag: "topic/claude-code",
      wikilink: "Claude Code",
      indexTarget: "+Atlas/Claude",
    },
    {
      // Shares its tag and display name with ai-coding.
      id: "vibe-coding",
      patterns: ["\\bvibe cod"],
      tag: "topic/ai-coding",
      wikilink: "AI Coding",
    },
  ],
});

function match(text: string) {
  return matchTopics(registry, "", text);
}

// ═══════════════════════════════════════════════════════════════════════════
// HANDLES
// ═══════════════════════════════════════════════════════════════════════════

describe("normalizeHandle", () => {
  test("lowercases and strips a leading @", () => {
    assert.equal(normalizeHandle("@JaneDoe"), "janedoe");
  });

  test("trims surrounding whitespace", () => {
    assert.equal(normalizeHandle("  Dev_Sam \n"), "dev_sam");
  });

  test("whitespace-only handle normalizes to empty", () => {
    assert.equal(normalizeHandle("   "), "");
    assert.equal(normalizeHandle("@"), "");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// TAGS
// ═══════════════════════════════════════════════════════════════════════════

describe("buildTags", () => {
  test("orders source, type, person, then topics", () => {
    assert.deepEqual(buildTags(match("claude code and cursor"), "thread", "@JaneDoe", taxonomy), [
      "source/twitter",
      "twitter/thread",
      "person/janedoe",
      "topic/ai-coding",
      "topic/claude-code",
    ]);
  });

  test("unknown content type falls back to the default tag", () => {
    assert.deepEqual(buildTags([], "podcast", "", taxonomy), ["source/twitter", "twitter/tweet"]);
  });

  test("inherited object keys are not content types", () => {
    assert.deepEqual(buildTags([], "constructor", "", taxonomy), ["source/twitter", "twitter/tweet"]);
  });

  test("person tag is added for unknown people too", () => {
    assert.deepEqual(buildTags([], "tweet", "someone_new", taxonomy), [
      "source/twitter",
      "twitter/tweet",
      "person/someone_new",
    ]);
  });

  test("shared topic tags appear once", () => {
    assert.deepEqual(buildTags(match("cursor and vibe coding"), "tweet", "", taxonomy), [
      "source/twitter",
      "twitter/tweet",
      "topic/ai-coding",
    ]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// LINKS
// ═══════════════════════════════════════════════════════════════════════════

describe("buildLinks", () => {
  test("known person comes first", () => {
    assert.deepEqual(buildLinks(match("my notes on cursor"), "@dev_sam", taxonomy), [
      "Sam Dev",
      "Notes",
      "AI Coding",
    ]);
  });

  test("unknown person contributes no link", () => {
    assert.deepEqual(buildLinks(match("notes"), "stranger", taxonomy), ["Notes"]);
  });

  test("shared display names appear once", () => {
    assert.deepEqual(buildLinks(match("cursor, vibe coding"), "", taxonomy), ["AI Coding"]);
  });

  test("no matches and no person gives no links", () => {
    assert.deepEqual(buildLinks([], "", taxonomy), []);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// INDEX TARGET
// ═══════════════════════════════════════════════════════════════════════════

describe("resolveIndexTarget", () => {
  test("first matched topic with a target wins", () => {
    assert.equal(resolveIndexTarget(match("notes on claude code and cursor")), "+Atlas/AI-Coding");
  });

  test("skips matched topics without a target", () => {
    assert.equal(resolveIndexTarget(match("notes about claude code")), "+Atlas/Claude");
  });

  test("no target when none of the matches declares one", () => {
    assert.equal(resolveIndexTarget(match("notes")), undefined);
    assert.equal(resolveIndexTarget([]), undefined);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// ENRICH
// ═══════════════════════════════════════════════════════════════════════════

describe("enrich", () => {
  test("combines matching and all three builders", () => {
    const result = enrich(
      { title: "Claude Code notes", body: "", contentType: "video", author: "janedoe" },
      { registry, taxonomy }
    );
    assert.deepEqual(
      result.matched.map((t) => t.id),
      ["notes", "claude-code"]
    );
    assert.deepEqual(result.tags, [
      "source/twitter",
      "twitter/video",
      "person/janedoe",
      "topic/notes",
      "topic/claude-code",
    ]);
    assert.deepEqual(result.links, ["Jane Doe", "Notes", "Claude Code"]);
    assert.equal(result.indexTarget, "+Atlas/Claude");
  });
});
