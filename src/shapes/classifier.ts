/**
 * Content-shape classifier.
 *
 * Priority:
 *   1. video attached           -> video_content (text is not inspected)
 *   2. first text rule that hits, in table order
 *   3. image + short text       -> screenshot_info
 *   4. link attached            -> article_link
 *   5.                          -> unknown
 *
 * Total: every input yields a shape.
 */

import type { ContentShape, ShapeRules } from "./schema.js";

export interface ShapeInput {
  text: string;
  hasVideo?: boolean;
  hasImage?: boolean;
  hasLink?: boolean;
}

/** Length in code points, so emoji count once. */
function textLength(text: string): number {
  return [...text].length;
}

export function classifyShape(input: ShapeInput, rules: ShapeRules): ContentShape {
  const { text, hasVideo = false, hasImage = false, hasLink = false } = input;

  if (hasVideo) {
    return "video_content";
  }

  const lowered = text.toLowerCase();
  for (const rule of rules.rules) {
    if (rule.patterns.some((pattern) => pattern.test(lowered))) {
      return rule.shape;
    }
  }

  if (hasImage && textLength(text) < rules.screenshotMaxLength) {
    return "screenshot_info";
  }

  if (hasLink) {
    return "article_link";
  }

  return "unknown";
}

export function describeShape(shape: ContentShape): string {
  switch (shape) {
    case "article_link":
      return "Tweet links to an article or blog post";
    case "top_list":
      return "Tweet contains or links to a list/ranking";
    case "tutorial_guide":
      return "Tweet contains a how-to or guide";
    case "tool_announcement":
      return "Tweet announces a tool or library";
    case "code_snippet":
      return "Tweet contains code or prompts";
    case "opinion_take":
      return "Tweet expresses an opinion";
    case "news_update":
      return "Tweet contains news";
    case "thread_content":
      return "Tweet is part of a thread";
    case "video_content":
      return "Tweet contains a video";
    case "screenshot_info":
      return "Tweet contains screenshot with info";
    case "meme_humor":
      return "Tweet is humorous/meme content";
    case "unknown":
      return "Content type not detected";
  }
}
