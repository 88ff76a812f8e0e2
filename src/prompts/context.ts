/**
 * Prompt context: the values a template can reference.
 *
 * Every variable is a flat snake_case name. Three are always filled
 * (`tweet_text`, `author`, `likes`); the three content slots are filled
 * with a labeled block when a fragment is supplied and with "" otherwise,
 * so a template can place them unconditionally:
 *
 *   Tweet: {{tweet_text}}
 *   {{link_content}}
 *
 * renders either the bare tweet or
 *
 *   Tweet: …
 *
 *   ---
 *   Linked Content:
 *   <fragment>
 *   ---
 */

export const PROMPT_VARIABLES = [
  "tweet_text",
  "author",
  "likes",
  "link_content",
  "image_analysis",
  "video_analysis",
] as const;

export type PromptVariable = (typeof PROMPT_VARIABLES)[number];

/**
 * Values keyed by variable name. A partial context is legal to build but
 * fails to render any template that references a missing variable.
 */
export type PromptContext = Readonly<Partial<Record<PromptVariable, string>>>;

export const DEFAULT_AUTHOR = "unknown";

/**
 * Bookmark data a prompt is built from.
 */
export interface PromptInput {
  text: string;
  author?: string;
  likes?: number;
  hasVideo?: boolean;
  hasImage?: boolean;
  hasLink?: boolean;
  /** Pre-fetched article text. */
  linkContent?: string;
  /** Vision model output for attached images. */
  imageAnalysis?: string;
  /** Video analysis output. */
  videoAnalysis?: string;
}

/**
 * Wrap a fragment in a labeled delimiter block, or return "" when there is
 * nothing to wrap.
 */
export function wrapFragment(label: string, fragment: string | undefined): string {
  if (!fragment) return "";
  return `\n---\n${label}:\n${fragment}\n---`;
}

/**
 * Build a complete context. Every variable is present.
 */
export function buildPromptContext(input: PromptInput): Required<PromptContext> {
  return {
    tweet_text: input.text,
    author: input.author ?? DEFAULT_AUTHOR,
    likes: String(input.likes ?? 0),
    link_content: wrapFragment("Linked Content", input.linkContent),
    image_analysis: wrapFragment("Image Content", input.imageAnalysis),
    video_analysis: wrapFragment("Video Content", input.videoAnalysis),
  };
}
