/**
 * Locations of the data files bundled with the package.
 */

import { fileURLToPath } from "node:url";

export const DEFAULT_TAXONOMY_PATH = fileURLToPath(
  new URL("../../config/taxonomy.json", import.meta.url)
);

export const DEFAULT_SHAPE_RULES_PATH = fileURLToPath(
  new URL("../../config/shape-rules.json", import.meta.url)
);

export const DEFAULT_PROMPTS_DIR = fileURLToPath(new URL("../../prompts/", import.meta.url));

export const DEFAULT_TOPICS_PATH = fileURLToPath(
  new URL("../../config/topics.json", import.meta.url)
);
