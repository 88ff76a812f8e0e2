/**
 * Taxonomy configuration module.
 *
 * Usage:
 *   import { loadTaxonomyConfigFile } from "./config/taxonomy/index.js";
 *
 *   const taxonomy = loadTaxonomyConfigFile("config/taxonomy.json");
 */

export {
  TaxonomyConfigSchema,
  TagSchema,
  HandleSchema,
  type TaxonomyConfig,
} from "./schema.js";

export {
  loadTaxonomyConfig,
  loadTaxonomyConfigFile,
  TaxonomyConfigError,
} from "./loader.js";
