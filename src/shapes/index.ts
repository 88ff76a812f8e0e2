/**
 * Content shapes: rule table, loader and classifier.
 */

export {
  CONTENT_SHAPES,
  ContentShapeSchema,
  ShapeRuleSchema,
  ShapeRulesSchema,
  type ContentShape,
  type CompiledShapeRule,
  type ShapeRules,
  type ShapeRulesDefinition,
} from "./schema.js";

export { ShapeRulesError, compileShapeRules, loadShapeRules, loadShapeRulesFile } from "./loader.js";

export { classifyShape, describeShape, type ShapeInput } from "./classifier.js";
