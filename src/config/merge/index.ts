/**
 * Merge configuration module.
 *
 * Usage:
 *   import { loadMergeOptions } from "./config/merge/index.js";
 *
 *   // Defaults: report conflicts, never concatenate comments
 *   const options = loadMergeOptions();
 *
 *   // Opt in to comment concatenation
 *   const appending = loadMergeOptions({ commentMerge: "append" });
 */

export {
  ConflictPolicy,
  CommentMerge,
  SchemaMode,
  RecordCategory,
} from "./enums.js";

export { MergeOptionsSchema, type MergeOptions } from "./schema.js";

export {
  loadMergeOptions,
  MergeOptionsError,
  type OptionsValidationIssue,
} from "./loader.js";

export { DEFAULT_MERGE_OPTIONS } from "./defaults.js";
