/**
 * symbridge: tool-neutral interchange of binary-analysis metadata.
 *
 * Export a host database to a canonical JSON document, carry it to another
 * tool, and merge it back in without clobbering what an analyst already
 * recorded there.
 */

export * from "./document/index.js";
export * from "./address/index.js";
export * from "./host/index.js";
export * from "./exporter/index.js";
export * from "./importer/index.js";
export {
  config,
  validateConfig,
  ConfigError,
  ConflictPolicy,
  CommentMerge,
  SchemaMode,
  RecordCategory,
  DEFAULT_MERGE_OPTIONS,
  MergeOptionsSchema,
  MergeOptionsError,
  loadMergeOptions,
  type AppConfig,
  type MergeOptions,
} from "./config/index.js";
export { createLogger, silentLogger, initRunId, getRunId, type Logger } from "./logging/index.js";
