/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvEnum,
} from "./env.js";
import { ConflictPolicy, CommentMerge, SchemaMode } from "./merge/enums.js";

export { ConfigError } from "./env.js";

// Re-export merge configuration module
export * from "./merge/index.js";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: (typeof LOG_LEVELS)[number];
  /** Append log lines to a file under logDir */
  readonly logToFile: boolean;
  /** Directory for log files */
  readonly logDir: string;
  /** Codec behavior for unknown top-level keys */
  readonly schemaMode: SchemaMode;
  /** Default conflict policy for imports */
  readonly conflictPolicy: ConflictPolicy;
  /** Default comment reconciliation for imports */
  readonly commentMerge: CommentMerge;
}

/**
 * Load configuration from the environment.
 * Enumerated values fail fast with ConfigError when unrecognized.
 */
function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnvEnum("LOG_LEVEL", LOG_LEVELS, "info"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    schemaMode: optionalEnvEnum("SYMBRIDGE_SCHEMA_MODE", SchemaMode.options, "strict"),
    conflictPolicy: optionalEnvEnum(
      "SYMBRIDGE_CONFLICT_POLICY",
      ConflictPolicy.options,
      "report"
    ),
    commentMerge: optionalEnvEnum("SYMBRIDGE_COMMENT_MERGE", CommentMerge.options, "report"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration that cannot be checked per variable.
 * Call this at application startup to fail fast.
 */
export function validateConfig(): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }
}
