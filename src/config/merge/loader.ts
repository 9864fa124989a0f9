/**
 * Merge options loader and validator.
 *
 * Responsible for:
 * - Layering caller overrides on top of the defaults
 * - Validating against the schema with fail-fast behavior
 * - Freezing the result so a run cannot change policy midway
 */

import type { ZodIssue } from "zod";
import { MergeOptionsSchema, type MergeOptions } from "./schema.js";
import { DEFAULT_MERGE_OPTIONS } from "./defaults.js";

/**
 * Structured validation error for merge options.
 */
export class MergeOptionsError extends Error {
  public readonly issues: OptionsValidationIssue[];

  constructor(message: string, issues: OptionsValidationIssue[]) {
    super(message);
    this.name = "MergeOptionsError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Merge options validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface OptionsValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): OptionsValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and load merge options.
 *
 * @param overrides - Partial options layered over DEFAULT_MERGE_OPTIONS.
 *   A key set to undefined keeps its default.
 * @returns Validated and frozen options
 * @throws MergeOptionsError if validation fails
 */
export function loadMergeOptions(overrides: unknown = {}): Readonly<MergeOptions> {
  const input =
    typeof overrides === "object" && overrides !== null && !Array.isArray(overrides)
      ? {
          ...DEFAULT_MERGE_OPTIONS,
          ...Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined)),
        }
      : overrides;

  const result = MergeOptionsSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new MergeOptionsError(
      `Invalid merge options: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}
