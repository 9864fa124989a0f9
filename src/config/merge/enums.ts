/**
 * Policy enumerations shared by the codec, the importer and the CLI.
 */

import { z } from "zod";

/**
 * What the importer does when the destination already holds differing
 * analyst data at the same key.
 *
 * - report: leave the destination alone and record a conflict issue
 * - skip: leave the destination alone and count the entry as skipped
 * - overwrite: replace the destination value (structures are still never
 *   resized or retyped)
 */
export const ConflictPolicy = z.enum(["report", "skip", "overwrite"]);
export type ConflictPolicy = z.infer<typeof ConflictPolicy>;

/**
 * How differing comments are reconciled.
 *
 * - report: treat a differing comment as a conflict (subject to ConflictPolicy)
 * - append: add the incoming text on a new line unless already contained
 */
export const CommentMerge = z.enum(["report", "append"]);
export type CommentMerge = z.infer<typeof CommentMerge>;

/**
 * How the codec treats top-level keys it does not recognize.
 *
 * - strict: unknown keys are a schema error
 * - lenient: unknown keys are kept verbatim and written back on encode
 */
export const SchemaMode = z.enum(["strict", "lenient"]);
export type SchemaMode = z.infer<typeof SchemaMode>;

/**
 * The record categories, in the order the importer applies them.
 */
export const RecordCategory = z.enum([
  "functions",
  "names",
  "comments",
  "function_comments",
  "structures",
]);
export type RecordCategory = z.infer<typeof RecordCategory>;
