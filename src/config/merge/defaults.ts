/**
 * Default merge options.
 *
 * The defaults never destroy destination work: conflicts are reported,
 * differing comments are reported rather than concatenated.
 */

import type { MergeOptions } from "./schema.js";

export const DEFAULT_MERGE_OPTIONS: MergeOptions = {
  conflictPolicy: "report",
  commentMerge: "report",
  markImportedNamesAsUser: true,
  substituteUnknownTypes: true,
  categories: ["functions", "names", "comments", "function_comments", "structures"],
};
