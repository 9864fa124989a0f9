/**
 * Importer/Merger module.
 */

export { importDocument, type ImportOptions } from "./importer.js";

export {
  byteArrayType,
  findDuplicateOffsets,
  planStructureMerge,
  type MemberConflict,
  type StructureMergePlan,
} from "./structures.js";

export {
  ENTRY_OUTCOMES,
  countApplied,
  createSummary,
  formatImportSummary,
  type EntryOutcome,
  type ImportIssue,
  type ImportState,
  type ImportSummary,
  type IssueKind,
  type MemberCounts,
  type OutcomeCounts,
} from "./summary.js";
