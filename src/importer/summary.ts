/**
 * Import run summary.
 *
 * Every entry an import run touches ends in exactly one outcome, counted
 * per category. Entries that were not applied as-is also leave an issue
 * describing why. The summary is what the CLI prints and what callers can
 * persist to resume or audit a run.
 */

import type { RecordCategory } from "../config/merge/enums.js";
import type { Address } from "../document/model.js";

export type ImportState =
  | "loaded"
  | "validating"
  | `applying:${RecordCategory}`
  | "summarized"
  | "failed";

export type EntryOutcome =
  | "created"
  | "overwritten"
  | "appended"
  | "already_present"
  | "skipped"
  | "conflicted"
  | "failed";

export const ENTRY_OUTCOMES: readonly EntryOutcome[] = [
  "created",
  "overwritten",
  "appended",
  "already_present",
  "skipped",
  "conflicted",
  "failed",
];

export type OutcomeCounts = Record<EntryOutcome, number>;

export type IssueKind =
  | "NameConflict"
  | "CommentConflict"
  | "StructConflict"
  | "AddressRangeError"
  | "HostMutationError"
  | "BinaryMismatch";

export interface ImportIssue {
  kind: IssueKind;
  category: RecordCategory | "document";
  /** Canonical address, or structure id (with member offset where relevant) */
  key: Address | string;
  message: string;
  /** Value held by the destination, where one was involved */
  existing?: string;
  /** Value the document carried */
  incoming?: string;
}

export interface MemberCounts {
  matched: number;
  appended: number;
  conflicted: number;
  /** Members written as uint8_t[size] because the destination lacks the type */
  substituted: number;
}

export interface ImportSummary {
  runId: string;
  tool: string;
  states: ImportState[];
  categories: Record<RecordCategory, OutcomeCounts>;
  structureMembers: MemberCounts;
  issues: ImportIssue[];
}

function emptyCounts(): OutcomeCounts {
  return {
    created: 0,
    overwritten: 0,
    appended: 0,
    already_present: 0,
    skipped: 0,
    conflicted: 0,
    failed: 0,
  };
}

export function createSummary(runId: string, tool: string): ImportSummary {
  return {
    runId,
    tool,
    states: [],
    categories: {
      functions: emptyCounts(),
      names: emptyCounts(),
      comments: emptyCounts(),
      function_comments: emptyCounts(),
      structures: emptyCounts(),
    },
    structureMembers: { matched: 0, appended: 0, conflicted: 0, substituted: 0 },
    issues: [],
  };
}

/**
 * Total entries applied (created, overwritten or appended) across categories.
 */
export function countApplied(summary: ImportSummary): number {
  let total = 0;
  for (const counts of Object.values(summary.categories)) {
    total += counts.created + counts.overwritten + counts.appended;
  }
  return total;
}

function formatKey(key: Address | string): string {
  return typeof key === "number" ? `0x${key.toString(16)}` : key;
}

/**
 * Render a summary for terminal output.
 */
export function formatImportSummary(summary: ImportSummary): string {
  const lines: string[] = [
    "=== Import Summary ===",
    `Run ID: ${summary.runId}`,
    `Destination: ${summary.tool}`,
    `States: ${summary.states.join(" → ")}`,
    "",
    "--- Counts ---",
  ];

  for (const [category, counts] of Object.entries(summary.categories)) {
    const cells = ENTRY_OUTCOMES.map((outcome) => `${outcome}=${counts[outcome]}`);
    lines.push(`${category.padEnd(18)}${cells.join(" ")}`);
  }

  const members = summary.structureMembers;
  lines.push(
    `${"members".padEnd(18)}matched=${members.matched} appended=${members.appended} ` +
      `conflicted=${members.conflicted} substituted=${members.substituted}`
  );

  if (summary.issues.length > 0) {
    lines.push("");
    lines.push(`--- Issues (${summary.issues.length}) ---`);
    for (const issue of summary.issues) {
      lines.push(`  [${issue.kind}] ${issue.category} ${formatKey(issue.key)}: ${issue.message}`);
    }
  }

  return lines.join("\n");
}
