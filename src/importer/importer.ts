/**
 * Importer/Merger: applies a Record Model to a destination host database.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * RUN STATES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   loaded → validating → applying:functions → applying:names
 *          → applying:comments → applying:function_comments
 *          → applying:structures → summarized
 *
 *   loaded → failed     (the input text did not decode; nothing is applied)
 *
 * Categories left out of MergeOptions.categories are not entered.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CONFLICT RULES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Auto-generated destination names lose to incoming names; user-assigned
 * destination names and existing comments win unless the conflict policy is
 * "overwrite". Existing structure members are never altered under any
 * policy. Every failure is per entry: it is counted, recorded as an issue,
 * and the run moves on.
 */

import { AddressNormalizer, AddressRangeError } from "../address/normalizer.js";
import { loadMergeOptions } from "../config/merge/loader.js";
import type { MergeOptions } from "../config/merge/schema.js";
import type { RecordCategory, SchemaMode } from "../config/merge/enums.js";
import { decodeDocument } from "../document/codec.js";
import { SchemaError, MalformedDataError } from "../document/errors.js";
import type { Address, RecordModel, StructMember } from "../document/model.js";
import { HostMutationError, type AnalysisSink } from "../host/types.js";
import { generateRunId, getRunId } from "../logging/run-id.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import {
  byteArrayType,
  findDuplicateOffsets,
  planStructureMerge,
} from "./structures.js";
import {
  createSummary,
  countApplied,
  type EntryOutcome,
  type ImportIssue,
  type ImportState,
  type ImportSummary,
} from "./summary.js";

export interface ImportOptions {
  /** Overrides layered over DEFAULT_MERGE_OPTIONS */
  merge?: Partial<MergeOptions>;
  /** Codec mode when the input is JSON text (default: "strict") */
  mode?: SchemaMode;
  logger?: Logger;
  /** Run identifier for the summary (default: the current run ID) */
  runId?: string;
}

type CommentCategory = "comments" | "function_comments";

/**
 * Text already present as a whole line block of an existing comment.
 */
function containsBlock(existing: string, incoming: string): boolean {
  return `\n${existing}\n`.includes(`\n${incoming}\n`);
}

function describeMember(member: StructMember): string {
  return `${member.typeName} ${member.memberName} @${member.offset} (${member.size} bytes)`;
}

class ImportRun {
  readonly summary: ImportSummary;
  private readonly logger: Logger;
  private readonly localFunctions: Set<Address>;
  private normalizer: AddressNormalizer | undefined;

  constructor(
    private readonly db: AnalysisSink,
    private readonly options: Readonly<MergeOptions>,
    logger: Logger,
    runId: string
  ) {
    this.logger = logger.child("importer");
    this.summary = createSummary(runId, db.toolName);
    this.localFunctions = new Set(db.listFunctions());
  }

  transition(state: ImportState): void {
    this.summary.states.push(state);
    this.logger.debug("State transition", { state });
  }

  fail(err: SchemaError | MalformedDataError): never {
    this.transition("failed");
    this.logger.error("Document rejected before merge", { error: err.name, message: err.message });
    throw err;
  }

  run(model: RecordModel): ImportSummary {
    this.transition("validating");
    this.validate(model);

    const enabled = new Set<RecordCategory>(this.options.categories);

    if (enabled.has("functions")) {
      this.transition("applying:functions");
      for (const address of [...model.functions].sort((a, b) => a - b)) {
        this.applyFunction(address);
      }
    }

    if (enabled.has("names")) {
      this.transition("applying:names");
      for (const [address, name] of model.names) {
        this.applyName(address, name);
      }
    }

    if (enabled.has("comments")) {
      this.transition("applying:comments");
      for (const [address, text] of model.comments) {
        this.applyComment("comments", address, text);
      }
    }

    if (enabled.has("function_comments")) {
      this.transition("applying:function_comments");
      for (const [address, text] of model.functionComments) {
        this.applyComment("function_comments", address, text);
      }
    }

    if (enabled.has("structures")) {
      this.transition("applying:structures");
      for (const [id, members] of model.structures) {
        this.applyStructure(id, members);
      }
    }

    this.transition("summarized");
    this.logger.info("Import complete", {
      tool: this.summary.tool,
      applied: countApplied(this.summary),
      issues: this.summary.issues.length,
    });
    return this.summary;
  }

  // ── Validation ─────────────────────────────────────────────────────

  private validate(model: RecordModel): void {
    this.normalizer = new AddressNormalizer(model.baseAddress, model.sections);

    const destinationId = this.db.binaryIdentifier();
    if (
      model.binaryIdentifier !== "" &&
      destinationId !== "" &&
      model.binaryIdentifier !== destinationId
    ) {
      this.issue({
        kind: "BinaryMismatch",
        category: "document",
        key: "binary_identifier",
        message: "document was exported from a different binary",
        existing: destinationId,
        incoming: model.binaryIdentifier,
      });
    }
  }

  // ── Bookkeeping ────────────────────────────────────────────────────

  private count(category: RecordCategory, outcome: EntryOutcome): void {
    this.summary.categories[category][outcome]++;
  }

  private issue(issue: ImportIssue): void {
    this.summary.issues.push(issue);
    this.logger.warn(issue.message, {
      kind: issue.kind,
      category: issue.category,
      key: issue.key,
    });
  }

  private localAddress(category: RecordCategory, canonical: Address): Address | undefined {
    const normalizer = this.normalizer;
    if (!normalizer) {
      throw new Error("import run used before validation");
    }
    try {
      return normalizer.toLocalWithSections(
        canonical,
        this.options.destinationBase ?? this.db.imageBase(),
        (name) => this.db.getSection(name)
      );
    } catch (err) {
      if (err instanceof AddressRangeError) {
        this.count(category, "failed");
        this.issue({ kind: "AddressRangeError", category, key: canonical, message: err.message });
        return undefined;
      }
      throw err;
    }
  }

  /**
   * Run a host mutation; a rejection is recorded against the entry.
   */
  private mutate(
    category: RecordCategory,
    key: Address | string,
    operation: string,
    apply: () => void,
    countFailure = true
  ): boolean {
    try {
      apply();
      return true;
    } catch (err) {
      const wrapped = new HostMutationError(operation, err);
      if (countFailure) this.count(category, "failed");
      this.issue({ kind: "HostMutationError", category, key, message: wrapped.message });
      return false;
    }
  }

  // ── Functions ──────────────────────────────────────────────────────

  private applyFunction(canonical: Address): void {
    const local = this.localAddress("functions", canonical);
    if (local === undefined) return;

    if (this.localFunctions.has(local)) {
      this.count("functions", "already_present");
      return;
    }

    if (this.mutate("functions", canonical, "createFunction", () => this.db.createFunction(local))) {
      this.localFunctions.add(local);
      this.count("functions", "created");
    }
  }

  // ── Names ──────────────────────────────────────────────────────────

  private applyName(canonical: Address, name: string): void {
    const local = this.localAddress("names", canonical);
    if (local === undefined) return;

    const existing = this.db.getName(local);
    const kind = this.localFunctions.has(local) ? "function" : "data";
    const set = () =>
      this.db.setName(local, name, this.options.markImportedNamesAsUser, kind);

    if (existing === undefined) {
      if (this.mutate("names", canonical, "setName", set)) this.count("names", "created");
      return;
    }

    if (existing.name === name) {
      this.count("names", "already_present");
      return;
    }

    if (existing.isUserAssigned && this.options.conflictPolicy !== "overwrite") {
      if (this.options.conflictPolicy === "skip") {
        this.count("names", "skipped");
        return;
      }
      this.count("names", "conflicted");
      this.issue({
        kind: "NameConflict",
        category: "names",
        key: canonical,
        message: "destination holds a different user-assigned name",
        existing: existing.name,
        incoming: name,
      });
      return;
    }

    if (this.mutate("names", canonical, "setName", set)) this.count("names", "overwritten");
  }

  // ── Comments ───────────────────────────────────────────────────────

  private applyComment(category: CommentCategory, canonical: Address, text: string): void {
    const local = this.localAddress(category, canonical);
    if (local === undefined) return;

    const existing =
      category === "comments" ? this.db.getComment(local) : this.db.getFunctionComment(local);
    const operation = category === "comments" ? "setComment" : "setFunctionComment";
    const write = (value: string) => () =>
      category === "comments"
        ? this.db.setComment(local, value)
        : this.db.setFunctionComment(local, value);

    if (existing === undefined) {
      if (this.mutate(category, canonical, operation, write(text))) this.count(category, "created");
      return;
    }

    if (existing === text) {
      this.count(category, "already_present");
      return;
    }

    if (this.options.commentMerge === "append") {
      if (containsBlock(existing, text)) {
        this.count(category, "already_present");
        return;
      }
      if (this.mutate(category, canonical, operation, write(`${existing}\n${text}`))) {
        this.count(category, "appended");
      }
      return;
    }

    switch (this.options.conflictPolicy) {
      case "skip":
        this.count(category, "skipped");
        return;
      case "overwrite":
        if (this.mutate(category, canonical, operation, write(text))) {
          this.count(category, "overwritten");
        }
        return;
      case "report":
        this.count(category, "conflicted");
        this.issue({
          kind: "CommentConflict",
          category,
          key: canonical,
          message: "destination holds a different comment",
          existing,
          incoming: text,
        });
        return;
    }
  }

  // ── Structures ─────────────────────────────────────────────────────

  private resolveMemberTypes(members: readonly StructMember[]): StructMember[] {
    return members.map((member) => {
      if (!this.options.substituteUnknownTypes || this.db.isTypeKnown(member.typeName)) {
        return member;
      }
      this.summary.structureMembers.substituted++;
      this.logger.debug("Substituting opaque member type", {
        type: member.typeName,
        size: member.size,
      });
      return { ...member, typeName: byteArrayType(member.size) };
    });
  }

  private applyStructure(id: string, incoming: readonly StructMember[]): void {
    const duplicates = findDuplicateOffsets(incoming);
    if (duplicates.length > 0) {
      this.count("structures", "conflicted");
      this.issue({
        kind: "StructConflict",
        category: "structures",
        key: id,
        message: `structure repeats member offset(s) ${duplicates.join(", ")}; not applied`,
      });
      return;
    }

    const members = this.resolveMemberTypes(incoming);
    const existing = this.db.getStructure(id);

    if (existing === undefined) {
      if (this.mutate("structures", id, "createStructure", () => this.db.createStructure(id, members))) {
        this.count("structures", "created");
        this.summary.structureMembers.appended += members.length;
      }
      return;
    }

    const plan = planStructureMerge(existing, members);
    this.summary.structureMembers.matched += plan.matched.length;

    for (const conflict of plan.conflicts) {
      this.summary.structureMembers.conflicted++;
      if (this.options.conflictPolicy === "skip") continue;
      this.issue({
        kind: "StructConflict",
        category: "structures",
        key: `${id}+${conflict.incoming.offset}`,
        message: "member collides with a differing destination member; skipped",
        existing: describeMember(conflict.existing),
        incoming: describeMember(conflict.incoming),
      });
    }

    let appended = 0;
    let failed = false;
    for (const member of plan.toAppend) {
      const ok = this.mutate(
        "structures",
        `${id}+${member.offset}`,
        "appendMember",
        () => this.db.appendMember(id, member),
        false
      );
      if (ok) {
        appended++;
      } else {
        failed = true;
      }
    }
    this.summary.structureMembers.appended += appended;

    if (failed) {
      this.count("structures", "failed");
    } else if (appended > 0) {
      this.count("structures", "appended");
    } else if (plan.conflicts.length > 0) {
      this.count("structures", this.options.conflictPolicy === "skip" ? "skipped" : "conflicted");
    } else {
      this.count("structures", "already_present");
    }
  }
}

/**
 * Apply an interchange document to a destination database.
 *
 * @param input - Encoded document text, or an already-decoded model
 * @returns Per-category outcome counts and per-entry issues
 * @throws SchemaError or MalformedDataError when text input does not decode;
 *         the destination is not touched in that case
 * @throws MergeOptionsError when the merge overrides are invalid
 */
export function importDocument(
  input: string | RecordModel,
  destination: AnalysisSink,
  options: ImportOptions = {}
): ImportSummary {
  const mergeOptions = loadMergeOptions(options.merge ?? {});
  const runId = options.runId ?? getRunId() ?? generateRunId();
  const run = new ImportRun(destination, mergeOptions, options.logger ?? silentLogger, runId);

  run.transition("loaded");

  let model: RecordModel;
  if (typeof input === "string") {
    try {
      model = decodeDocument(input, { mode: options.mode });
    } catch (err) {
      if (err instanceof SchemaError || err instanceof MalformedDataError) {
        run.fail(err);
      }
      throw err;
    }
  } else {
    model = input;
  }

  return run.run(model);
}
