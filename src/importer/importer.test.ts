/**
 * Tests for the importer/merger.
 *
 * Run: node --import tsx src/importer/importer.test.ts
 *
 * Tests cover:
 *   1. Fresh imports and idempotence
 *   2. Decode failures leave the destination untouched
 *   3. Name and comment conflict policies
 *   4. Address translation, sections included
 *   5. Structure merging and type substitution
 *   6. Host rejections and summaries
 */

import { strict as assert } from "node:assert";

import { importDocument } from "./importer.js";
import { formatImportSummary, countApplied } from "./summary.js";
import { MemoryDatabase, type MemoryDatabaseOptions, type MemoryDatabaseState } from "../host/memory.js";
import { encodeDocument } from "../document/codec.js";
import { createRecordModel, type RecordModel, type RecordModelInit } from "../document/model.js";
import { SchemaError, MalformedDataError } from "../document/errors.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function documentModel(overrides: Partial<RecordModelInit> = {}): RecordModel {
  return createRecordModel({
    binaryIdentifier: "test-binary",
    baseAddress: 0x400000,
    functions: [0x401000],
    names: [
      [0x401000, "main"],
      [0x403000, "g_counter"],
    ],
    comments: [[0x401004, "check argc"]],
    functionComments: [[0x401000, "entry point"]],
    structures: [
      [
        "Point",
        [
          { offset: 0, size: 4, typeName: "int", memberName: "x" },
          { offset: 4, size: 4, typeName: "int", memberName: "y" },
        ],
      ],
    ],
    ...overrides,
  });
}

function destination(
  options: MemoryDatabaseOptions = {},
  state: MemoryDatabaseState = {}
): MemoryDatabase {
  return new MemoryDatabase(
    { toolName: "dest-tool", imageBase: 0x400000, binaryIdentifier: "test-binary", ...options },
    state
  );
}

const RUN_ID = "test-run";

// ═══════════════════════════════════════════════════════════════════════════
// FRESH IMPORT
// ═══════════════════════════════════════════════════════════════════════════

section("Fresh Import");

test("everything is created in an empty destination", () => {
  const db = destination();
  const summary = importDocument(encodeDocument(documentModel()), db, { runId: RUN_ID });

  assert.equal(summary.categories.functions.created, 1);
  assert.equal(summary.categories.names.created, 2);
  assert.equal(summary.categories.comments.created, 1);
  assert.equal(summary.categories.function_comments.created, 1);
  assert.equal(summary.categories.structures.created, 1);
  assert.equal(summary.structureMembers.appended, 2);
  assert.equal(summary.issues.length, 0);
  assert.equal(countApplied(summary), 6);

  assert.ok(db.hasFunction(0x401000));
  assert.deepEqual(db.getName(0x401000), { name: "main", isUserAssigned: true, kind: "function" });
  assert.deepEqual(db.getName(0x403000), { name: "g_counter", isUserAssigned: true, kind: "data" });
  assert.equal(db.getComment(0x401004), "check argc");
  assert.equal(db.getFunctionComment(0x401000), "entry point");
  assert.equal(db.getStructure("Point")?.length, 2);
});

test("states follow the run order", () => {
  const summary = importDocument(documentModel(), destination(), { runId: RUN_ID });
  assert.deepEqual(summary.states, [
    "loaded",
    "validating",
    "applying:functions",
    "applying:names",
    "applying:comments",
    "applying:function_comments",
    "applying:structures",
    "summarized",
  ]);
  assert.equal(summary.runId, RUN_ID);
  assert.equal(summary.tool, "dest-tool");
});

test("a second import of the same document changes nothing", () => {
  const db = destination();
  const text = encodeDocument(documentModel());
  importDocument(text, db, { runId: RUN_ID });
  const mutationsAfterFirst = db.mutations.length;

  const second = importDocument(text, db, { runId: RUN_ID });
  assert.equal(db.mutations.length, mutationsAfterFirst);
  assert.equal(countApplied(second), 0);
  assert.equal(second.categories.functions.already_present, 1);
  assert.equal(second.categories.names.already_present, 2);
  assert.equal(second.categories.comments.already_present, 1);
  assert.equal(second.categories.function_comments.already_present, 1);
  assert.equal(second.categories.structures.already_present, 1);
  assert.equal(second.structureMembers.matched, 2);
  assert.equal(second.issues.length, 0);
});

test("imported names can be left unprotected", () => {
  const db = destination();
  importDocument(documentModel(), db, { merge: { markImportedNamesAsUser: false } });
  assert.equal(db.getName(0x401000)?.isUserAssigned, false);
});

test("only the selected categories are applied", () => {
  const db = destination();
  const summary = importDocument(documentModel(), db, { merge: { categories: ["names"] } });
  assert.deepEqual(summary.states, ["loaded", "validating", "applying:names", "summarized"]);
  assert.ok(!db.hasFunction(0x401000));
  assert.deepEqual(db.getName(0x401000), { name: "main", isUserAssigned: true, kind: "data" });
  assert.equal(db.getComment(0x401004), undefined);
});

// ═══════════════════════════════════════════════════════════════════════════
// DECODE FAILURES
// ═══════════════════════════════════════════════════════════════════════════

section("Decode Failures");

test("missing schema_version aborts with zero mutations", () => {
  const db = destination();
  const wire: unknown = JSON.parse(encodeDocument(documentModel()));
  assert.ok(wire !== null && typeof wire === "object");
  const text = JSON.stringify({ ...wire, schema_version: undefined });

  assert.throws(() => importDocument(text, db), SchemaError);
  assert.equal(db.mutations.length, 0);
});

test("a malformed entry aborts before anything is applied", () => {
  const db = destination();
  const text = encodeDocument(documentModel()).replace('"check argc"', "12");
  assert.throws(() => importDocument(text, db), MalformedDataError);
  assert.equal(db.mutations.length, 0);
  assert.ok(!db.hasFunction(0x401000));
});

test("unknown keys pass in lenient mode only", () => {
  const wire: unknown = JSON.parse(encodeDocument(documentModel()));
  assert.ok(wire !== null && typeof wire === "object");
  const text = JSON.stringify({ ...wire, exporter_notes: "x" });

  assert.throws(() => importDocument(text, destination()), SchemaError);
  const summary = importDocument(text, destination(), { mode: "lenient" });
  assert.equal(summary.categories.names.created, 2);
});

// ═══════════════════════════════════════════════════════════════════════════
// NAMES
// ═══════════════════════════════════════════════════════════════════════════

section("Names");

function namedDestination(isUserAssigned: boolean): MemoryDatabase {
  return destination(
    {},
    { names: [[0x401000, { name: "analyst_main", isUserAssigned, kind: "function" }]] }
  );
}

const nameOnly = () =>
  createRecordModel({ binaryIdentifier: "", baseAddress: 0x400000, names: [[0x401000, "main"]] });

test("an auto-generated name is overwritten", () => {
  const db = namedDestination(false);
  const summary = importDocument(nameOnly(), db);
  assert.equal(summary.categories.names.overwritten, 1);
  assert.equal(db.getName(0x401000)?.name, "main");
  assert.equal(summary.issues.length, 0);
});

test("a user name is kept and reported by default", () => {
  const db = namedDestination(true);
  const summary = importDocument(nameOnly(), db);
  assert.equal(summary.categories.names.conflicted, 1);
  assert.equal(db.getName(0x401000)?.name, "analyst_main");
  assert.deepEqual(summary.issues, [
    {
      kind: "NameConflict",
      category: "names",
      key: 0x401000,
      message: "destination holds a different user-assigned name",
      existing: "analyst_main",
      incoming: "main",
    },
  ]);
});

test("a user name is kept silently under skip", () => {
  const db = namedDestination(true);
  const summary = importDocument(nameOnly(), db, { merge: { conflictPolicy: "skip" } });
  assert.equal(summary.categories.names.skipped, 1);
  assert.equal(summary.issues.length, 0);
  assert.equal(db.getName(0x401000)?.name, "analyst_main");
});

test("an undefined policy falls back to report", () => {
  const db = namedDestination(true);
  const summary = importDocument(nameOnly(), db, { merge: { conflictPolicy: undefined } });
  assert.equal(summary.categories.names.conflicted, 1);
  assert.equal(db.getName(0x401000)?.name, "analyst_main");
});

test("a user name is replaced under overwrite", () => {
  const db = namedDestination(true);
  const summary = importDocument(nameOnly(), db, { merge: { conflictPolicy: "overwrite" } });
  assert.equal(summary.categories.names.overwritten, 1);
  assert.equal(db.getName(0x401000)?.name, "main");
});

// ═══════════════════════════════════════════════════════════════════════════
// COMMENTS
// ═══════════════════════════════════════════════════════════════════════════

section("Comments");

function commentedDestination(): MemoryDatabase {
  return destination({}, { comments: [[0x401004, "analyst note"]] });
}

const commentOnly = (text: string) =>
  createRecordModel({ binaryIdentifier: "", baseAddress: 0x400000, comments: [[0x401004, text]] });

test("a differing comment is a conflict by default", () => {
  const db = commentedDestination();
  const summary = importDocument(commentOnly("imported note"), db);
  assert.equal(summary.categories.comments.conflicted, 1);
  assert.equal(summary.issues[0].kind, "CommentConflict");
  assert.equal(summary.issues[0].existing, "analyst note");
  assert.equal(db.getComment(0x401004), "analyst note");
});

test("append adds the incoming text on a new line", () => {
  const db = commentedDestination();
  const summary = importDocument(commentOnly("imported note"), db, {
    merge: { commentMerge: "append" },
  });
  assert.equal(summary.categories.comments.appended, 1);
  assert.equal(db.getComment(0x401004), "analyst note\nimported note");
});

test("append does not repeat text already present", () => {
  const db = commentedDestination();
  importDocument(commentOnly("imported note"), db, { merge: { commentMerge: "append" } });
  const again = importDocument(commentOnly("imported note"), db, {
    merge: { commentMerge: "append" },
  });
  assert.equal(again.categories.comments.already_present, 1);
  assert.equal(db.getComment(0x401004), "analyst note\nimported note");
});

test("append does not match a partial line", () => {
  const db = commentedDestination();
  importDocument(commentOnly("analyst"), db, { merge: { commentMerge: "append" } });
  assert.equal(db.getComment(0x401004), "analyst note\nanalyst");
});

test("overwrite replaces a differing comment", () => {
  const db = commentedDestination();
  const summary = importDocument(commentOnly("imported note"), db, {
    merge: { conflictPolicy: "overwrite" },
  });
  assert.equal(summary.categories.comments.overwritten, 1);
  assert.equal(db.getComment(0x401004), "imported note");
});

test("skip leaves a differing comment alone", () => {
  const db = commentedDestination();
  const summary = importDocument(commentOnly("imported note"), db, {
    merge: { conflictPolicy: "skip" },
  });
  assert.equal(summary.categories.comments.skipped, 1);
  assert.equal(summary.issues.length, 0);
});

// ═══════════════════════════════════════════════════════════════════════════
// ADDRESSES
// ═══════════════════════════════════════════════════════════════════════════

section("Addresses");

test("addresses move to the destination's image base", () => {
  const db = destination({ imageBase: 0x10000000 });
  importDocument(documentModel(), db);
  assert.ok(db.hasFunction(0x10001000));
  assert.equal(db.getName(0x10003000)?.name, "g_counter");
});

test("destinationBase overrides the destination's image base", () => {
  const db = destination({ imageBase: 0x10000000 });
  importDocument(documentModel(), db, { merge: { destinationBase: 0 } });
  assert.ok(db.hasFunction(0x1000));
});

test("addresses inside a shared section follow that section", () => {
  const db = destination(
    { imageBase: 0x10000000 },
    { sections: [[".data", { start: 0x10005000, end: 0x10006000 }]] }
  );
  const model = createRecordModel({
    binaryIdentifier: "",
    baseAddress: 0x400000,
    sections: [[".data", { start: 0x403000, end: 0x404000 }]],
    names: [
      [0x403010, "g_in_data"],
      [0x401000, "main"],
    ],
  });
  importDocument(model, db);
  assert.equal(db.getName(0x10005010)?.name, "g_in_data");
  assert.equal(db.getName(0x10001000)?.name, "main");
});

test("an address with no local equivalent fails alone", () => {
  const db = destination({ imageBase: 0 });
  const model = createRecordModel({
    binaryIdentifier: "",
    baseAddress: 0x400000,
    functions: [0x1000, 0x401000],
  });
  const summary = importDocument(model, db);
  assert.equal(summary.categories.functions.failed, 1);
  assert.equal(summary.categories.functions.created, 1);
  assert.equal(summary.issues[0].kind, "AddressRangeError");
  assert.equal(summary.issues[0].key, 0x1000);
  assert.ok(db.hasFunction(0x1000));
});

test("a different binary is reported but not refused", () => {
  const db = destination({ binaryIdentifier: "other-binary" });
  const summary = importDocument(documentModel(), db);
  assert.equal(summary.issues[0].kind, "BinaryMismatch");
  assert.equal(summary.issues[0].category, "document");
  assert.equal(summary.issues[0].incoming, "test-binary");
  assert.equal(summary.categories.names.created, 2);
});

// ═══════════════════════════════════════════════════════════════════════════
// STRUCTURES
// ═══════════════════════════════════════════════════════════════════════════

section("Structures");

function structureOnly(members: RecordModelInit["structures"]): RecordModel {
  return createRecordModel({ binaryIdentifier: "", baseAddress: 0, structures: members });
}

test("new members are appended to an existing structure", () => {
  const db = destination(
    {},
    { structures: [["Point", [{ offset: 0, size: 4, typeName: "int", memberName: "x" }]]] }
  );
  const summary = importDocument(documentModel(), db);
  assert.equal(summary.categories.structures.appended, 1);
  assert.equal(summary.structureMembers.matched, 1);
  assert.equal(summary.structureMembers.appended, 1);
  assert.deepEqual(
    db.getStructure("Point")?.map((member) => member.memberName),
    ["x", "y"]
  );
});

test("a differing member is a conflict and is never altered", () => {
  const db = destination(
    {},
    { structures: [["Point", [{ offset: 0, size: 8, typeName: "double", memberName: "x" }]]] }
  );
  const summary = importDocument(
    structureOnly([["Point", [{ offset: 0, size: 4, typeName: "int", memberName: "x" }]]]),
    db,
    { merge: { conflictPolicy: "overwrite" } }
  );
  assert.equal(summary.categories.structures.conflicted, 1);
  assert.equal(summary.structureMembers.conflicted, 1);
  assert.deepEqual(summary.issues, [
    {
      kind: "StructConflict",
      category: "structures",
      key: "Point+0",
      message: "member collides with a differing destination member; skipped",
      existing: "double x @0 (8 bytes)",
      incoming: "int x @0 (4 bytes)",
    },
  ]);
  assert.deepEqual(db.getStructure("Point"), [
    { offset: 0, size: 8, typeName: "double", memberName: "x" },
  ]);
});

test("an overlapping member is skipped under skip", () => {
  const db = destination(
    {},
    { structures: [["Pair", [{ offset: 0, size: 8, typeName: "double", memberName: "d" }]]] }
  );
  const summary = importDocument(
    structureOnly([["Pair", [{ offset: 4, size: 4, typeName: "int", memberName: "y" }]]]),
    db,
    { merge: { conflictPolicy: "skip" } }
  );
  assert.equal(summary.categories.structures.skipped, 1);
  assert.equal(summary.issues.length, 0);
  assert.equal(db.getStructure("Pair")?.length, 1);
});

test("a structure repeating an offset is rejected whole", () => {
  const db = destination();
  const summary = importDocument(
    structureOnly([
      [
        "Dup",
        [
          { offset: 4, size: 4, typeName: "int", memberName: "a" },
          { offset: 4, size: 4, typeName: "int", memberName: "b" },
        ],
      ],
    ]),
    db
  );
  assert.equal(summary.categories.structures.conflicted, 1);
  assert.equal(summary.issues[0].message, "structure repeats member offset(s) 4; not applied");
  assert.equal(db.getStructure("Dup"), undefined);
});

test("unknown member types become byte arrays", () => {
  const db = destination({ knownTypes: ["int"] });
  const summary = importDocument(
    structureOnly([
      [
        "Blob",
        [
          { offset: 0, size: 4, typeName: "int", memberName: "a" },
          { offset: 4, size: 8, typeName: "ForeignType", memberName: "b" },
        ],
      ],
    ]),
    db
  );
  assert.equal(summary.categories.structures.created, 1);
  assert.equal(summary.structureMembers.substituted, 1);
  assert.deepEqual(db.getStructure("Blob")?.[1], {
    offset: 4,
    size: 8,
    typeName: "uint8_t[8]",
    memberName: "b",
  });
});

test("without substitution the host rejects the structure", () => {
  const db = destination({ knownTypes: ["int"] });
  const summary = importDocument(
    structureOnly([["Blob", [{ offset: 0, size: 8, typeName: "ForeignType", memberName: "b" }]]]),
    db,
    { merge: { substituteUnknownTypes: false } }
  );
  assert.equal(summary.categories.structures.failed, 1);
  assert.equal(summary.issues[0].kind, "HostMutationError");
  assert.equal(
    summary.issues[0].message,
    'createStructure rejected by host: unknown type "ForeignType" in structure "Blob"'
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// HOST REJECTIONS AND SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

section("Host Rejections and Summary");

test("a rejected name fails alone and the run continues", () => {
  const db = destination({ reservedPrefixes: ["sub_"] });
  const model = createRecordModel({
    binaryIdentifier: "",
    baseAddress: 0x400000,
    names: [
      [0x401000, "sub_401000"],
      [0x402000, "g_ok"],
    ],
  });
  const summary = importDocument(model, db);
  assert.equal(summary.categories.names.failed, 1);
  assert.equal(summary.categories.names.created, 1);
  assert.deepEqual(summary.issues, [
    {
      kind: "HostMutationError",
      category: "names",
      key: 0x401000,
      message: 'setName rejected by host: symbol prefix "sub_" is reserved',
    },
  ]);
  assert.equal(db.getName(0x402000)?.name, "g_ok");
});

test("a function comment without a function is a host rejection", () => {
  const db = destination();
  const model = createRecordModel({
    binaryIdentifier: "",
    baseAddress: 0x400000,
    functionComments: [[0x401000, "orphan"]],
  });
  const summary = importDocument(model, db);
  assert.equal(summary.categories.function_comments.failed, 1);
  assert.equal(
    summary.issues[0].message,
    "setFunctionComment rejected by host: no function starts at 0x401000"
  );
});

test("formatted summary lists counts and issues", () => {
  const summary = importDocument(nameOnly(), namedDestination(true), { runId: RUN_ID });
  const lines = formatImportSummary(summary).split("\n");
  assert.equal(lines[0], "=== Import Summary ===");
  assert.equal(lines[1], "Run ID: test-run");
  assert.equal(lines[2], "Destination: dest-tool");
  assert.ok(
    lines.includes(
      `${"names".padEnd(18)}created=0 overwritten=0 appended=0 already_present=0 skipped=0 conflicted=1 failed=0`
    )
  );
  assert.equal(lines[lines.length - 1], "  [NameConflict] names 0x401000: destination holds a different user-assigned name");
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
