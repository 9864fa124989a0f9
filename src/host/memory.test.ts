/**
 * Tests for the in-memory host database and its snapshot files.
 *
 * Run: node --import tsx src/host/memory.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { MemoryDatabase } from "./memory.js";
import {
  databaseFromSnapshot,
  loadDatabaseSnapshot,
  saveDatabaseSnapshot,
  snapshotDatabase,
} from "./snapshot.js";
import { HostMutationError } from "./types.js";
import { DocumentIoError, MalformedDataError } from "../document/errors.js";

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

function seededDatabase(): MemoryDatabase {
  return new MemoryDatabase(
    {
      toolName: "test-tool",
      imageBase: 0x400000,
      binaryIdentifier: "test-binary",
      knownTypes: ["int", "char"],
      uniqueNames: true,
      reservedPrefixes: ["sub_"],
    },
    {
      functions: [0x401000],
      names: [
        [0x402000, { name: "g_data", isUserAssigned: false, kind: "data" }],
        [0x401000, { name: "main", isUserAssigned: true, kind: "function" }],
      ],
      comments: [[0x401004, "note"]],
      functionComments: [[0x401000, "entry"]],
      sections: [[".text", { start: 0x401000, end: 0x402000 }]],
      structures: [["Pair", [{ offset: 0, size: 4, typeName: "int", memberName: "a" }]]],
    }
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// READ SIDE
// ═══════════════════════════════════════════════════════════════════════════

section("Read Side");

test("lists are sorted by address", () => {
  const db = seededDatabase();
  assert.deepEqual(
    db.listNames().map(([address]) => address),
    [0x401000, 0x402000]
  );
});

test("seeding records no mutations", () => {
  assert.equal(seededDatabase().mutations.length, 0);
});

test("byte arrays always resolve", () => {
  const db = seededDatabase();
  assert.ok(db.isTypeKnown("int"));
  assert.ok(db.isTypeKnown("uint8_t[12]"));
  assert.ok(!db.isTypeKnown("uint8_t[0]"));
  assert.ok(!db.isTypeKnown("Widget"));
});

test("every type resolves without a known type list", () => {
  assert.ok(new MemoryDatabase().isTypeKnown("Widget"));
});

// ═══════════════════════════════════════════════════════════════════════════
// WRITE SIDE
// ═══════════════════════════════════════════════════════════════════════════

section("Write Side");

test("accepted mutations are logged in order", () => {
  const db = seededDatabase();
  db.createFunction(0x401100);
  db.setName(0x401100, "helper", true, "function");
  assert.deepEqual(db.mutations, [
    { operation: "createFunction", key: 0x401100 },
    { operation: "setName", key: 0x401100 },
  ]);
});

test("a second function at one address is rejected", () => {
  const db = seededDatabase();
  assert.throws(() => db.createFunction(0x401000), /function already exists at 0x401000/);
  assert.equal(db.mutations.length, 0);
});

test("reserved prefixes are rejected", () => {
  assert.throws(
    () => seededDatabase().setName(0x403000, "sub_403000", true, "data"),
    /symbol prefix "sub_" is reserved/
  );
});

test("a name bound elsewhere is rejected when names are unique", () => {
  assert.throws(
    () => seededDatabase().setName(0x403000, "main", true, "data"),
    /name "main" is already bound to 0x401000/
  );
});

test("renaming an address to its own name is allowed", () => {
  const db = seededDatabase();
  db.setName(0x401000, "main", false, "function");
  assert.deepEqual(db.getName(0x401000), { name: "main", isUserAssigned: false, kind: "function" });
});

test("a function comment needs a function", () => {
  assert.throws(
    () => seededDatabase().setFunctionComment(0x402000, "x"),
    /no function starts at 0x402000/
  );
});

test("structures with unknown types are rejected", () => {
  assert.throws(
    () =>
      seededDatabase().createStructure("Bad", [
        { offset: 0, size: 4, typeName: "Widget", memberName: "w" },
      ]),
    /unknown type "Widget" in structure "Bad"/
  );
});

test("structures are stored ordered by offset", () => {
  const db = seededDatabase();
  db.createStructure("Two", [
    { offset: 4, size: 1, typeName: "char", memberName: "b" },
    { offset: 0, size: 4, typeName: "int", memberName: "a" },
  ]);
  assert.deepEqual(
    db.getStructure("Two")?.map((member) => member.offset),
    [0, 4]
  );
});

test("appending at a taken offset is rejected", () => {
  assert.throws(
    () =>
      seededDatabase().appendMember("Pair", {
        offset: 0,
        size: 4,
        typeName: "int",
        memberName: "again",
      }),
    /already has a member at offset 0/
  );
});

test("HostMutationError wraps the host's message", () => {
  const err = new HostMutationError("setName", new Error("nope"));
  assert.equal(err.message, "setName rejected by host: nope");
  assert.equal(err.operation, "setName");
});

// ═══════════════════════════════════════════════════════════════════════════
// SNAPSHOTS
// ═══════════════════════════════════════════════════════════════════════════

section("Snapshots");

const workDir = mkdtempSync(join(tmpdir(), "symbridge-host-"));

test("snapshot round-trips through JSON", () => {
  const snapshot = snapshotDatabase(seededDatabase());
  const restored = databaseFromSnapshot(JSON.parse(JSON.stringify(snapshot)));
  assert.deepEqual(snapshotDatabase(restored), snapshot);
});

test("snapshot keeps host-side detail", () => {
  const snapshot = snapshotDatabase(seededDatabase());
  assert.deepEqual(snapshot.names["4198400"], { name: "main", user: true, kind: "function" });
  assert.deepEqual(snapshot.rules, {
    known_types: ["char", "int"],
    unique_names: true,
    reserved_prefixes: ["sub_"],
  });
});

test("an empty snapshot gets defaults", () => {
  const db = databaseFromSnapshot({});
  assert.equal(db.toolName, "memory");
  assert.equal(db.imageBase(), 0);
  assert.equal(db.listFunctions().length, 0);
});

test("a bad snapshot is malformed data", () => {
  try {
    databaseFromSnapshot({ functions: [-1] });
    assert.fail("expected MalformedDataError");
  } catch (err) {
    assert.ok(err instanceof MalformedDataError);
    assert.deepEqual(err.issues, [{ path: "functions.0", message: "address must not be negative" }]);
  }
});

test("save then load", () => {
  const path = join(workDir, "db", "snapshot.json");
  saveDatabaseSnapshot(seededDatabase(), path);
  assert.deepEqual(snapshotDatabase(loadDatabaseSnapshot(path)), snapshotDatabase(seededDatabase()));
});

test("a file that is not JSON is an I/O error", () => {
  const path = join(workDir, "broken.json");
  writeFileSync(path, "not json");
  assert.throws(() => loadDatabaseSnapshot(path), DocumentIoError);
});

rmSync(workDir, { recursive: true, force: true });

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
