/**
 * Database snapshot files.
 *
 * A snapshot persists a MemoryDatabase as JSON so that the CLI can export
 * from, and import into, an offline database. Unlike the interchange
 * document, a snapshot keeps host-side detail: whether each name was set by
 * an analyst, the symbol kind, the image base and the host's legality rules.
 *
 * Layout:
 * {
 *   "tool": "memory",
 *   "image_base": 4194304,
 *   "binary_identifier": "...",
 *   "functions": [4198400],
 *   "names": { "4198400": { "name": "main", "user": true, "kind": "function" } },
 *   "comments": {}, "function_comments": {}, "sections": {}, "structures": {},
 *   "rules": { "known_types": ["int"], "unique_names": true, "reserved_prefixes": ["sub_"] }
 * }
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { AddressSchema, SectionSchema, StructMemberSchema } from "../document/schema.js";
import { MalformedDataError, DocumentIoError } from "../document/errors.js";
import type { Address, StructMember } from "../document/model.js";
import { MemoryDatabase, type StoredName } from "./memory.js";

const AddressKey = z
  .string()
  .regex(/^(0|[1-9][0-9]*)$/, "address key must be a decimal integer")
  .refine((key) => Number.isSafeInteger(Number(key)), {
    message: "address key exceeds the safe integer range",
  });

export const SnapshotNameSchema = z
  .object({
    name: z.string().min(1),
    user: z.boolean(),
    kind: z.enum(["function", "data"]).default("data"),
  })
  .strict();

export const DatabaseSnapshotSchema = z
  .object({
    tool: z.string().default("memory"),
    image_base: AddressSchema.default(0),
    binary_identifier: z.string().default(""),
    functions: z.array(AddressSchema).default([]),
    names: z.record(AddressKey, SnapshotNameSchema).default({}),
    comments: z.record(AddressKey, z.string()).default({}),
    function_comments: z.record(AddressKey, z.string()).default({}),
    sections: z.record(z.string(), SectionSchema).default({}),
    structures: z.record(z.string(), z.array(StructMemberSchema)).default({}),
    rules: z
      .object({
        known_types: z.array(z.string()).optional(),
        unique_names: z.boolean().optional(),
        reserved_prefixes: z.array(z.string()).optional(),
      })
      .strict()
      .default({}),
  })
  .strict();

export type DatabaseSnapshot = z.infer<typeof DatabaseSnapshotSchema>;

function keyed<T>(record: Record<string, T>): Array<[Address, T]> {
  return Object.entries(record).map(([key, value]): [Address, T] => [Number(key), value]);
}

function unkeyed<T>(entries: Iterable<readonly [Address, T]>): Record<string, T> {
  const record: Record<string, T> = {};
  for (const [address, value] of [...entries].sort(([a], [b]) => a - b)) {
    record[String(address)] = value;
  }
  return record;
}

/**
 * Validate a parsed snapshot and build the database it describes.
 *
 * @throws MalformedDataError if the snapshot has the wrong shape
 */
export function databaseFromSnapshot(raw: unknown): MemoryDatabase {
  const result = DatabaseSnapshotSchema.safeParse(raw);
  if (!result.success) {
    throw new MalformedDataError(
      `Invalid database snapshot: ${result.error.issues.length} problem(s)`,
      result.error.issues.map((issue) => ({
        path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
        message: issue.message,
      }))
    );
  }

  const snapshot = result.data;
  return new MemoryDatabase(
    {
      toolName: snapshot.tool,
      imageBase: snapshot.image_base,
      binaryIdentifier: snapshot.binary_identifier,
      knownTypes: snapshot.rules.known_types,
      uniqueNames: snapshot.rules.unique_names,
      reservedPrefixes: snapshot.rules.reserved_prefixes,
    },
    {
      functions: snapshot.functions,
      names: keyed(snapshot.names).map(([address, entry]): [Address, StoredName] => [
        address,
        { name: entry.name, isUserAssigned: entry.user, kind: entry.kind },
      ]),
      comments: keyed(snapshot.comments),
      functionComments: keyed(snapshot.function_comments),
      sections: Object.entries(snapshot.sections),
      structures: Object.entries(snapshot.structures).map(([id, members]): [string, StructMember[]] => [
        id,
        members.map((member) => ({
          offset: member.offset,
          size: member.size,
          typeName: member.type_name,
          memberName: member.member_name,
        })),
      ]),
    }
  );
}

/**
 * Snapshot of a database's full contents, ready for JSON.stringify.
 */
export function snapshotDatabase(db: MemoryDatabase): DatabaseSnapshot {
  const sections: DatabaseSnapshot["sections"] = {};
  for (const [name, range] of db.listSections().sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    sections[name] = { start: range.start, end: range.end };
  }

  const structures: DatabaseSnapshot["structures"] = {};
  for (const id of db.listStructures()) {
    structures[id] = (db.getStructure(id) ?? []).map((member) => ({
      offset: member.offset,
      size: member.size,
      type_name: member.typeName,
      member_name: member.memberName,
    }));
  }

  const rules: DatabaseSnapshot["rules"] = {};
  if (db.knownTypeNames) rules.known_types = [...db.knownTypeNames];
  if (db.options.uniqueNames !== undefined) rules.unique_names = db.options.uniqueNames;
  if (db.options.reservedPrefixes) rules.reserved_prefixes = [...db.options.reservedPrefixes];

  return {
    tool: db.toolName,
    image_base: db.imageBase(),
    binary_identifier: db.binaryIdentifier(),
    functions: db.listFunctions(),
    names: unkeyed(
      db.listNames().map(([address, entry]): [Address, z.infer<typeof SnapshotNameSchema>] => [
        address,
        { name: entry.name, user: entry.isUserAssigned, kind: entry.kind },
      ])
    ),
    comments: unkeyed(db.listComments()),
    function_comments: unkeyed(db.listFunctionComments()),
    sections,
    structures,
    rules,
  };
}

/**
 * Load a database snapshot file.
 *
 * @throws DocumentIoError if the file cannot be read or parsed as JSON
 */
export function loadDatabaseSnapshot(filePath: string): MemoryDatabase {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new DocumentIoError(
      `Failed to read database snapshot ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      err
    );
  }
  return databaseFromSnapshot(parsed);
}

/**
 * Write a database snapshot file.
 *
 * @throws DocumentIoError if the file cannot be written
 */
export function saveDatabaseSnapshot(db: MemoryDatabase, filePath: string): void {
  try {
    const directory = dirname(filePath);
    if (!existsSync(directory)) {
      mkdirSync(directory, { recursive: true });
    }
    writeFileSync(filePath, JSON.stringify(snapshotDatabase(db), null, 2) + "\n", "utf-8");
  } catch (err) {
    throw new DocumentIoError(
      `Failed to write database snapshot ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      err
    );
  }
}
