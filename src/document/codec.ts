/**
 * Interchange document codec.
 *
 * ENCODING is canonical: the same model always encodes to the same bytes.
 * Top-level keys come in a fixed order, address maps are ordered by numeric
 * address, structure ids and extension keys are sorted, and struct members
 * are ordered by offset. Round-trip tests and plain-text diffs depend on it.
 *
 * DECODING is all-or-nothing and runs in this order:
 *
 *   1. JSON parse, top level must be an object      → MalformedDataError
 *   2. required keys present                        → SchemaError
 *   3. schema_version is an integer                 → MalformedDataError
 *   4. schema_version is supported                  → SchemaError
 *   5. unknown keys (strict mode only)              → SchemaError
 *   6. shape of every recognized value              → MalformedDataError
 *
 * Step 6 also rejects any "__proto__" key, at any depth: object records
 * cannot hold one as a plain entry.
 *
 * Nothing is returned until every step has passed.
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import type { ZodIssue } from "zod";
import type { SchemaMode } from "../config/merge/enums.js";
import {
  buildDocumentSchema,
  parseAddressKey,
  KNOWN_TOP_LEVEL_KEYS,
  REQUIRED_TOP_LEVEL_KEYS,
  SUPPORTED_SCHEMA_VERSIONS,
} from "./schema.js";
import {
  createRecordModel,
  type Address,
  type JsonValue,
  type RecordModel,
  type StructMember,
} from "./model.js";
import {
  SchemaError,
  MalformedDataError,
  DocumentIoError,
  type DocumentIssue,
} from "./errors.js";

export interface DecodeOptions {
  /** Treatment of unknown top-level keys (default: "strict") */
  mode?: SchemaMode;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

const RESERVED_KEY = "__proto__";

function reservedKeyIssues(value: unknown, path: string, issues: DocumentIssue[]): void {
  if (Array.isArray(value)) {
    value.forEach((item, index) => reservedKeyIssues(item, `${path}.${index}`, issues));
    return;
  }
  if (!isPlainObject(value)) return;
  for (const key of Object.keys(value)) {
    const childPath = path === "" ? key : `${path}.${key}`;
    if (key === RESERVED_KEY) {
      issues.push({ path: childPath, message: `key "${RESERVED_KEY}" is not allowed` });
    } else {
      reservedKeyIssues(value[key], childPath, issues);
    }
  }
}

function toDocumentIssues(zodIssues: ZodIssue[]): DocumentIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
  }));
}

function addressEntries(
  field: string,
  record: Record<string, string>,
  issues: DocumentIssue[]
): Array<[Address, string]> {
  const seen = new Map<Address, string>();
  const entries: Array<[Address, string]> = [];
  for (const [key, value] of Object.entries(record)) {
    const address = parseAddressKey(key);
    const previous = seen.get(address);
    if (previous !== undefined) {
      issues.push({
        path: `${field}.${key}`,
        message: `address ${address} is also given as "${previous}"`,
      });
      continue;
    }
    seen.set(address, key);
    entries.push([address, value]);
  }
  return entries;
}

/**
 * Validate an already-parsed JSON value and build a Record Model from it.
 *
 * @throws SchemaError for layout problems, MalformedDataError for shape problems
 */
export function parseDocument(raw: unknown, options: DecodeOptions = {}): RecordModel {
  const mode = options.mode ?? "strict";

  if (!isPlainObject(raw)) {
    throw new MalformedDataError("Invalid interchange document", [
      { path: "(root)", message: "document must be a JSON object" },
    ]);
  }

  const missing = REQUIRED_TOP_LEVEL_KEYS.filter((key) => !(key in raw));
  if (missing.length > 0) {
    throw new SchemaError(`Missing required key(s): ${missing.join(", ")}`);
  }

  const version = raw.schema_version;
  if (typeof version !== "number" || !Number.isInteger(version)) {
    throw new MalformedDataError("Invalid interchange document", [
      { path: "schema_version", message: "schema_version must be an integer" },
    ]);
  }
  if (!SUPPORTED_SCHEMA_VERSIONS.includes(version)) {
    throw new SchemaError(
      `Unsupported schema_version ${version} (supported: ${SUPPORTED_SCHEMA_VERSIONS.join(", ")})`
    );
  }

  const unknownKeys = Object.keys(raw).filter((key) => !KNOWN_TOP_LEVEL_KEYS.includes(key));
  if (mode === "strict" && unknownKeys.length > 0) {
    throw new SchemaError(`Unrecognized top-level key(s): ${unknownKeys.join(", ")}`);
  }

  const result = buildDocumentSchema(mode).safeParse(raw);
  const issues: DocumentIssue[] = result.success ? [] : toDocumentIssues(result.error.issues);
  reservedKeyIssues(raw, "", issues);

  const extensions: Record<string, JsonValue> = {};
  for (const key of unknownKeys) {
    if (key === RESERVED_KEY) continue;
    const value = raw[key];
    if (isJsonValue(value)) {
      extensions[key] = value;
    } else {
      issues.push({ path: key, message: "value is not representable as JSON" });
    }
  }

  if (!result.success) {
    throw new MalformedDataError(
      `Invalid interchange document: ${issues.length} problem(s)`,
      issues
    );
  }

  const data = result.data;
  const names = addressEntries("names", data.names, issues);
  const comments = addressEntries("comments", data.comments, issues);
  const functionComments = addressEntries("function_comments", data.function_comments, issues);

  if (issues.length > 0) {
    throw new MalformedDataError(
      `Invalid interchange document: ${issues.length} problem(s)`,
      issues
    );
  }

  return createRecordModel({
    schemaVersion: data.schema_version,
    binaryIdentifier: data.binary_identifier,
    baseAddress: data.base_address,
    sections: Object.entries(data.sections),
    functions: data.functions,
    names,
    comments,
    functionComments,
    structures: Object.entries(data.structures).map(([id, members]): [string, StructMember[]] => [
      id,
      members.map(
        (member): StructMember => ({
          offset: member.offset,
          size: member.size,
          typeName: member.type_name,
          memberName: member.member_name,
        })
      ),
    ]),
    extensions,
  });
}

/**
 * Decode interchange JSON text into a Record Model.
 *
 * @throws SchemaError for layout problems, MalformedDataError for shape problems
 */
export function decodeDocument(text: string, options: DecodeOptions = {}): RecordModel {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new MalformedDataError("Invalid interchange document", [
      {
        path: "(root)",
        message: `not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      },
    ]);
  }
  return parseDocument(parsed, options);
}

function addressMapToWire(values: ReadonlyMap<Address, string>): Record<string, string> {
  const wire: Record<string, string> = {};
  for (const address of [...values.keys()].sort((a, b) => a - b)) {
    const value = values.get(address);
    if (value !== undefined) {
      wire[String(address)] = value;
    }
  }
  return wire;
}

function sortJsonKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(sortJsonKeys);
  }
  if (value !== null && typeof value === "object") {
    const sorted: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortJsonKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

/**
 * Build the wire object for a model, in canonical key order.
 */
export function toWireDocument(model: RecordModel): { [key: string]: JsonValue } {
  const sections: { [name: string]: JsonValue } = {};
  for (const name of [...model.sections.keys()].sort()) {
    const range = model.sections.get(name);
    if (range) {
      sections[name] = { start: range.start, end: range.end };
    }
  }

  const structures: { [id: string]: JsonValue } = {};
  for (const id of [...model.structures.keys()].sort()) {
    const members = model.structures.get(id) ?? [];
    structures[id] = [...members]
      .sort((a, b) => a.offset - b.offset)
      .map((member) => ({
        offset: member.offset,
        size: member.size,
        type_name: member.typeName,
        member_name: member.memberName,
      }));
  }

  const wire: { [key: string]: JsonValue } = {
    schema_version: model.schemaVersion,
    binary_identifier: model.binaryIdentifier,
    base_address: model.baseAddress,
    sections,
    functions: [...model.functions].sort((a, b) => a - b),
    names: addressMapToWire(model.names),
    comments: addressMapToWire(model.comments),
    function_comments: addressMapToWire(model.functionComments),
    structures,
  };

  for (const key of Object.keys(model.extensions).sort()) {
    wire[key] = sortJsonKeys(model.extensions[key]);
  }

  return wire;
}

/**
 * Encode a model as canonical JSON text (two-space indent, trailing newline).
 */
export function encodeDocument(model: RecordModel): string {
  return JSON.stringify(toWireDocument(model), null, 2) + "\n";
}

/**
 * Load and decode a document file.
 *
 * @throws DocumentIoError if the file cannot be read
 */
export function loadDocument(filePath: string, options: DecodeOptions = {}): RecordModel {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new DocumentIoError(
      `Failed to read document ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      err
    );
  }
  return decodeDocument(text, options);
}

/**
 * Encode and write a document file, creating its directory if needed.
 *
 * @throws DocumentIoError if the file cannot be written
 */
export function saveDocument(model: RecordModel, filePath: string): void {
  try {
    const directory = dirname(filePath);
    if (!existsSync(directory)) {
      mkdirSync(directory, { recursive: true });
    }
    writeFileSync(filePath, encodeDocument(model), "utf-8");
  } catch (err) {
    throw new DocumentIoError(
      `Failed to write document ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      err
    );
  }
}

/**
 * Create a human-readable summary of a document.
 */
export function summarizeDocument(model: RecordModel): string {
  let memberCount = 0;
  for (const members of model.structures.values()) {
    memberCount += members.length;
  }

  const lines: string[] = [
    "=== Interchange Document ===",
    `Schema version: ${model.schemaVersion}`,
    `Binary: ${model.binaryIdentifier || "(unspecified)"}`,
    `Base address: 0x${model.baseAddress.toString(16)}`,
    "",
    "--- Records ---",
    `Sections: ${model.sections.size}`,
    `Functions: ${model.functions.size}`,
    `Names: ${model.names.size}`,
    `Comments: ${model.comments.size}`,
    `Function comments: ${model.functionComments.size}`,
    `Structures: ${model.structures.size} (${memberCount} members)`,
  ];

  const extensionKeys = Object.keys(model.extensions).sort();
  if (extensionKeys.length > 0) {
    lines.push("");
    lines.push(`Extension keys: ${extensionKeys.join(", ")}`);
  }

  return lines.join("\n");
}
