/**
 * In-memory Record Model.
 *
 * The wire document (schema.ts) keys everything by strings; the model keys
 * addresses by number and uses sets and maps so that callers get set
 * semantics for functions and one value per address for names and comments.
 *
 * A model is frozen on creation. The collection views are typed read-only;
 * editing helpers in edit.ts return new models instead of mutating.
 */

import { isDeepStrictEqual } from "node:util";
import { SCHEMA_VERSION, KNOWN_TOP_LEVEL_KEYS } from "./schema.js";

/** Byte offset in an analysed image. Always a non-negative safe integer. */
export type Address = number;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface StructMember {
  readonly offset: number;
  readonly size: number;
  readonly typeName: string;
  readonly memberName: string;
}

/** Half-open address range [start, end) */
export interface SectionRange {
  readonly start: Address;
  readonly end: Address;
}

export interface RecordModel {
  readonly schemaVersion: number;
  readonly binaryIdentifier: string;
  readonly baseAddress: Address;
  readonly sections: ReadonlyMap<string, SectionRange>;
  readonly functions: ReadonlySet<Address>;
  readonly names: ReadonlyMap<Address, string>;
  readonly comments: ReadonlyMap<Address, string>;
  readonly functionComments: ReadonlyMap<Address, string>;
  readonly structures: ReadonlyMap<string, readonly StructMember[]>;
  /** Unrecognized top-level keys carried through lenient decoding */
  readonly extensions: Readonly<Record<string, JsonValue>>;
}

export interface RecordModelInit {
  schemaVersion?: number;
  binaryIdentifier: string;
  baseAddress: Address;
  sections?: Iterable<readonly [string, SectionRange]>;
  functions?: Iterable<Address>;
  names?: Iterable<readonly [Address, string]>;
  comments?: Iterable<readonly [Address, string]>;
  functionComments?: Iterable<readonly [Address, string]>;
  structures?: Iterable<readonly [string, readonly StructMember[]]>;
  extensions?: Record<string, JsonValue>;
}

function byOffset(a: StructMember, b: StructMember): number {
  return a.offset - b.offset;
}

/**
 * Build a frozen Record Model. Missing categories become empty containers;
 * struct members are ordered by offset.
 */
export function createRecordModel(init: RecordModelInit): RecordModel {
  const structures = new Map<string, readonly StructMember[]>();
  for (const [id, members] of init.structures ?? []) {
    structures.set(
      id,
      Object.freeze(members.map((member) => Object.freeze({ ...member })).sort(byOffset))
    );
  }

  const extensions: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(init.extensions ?? {})) {
    if (!KNOWN_TOP_LEVEL_KEYS.includes(key)) {
      extensions[key] = value;
    }
  }

  return Object.freeze({
    schemaVersion: init.schemaVersion ?? SCHEMA_VERSION,
    binaryIdentifier: init.binaryIdentifier,
    baseAddress: init.baseAddress,
    sections: new Map(
      [...(init.sections ?? [])].map(
        ([name, range]): [string, SectionRange] => [name, Object.freeze({ ...range })]
      )
    ),
    functions: new Set(init.functions ?? []),
    names: new Map(init.names ?? []),
    comments: new Map(init.comments ?? []),
    functionComments: new Map(init.functionComments ?? []),
    structures,
    extensions: Object.freeze(extensions),
  });
}

/**
 * Copy a model into a mutable init so a helper can derive a changed model.
 */
export function toModelInit(model: RecordModel): RecordModelInit {
  return {
    schemaVersion: model.schemaVersion,
    binaryIdentifier: model.binaryIdentifier,
    baseAddress: model.baseAddress,
    sections: [...model.sections],
    functions: [...model.functions],
    names: [...model.names],
    comments: [...model.comments],
    functionComments: [...model.functionComments],
    structures: [...model.structures],
    extensions: { ...model.extensions },
  };
}

/**
 * Structural equality, independent of set and map insertion order.
 */
export function documentsEqual(a: RecordModel, b: RecordModel): boolean {
  return isDeepStrictEqual(a, b);
}

/**
 * Every address that carries at least one record, ascending.
 */
export function collectAddresses(model: RecordModel): Address[] {
  const addresses = new Set<Address>([
    ...model.functions,
    ...model.names.keys(),
    ...model.comments.keys(),
    ...model.functionComments.keys(),
  ]);
  return [...addresses].sort((a, b) => a - b);
}
