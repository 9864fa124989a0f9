/**
 * In-memory host database.
 *
 * A complete AnalysisDatabase over plain maps. It backs the offline CLI
 * (persisted through snapshot.ts) and serves as the destination in tests.
 * Host-side legality rules are configurable so that the importer's
 * rejection handling can be exercised:
 *
 * - knownTypes: restricts which member type names resolve
 * - uniqueNames: a name may be bound to one address only
 * - reservedPrefixes: names the host reserves for auto-analysis
 *
 * Every accepted mutation is appended to `mutations`.
 */

import type { Address, SectionRange, StructMember } from "../document/model.js";
import type { AnalysisDatabase, SymbolKind, SymbolName } from "./types.js";

export interface StoredName extends SymbolName {
  readonly kind: SymbolKind;
}

export interface MemoryDatabaseOptions {
  toolName?: string;
  imageBase?: Address;
  binaryIdentifier?: string;
  /** Resolvable member types; every type resolves when omitted */
  knownTypes?: Iterable<string>;
  uniqueNames?: boolean;
  reservedPrefixes?: readonly string[];
}

/**
 * Full contents of a MemoryDatabase, used to seed one and to persist it.
 */
export interface MemoryDatabaseState {
  functions?: Iterable<Address>;
  names?: Iterable<readonly [Address, StoredName]>;
  comments?: Iterable<readonly [Address, string]>;
  functionComments?: Iterable<readonly [Address, string]>;
  sections?: Iterable<readonly [string, SectionRange]>;
  structures?: Iterable<readonly [string, readonly StructMember[]]>;
}

export interface MutationRecord {
  readonly operation:
    | "createFunction"
    | "setName"
    | "setComment"
    | "setFunctionComment"
    | "createStructure"
    | "appendMember";
  readonly key: Address | string;
}

const BYTE_ARRAY_TYPE = /^uint8_t\[[1-9][0-9]*\]$/;

export class MemoryDatabase implements AnalysisDatabase {
  readonly toolName: string;
  readonly options: Readonly<Omit<MemoryDatabaseOptions, "knownTypes">>;

  private readonly base: Address;
  private readonly identifier: string;
  private readonly knownTypes: ReadonlySet<string> | undefined;
  private readonly functions = new Set<Address>();
  private readonly names = new Map<Address, StoredName>();
  private readonly comments = new Map<Address, string>();
  private readonly functionComments = new Map<Address, string>();
  private readonly sections = new Map<string, SectionRange>();
  private readonly structures = new Map<string, StructMember[]>();
  private readonly log: MutationRecord[] = [];

  constructor(options: MemoryDatabaseOptions = {}, state: MemoryDatabaseState = {}) {
    const { knownTypes, ...rest } = options;
    this.options = rest;
    this.toolName = options.toolName ?? "memory";
    this.base = options.imageBase ?? 0;
    this.identifier = options.binaryIdentifier ?? "";
    this.knownTypes = knownTypes ? new Set(knownTypes) : undefined;

    for (const address of state.functions ?? []) this.functions.add(address);
    for (const [address, name] of state.names ?? []) this.names.set(address, { ...name });
    for (const [address, text] of state.comments ?? []) this.comments.set(address, text);
    for (const [address, text] of state.functionComments ?? []) {
      this.functionComments.set(address, text);
    }
    for (const [name, range] of state.sections ?? []) this.sections.set(name, { ...range });
    for (const [id, members] of state.structures ?? []) {
      this.structures.set(id, members.map((member) => ({ ...member })));
    }
  }

  /** Mutations accepted since construction, in order */
  get mutations(): readonly MutationRecord[] {
    return this.log;
  }

  /** Known type names, or undefined when every type resolves */
  get knownTypeNames(): readonly string[] | undefined {
    return this.knownTypes ? [...this.knownTypes].sort() : undefined;
  }

  // ── Read side ──────────────────────────────────────────────────────

  imageBase(): Address {
    return this.base;
  }

  binaryIdentifier(): string {
    return this.identifier;
  }

  listFunctions(): Address[] {
    return [...this.functions].sort((a, b) => a - b);
  }

  listNames(): Array<[Address, StoredName]> {
    return [...this.names].sort(([a], [b]) => a - b);
  }

  listComments(): Array<[Address, string]> {
    return [...this.comments].sort(([a], [b]) => a - b);
  }

  listFunctionComments(): Array<[Address, string]> {
    return [...this.functionComments].sort(([a], [b]) => a - b);
  }

  listSections(): Array<[string, SectionRange]> {
    return [...this.sections];
  }

  listStructures(): string[] {
    return [...this.structures.keys()].sort();
  }

  hasFunction(address: Address): boolean {
    return this.functions.has(address);
  }

  getName(address: Address): StoredName | undefined {
    return this.names.get(address);
  }

  getComment(address: Address): string | undefined {
    return this.comments.get(address);
  }

  getFunctionComment(address: Address): string | undefined {
    return this.functionComments.get(address);
  }

  getSection(name: string): SectionRange | undefined {
    return this.sections.get(name);
  }

  getStructure(id: string): readonly StructMember[] | undefined {
    return this.structures.get(id);
  }

  isTypeKnown(typeName: string): boolean {
    return !this.knownTypes || this.knownTypes.has(typeName) || BYTE_ARRAY_TYPE.test(typeName);
  }

  // ── Write side ─────────────────────────────────────────────────────

  createFunction(address: Address): void {
    if (this.functions.has(address)) {
      throw new Error(`function already exists at 0x${address.toString(16)}`);
    }
    this.functions.add(address);
    this.log.push({ operation: "createFunction", key: address });
  }

  setName(address: Address, name: string, isUserAssigned: boolean, kind: SymbolKind): void {
    if (name.length === 0) {
      throw new Error("symbol name must not be empty");
    }
    const reserved = (this.options.reservedPrefixes ?? []).find((prefix) =>
      name.startsWith(prefix)
    );
    if (reserved !== undefined) {
      throw new Error(`symbol prefix "${reserved}" is reserved`);
    }
    if (this.options.uniqueNames) {
      for (const [other, existing] of this.names) {
        if (other !== address && existing.name === name) {
          throw new Error(`name "${name}" is already bound to 0x${other.toString(16)}`);
        }
      }
    }
    this.names.set(address, { name, isUserAssigned, kind });
    this.log.push({ operation: "setName", key: address });
  }

  setComment(address: Address, text: string): void {
    this.comments.set(address, text);
    this.log.push({ operation: "setComment", key: address });
  }

  setFunctionComment(address: Address, text: string): void {
    if (!this.functions.has(address)) {
      throw new Error(`no function starts at 0x${address.toString(16)}`);
    }
    this.functionComments.set(address, text);
    this.log.push({ operation: "setFunctionComment", key: address });
  }

  createStructure(id: string, members: readonly StructMember[]): void {
    if (this.structures.has(id)) {
      throw new Error(`structure "${id}" already exists`);
    }
    const offsets = new Set<number>();
    for (const member of members) {
      this.checkMemberType(id, member);
      if (offsets.has(member.offset)) {
        throw new Error(`structure "${id}" has two members at offset ${member.offset}`);
      }
      offsets.add(member.offset);
    }
    this.structures.set(
      id,
      members.map((member) => ({ ...member })).sort((a, b) => a.offset - b.offset)
    );
    this.log.push({ operation: "createStructure", key: id });
  }

  appendMember(id: string, member: StructMember): void {
    const members = this.structures.get(id);
    if (!members) {
      throw new Error(`structure "${id}" does not exist`);
    }
    this.checkMemberType(id, member);
    if (members.some((existing) => existing.offset === member.offset)) {
      throw new Error(`structure "${id}" already has a member at offset ${member.offset}`);
    }
    members.push({ ...member });
    members.sort((a, b) => a.offset - b.offset);
    this.log.push({ operation: "appendMember", key: id });
  }

  private checkMemberType(id: string, member: StructMember): void {
    if (!this.isTypeKnown(member.typeName)) {
      throw new Error(`unknown type "${member.typeName}" in structure "${id}"`);
    }
  }
}
