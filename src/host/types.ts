/**
 * Host database collaborator interface.
 *
 * The exporter and importer never touch a host tool's native API. Each host
 * provides one adapter implementing these interfaces over its own analysis
 * database; the core only ever calls the methods below.
 *
 * Mutating methods throw when the host rejects a change (an illegal symbol,
 * an invalid structure). The importer catches those errors per entry and
 * reports them as HostMutationError.
 */

import type { Address, SectionRange, StructMember } from "../document/model.js";

/**
 * A symbol name as the host holds it.
 */
export interface SymbolName {
  readonly name: string;
  /** Set by an analyst, as opposed to generated by auto-analysis */
  readonly isUserAssigned: boolean;
}

/** Whether a symbol labels code or data */
export type SymbolKind = "function" | "data";

/**
 * Read side of a host database, used by the exporter.
 */
export interface AnalysisSource {
  /** Host tool name, recorded in logs */
  readonly toolName: string;
  /** Address the host loaded the image at */
  imageBase(): Address;
  /** Hash or other identifier of the analysed binary */
  binaryIdentifier(): string;
  listFunctions(): Iterable<Address>;
  listNames(): Iterable<readonly [Address, SymbolName]>;
  listComments(): Iterable<readonly [Address, string]>;
  listFunctionComments(): Iterable<readonly [Address, string]>;
  listSections(): Iterable<readonly [string, SectionRange]>;
  listStructures(): Iterable<string>;
  getStructure(id: string): readonly StructMember[] | undefined;
}

/**
 * Write side of a host database, used by the importer.
 */
export interface AnalysisSink {
  readonly toolName: string;
  imageBase(): Address;
  binaryIdentifier(): string;
  listFunctions(): Iterable<Address>;
  createFunction(address: Address): void;
  getName(address: Address): SymbolName | undefined;
  setName(address: Address, name: string, isUserAssigned: boolean, kind: SymbolKind): void;
  getComment(address: Address): string | undefined;
  setComment(address: Address, text: string): void;
  getFunctionComment(address: Address): string | undefined;
  setFunctionComment(address: Address, text: string): void;
  getSection(name: string): SectionRange | undefined;
  getStructure(id: string): readonly StructMember[] | undefined;
  createStructure(id: string, members: readonly StructMember[]): void;
  appendMember(id: string, member: StructMember): void;
  /** Whether the host can resolve a member type name */
  isTypeKnown(typeName: string): boolean;
}

export type AnalysisDatabase = AnalysisSource & AnalysisSink;

/**
 * The host rejected a mutation. Wraps the host's own error as `cause`.
 */
export class HostMutationError extends Error {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(
      `${operation} rejected by host: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "HostMutationError";
    this.operation = operation;
  }
}
