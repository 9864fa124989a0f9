/**
 * Exporter: walks a host database through its read API and builds a
 * Record Model.
 *
 * The walk is read-only. Every category is emitted, empty when the host
 * has nothing for it, so an importer never has to tell "no data" from
 * "category missing". An address that cannot be expressed relative to the
 * declared base is skipped and reported; the rest of the export continues.
 * Structure members are held to the same rules the decoder applies, so a
 * member the wire format cannot carry (a zero-length trailing array, an
 * unnamed type) is left out of its structure and reported.
 */

import { AddressNormalizer, AddressRangeError } from "../address/normalizer.js";
import { createRecordModel, type Address, type RecordModel, type SectionRange, type StructMember } from "../document/model.js";
import { StructMemberSchema } from "../document/schema.js";
import type { AnalysisSource } from "../host/types.js";
import { silentLogger, type Logger } from "../logging/logger.js";

export interface ExportOptions {
  /** base_address written to the document (default: the source's image base) */
  baseAddress?: Address;
  /** binary_identifier written to the document (default: the source's) */
  binaryIdentifier?: string;
  /** Leave out names generated by auto-analysis */
  userNamesOnly?: boolean;
  logger?: Logger;
}

export interface AddressExportIssue {
  category: "functions" | "names" | "comments" | "function_comments" | "sections";
  /** Tool-local address of the skipped entry */
  address: Address;
  message: string;
}

export interface StructureExportIssue {
  category: "structures";
  structure: string;
  /** Offset of the skipped member */
  offset: number;
  message: string;
}

export type ExportIssue = AddressExportIssue | StructureExportIssue;

export interface ExportResult {
  model: RecordModel;
  issues: ExportIssue[];
}

/**
 * Export a host database to a Record Model.
 */
export function exportDatabase(source: AnalysisSource, options: ExportOptions = {}): ExportResult {
  const logger = (options.logger ?? silentLogger).child("exporter");
  const toolBase = source.imageBase();
  const normalizer = new AddressNormalizer(options.baseAddress ?? toolBase);
  const issues: ExportIssue[] = [];

  function canonical(category: AddressExportIssue["category"], address: Address): Address | undefined {
    try {
      return normalizer.toCanonical(address, toolBase);
    } catch (err) {
      if (err instanceof AddressRangeError) {
        issues.push({ category, address, message: err.message });
        logger.warn("Skipping entry outside the declared base", { category, address });
        return undefined;
      }
      throw err;
    }
  }

  function mapEntries<T>(
    category: AddressExportIssue["category"],
    entries: Iterable<readonly [Address, T]>
  ): Array<[Address, T]> {
    const out: Array<[Address, T]> = [];
    for (const [address, value] of entries) {
      const mapped = canonical(category, address);
      if (mapped !== undefined) {
        out.push([mapped, value]);
      }
    }
    return out;
  }

  const functions: Address[] = [];
  for (const address of source.listFunctions()) {
    const mapped = canonical("functions", address);
    if (mapped !== undefined) {
      functions.push(mapped);
    }
  }

  const names: Array<[Address, string]> = [];
  for (const [address, symbol] of mapEntries("names", source.listNames())) {
    if (!options.userNamesOnly || symbol.isUserAssigned) {
      names.push([address, symbol.name]);
    }
  }

  const sections: Array<[string, SectionRange]> = [];
  for (const [name, range] of source.listSections()) {
    const start = canonical("sections", range.start);
    const end = canonical("sections", range.end);
    if (start !== undefined && end !== undefined) {
      sections.push([name, { start, end }]);
    }
  }

  const structures: Array<[string, readonly StructMember[]]> = [];
  for (const id of source.listStructures()) {
    const members: StructMember[] = [];
    for (const member of source.getStructure(id) ?? []) {
      const problem = memberProblem(member);
      if (problem === undefined) {
        members.push(member);
      } else {
        issues.push({ category: "structures", structure: id, offset: member.offset, message: problem });
        logger.warn("Skipping structure member the document cannot carry", {
          structure: id,
          offset: member.offset,
          problem,
        });
      }
    }
    structures.push([id, members]);
  }

  const model = createRecordModel({
    binaryIdentifier: options.binaryIdentifier ?? source.binaryIdentifier(),
    baseAddress: normalizer.declaredBase,
    sections,
    functions,
    names,
    comments: mapEntries("comments", source.listComments()),
    functionComments: mapEntries("function_comments", source.listFunctionComments()),
    structures,
  });

  logger.info("Export complete", {
    tool: source.toolName,
    functions: model.functions.size,
    names: model.names.size,
    comments: model.comments.size,
    functionComments: model.functionComments.size,
    structures: model.structures.size,
    skipped: issues.length,
  });

  return { model, issues };
}

function memberProblem(member: StructMember): string | undefined {
  const result = StructMemberSchema.safeParse({
    offset: member.offset,
    size: member.size,
    type_name: member.typeName,
    member_name: member.memberName,
  });
  if (result.success) return undefined;
  return result.error.issues.map((issue) => issue.message).join("; ");
}
