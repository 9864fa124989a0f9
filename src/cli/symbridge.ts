#!/usr/bin/env node
/**
 * symbridge command line.
 *
 * Works on interchange documents and offline database snapshots; no host
 * tool is involved.
 *
 * Usage:
 *   npx tsx src/cli/symbridge.ts <command> [options]
 *
 * Commands:
 *   export        Export a database snapshot to an interchange document
 *   import        Merge an interchange document into a database snapshot
 *   convert       Re-base, filter and canonicalize a document
 *   summary       Print record counts for a document
 *   query         Show the records around an address
 *   add-function  Mark a function start and name it
 *   add-variable  Name a data address
 *   add-comment   Set the comment at an address
 *
 * Exit codes:
 *   0 - Success (reported merge conflicts included)
 *   1 - Schema, shape or I/O failure
 *   2 - Usage error
 */

import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";

import { AddressRangeError } from "../address/normalizer.js";
import {
  config,
  validateConfig,
  ConflictPolicy,
  CommentMerge,
  RecordCategory,
  MergeOptionsError,
  type SchemaMode,
} from "../config/index.js";
import {
  addComment,
  addFunction,
  addVariable,
  filterCategories,
  loadDocument,
  queryAddress,
  queryToJson,
  rebaseDocument,
  renderQuery,
  saveDocument,
  summarizeDocument,
  DocumentIoError,
  MalformedDataError,
  SchemaError,
  type Address,
  type RecordModel,
} from "../document/index.js";
import { exportDatabase } from "../exporter/index.js";
import { loadDatabaseSnapshot, saveDatabaseSnapshot } from "../host/index.js";
import { importDocument, formatImportSummary } from "../importer/index.js";
import { createLogger, initRunId, silentLogger, type Logger } from "../logging/index.js";

// ============================================================
// Types
// ============================================================

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
  /** Emit ANSI colors */
  color: boolean;
  logger: Logger;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const HELP = `
Usage: symbridge <command> [options]

Commands:
  export  --database <snapshot> --out <doc> [--base <addr>] [--user-names-only]
  import  --database <snapshot> --in <doc> [--policy report|skip|overwrite]
          [--comment-merge report|append] [--base <addr>] [--dry-run] [--json]
  convert --in <doc> --out <doc> [--base <addr>] [--only <categories>] [--lenient]
  summary --in <doc> [--lenient]
  query <doc> <address> [-C <n>] [-B <n>] [-A <n>] [--json]
  add-function <doc> <address> <name>
  add-variable <doc> <address> <name>
  add-comment <doc> <address> <text>

Addresses accept hex (0x...) or decimal; output addresses are hex.
--only takes a comma-separated list of: ${RecordCategory.options.join(", ")}

Options:
  --lenient           Accept and keep unknown top-level keys
  -h, --help          Show this help message

Exit codes:
  0 - Success (reported merge conflicts included)
  1 - Schema, shape or I/O failure
  2 - Usage error
`;

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        database: { type: "string" },
        in: { type: "string" },
        out: { type: "string" },
        base: { type: "string" },
        "user-names-only": { type: "boolean", default: false },
        policy: { type: "string" },
        "comment-merge": { type: "string" },
        "dry-run": { type: "boolean", default: false },
        only: { type: "string" },
        lenient: { type: "boolean", default: false },
        json: { type: "boolean", default: false },
        context: { type: "string", short: "C", default: "1" },
        "before-context": { type: "string", short: "B" },
        "after-context": { type: "string", short: "A" },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Parse a command-line address: hex (0x...) or decimal, non-negative.
 */
export function parseAddress(value: string): Address {
  const trimmed = value.trim();
  let parsed = NaN;
  if (/^0x[0-9a-f]+$/i.test(trimmed)) {
    parsed = parseInt(trimmed.slice(2), 16);
  } else if (/^[0-9]+$/.test(trimmed)) {
    parsed = parseInt(trimmed, 10);
  } else if (/^-(0x)?[0-9a-f]+$/i.test(trimmed)) {
    throw new UsageError(`Address must be non-negative: ${value}`);
  }
  if (!Number.isSafeInteger(parsed)) {
    throw new UsageError(`Address must be hex (0x...) or decimal: ${value}`);
  }
  return parsed;
}

function parseCount(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^[0-9]+$/.test(value)) {
    throw new UsageError(`${flag} must be a non-negative integer: ${value}`);
  }
  return parseInt(value, 10);
}

function parseChoice<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  flag: string
): T | undefined {
  if (value === undefined) return undefined;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new UsageError(`${flag} must be one of ${allowed.join(", ")}: ${value}`);
  }
  return match;
}

function parseCategories(value: string): RecordCategory[] {
  const categories: RecordCategory[] = [];
  for (const part of value.split(",").map((piece) => piece.trim()).filter(Boolean)) {
    const category = parseChoice(part, RecordCategory.options, "--only");
    if (category !== undefined) categories.push(category);
  }
  if (categories.length === 0) {
    throw new UsageError("--only needs at least one category");
  }
  return categories;
}

function required(value: string | undefined, flag: string): string {
  if (value === undefined || value === "") {
    throw new UsageError(`${flag} is required`);
  }
  return value;
}

function positional(positionals: string[], index: number, label: string): string {
  const value = positionals[index];
  if (value === undefined) {
    throw new UsageError(`missing ${label}`);
  }
  return value;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

function painter(io: CliIo) {
  return (color: keyof typeof COLORS, text: string): string =>
    io.color ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

// ============================================================
// Commands
// ============================================================

type ParsedArgs = ReturnType<typeof parseCliArgs>;

function schemaMode(args: ParsedArgs): SchemaMode {
  return args.values.lenient ? "lenient" : config.schemaMode;
}

function runExport(args: ParsedArgs, io: CliIo): number {
  const c = painter(io);
  const databasePath = required(args.values.database, "--database");
  const outPath = required(args.values.out, "--out");
  const baseAddress = args.values.base !== undefined ? parseAddress(args.values.base) : undefined;

  const db = loadDatabaseSnapshot(databasePath);
  const { model, issues } = exportDatabase(db, {
    baseAddress,
    userNamesOnly: args.values["user-names-only"],
    logger: io.logger,
  });
  saveDocument(model, outPath);

  for (const issue of issues) {
    const where =
      issue.category === "structures"
        ? `${issue.structure}+0x${issue.offset.toString(16)}`
        : `0x${issue.address.toString(16)}`;
    io.err(c("yellow", `skipped ${issue.category} ${where}: ${issue.message}`));
  }
  io.out(
    `${c("green", "✓")} Exported ${model.functions.size} functions, ${model.names.size} names, ` +
      `${model.comments.size + model.functionComments.size} comments, ` +
      `${model.structures.size} structures to ${outPath}`
  );
  return 0;
}

function runImport(args: ParsedArgs, io: CliIo): number {
  const databasePath = required(args.values.database, "--database");
  const inPath = required(args.values.in, "--in");

  const conflictPolicy =
    parseChoice(args.values.policy, ConflictPolicy.options, "--policy") ?? config.conflictPolicy;
  const commentMerge =
    parseChoice(args.values["comment-merge"], CommentMerge.options, "--comment-merge") ??
    config.commentMerge;
  const destinationBase =
    args.values.base !== undefined ? parseAddress(args.values.base) : undefined;

  let text: string;
  try {
    text = readFileSync(inPath, "utf-8");
  } catch (err) {
    throw new DocumentIoError(
      `Failed to read document ${inPath}: ${err instanceof Error ? err.message : String(err)}`,
      inPath,
      err
    );
  }

  const db = loadDatabaseSnapshot(databasePath);
  const summary = importDocument(text, db, {
    merge: { conflictPolicy, commentMerge, destinationBase },
    mode: schemaMode(args),
    logger: io.logger,
  });

  if (!args.values["dry-run"]) {
    saveDatabaseSnapshot(db, databasePath);
  }

  io.out(args.values.json ? JSON.stringify(summary, null, 2) : formatImportSummary(summary));
  return 0;
}

function runConvert(args: ParsedArgs, io: CliIo): number {
  const c = painter(io);
  const inPath = required(args.values.in, "--in");
  const outPath = required(args.values.out, "--out");

  let model: RecordModel = loadDocument(inPath, { mode: schemaMode(args) });
  if (args.values.base !== undefined) {
    model = rebaseDocument(model, parseAddress(args.values.base));
  }
  if (args.values.only !== undefined) {
    model = filterCategories(model, parseCategories(args.values.only));
  }
  saveDocument(model, outPath);

  io.out(`${c("green", "✓")} Wrote ${outPath}`);
  return 0;
}

function runSummary(args: ParsedArgs, io: CliIo): number {
  const path = args.values.in ?? positional(args.positionals, 1, "document path");
  io.out(summarizeDocument(loadDocument(path, { mode: schemaMode(args) })));
  return 0;
}

function runQuery(args: ParsedArgs, io: CliIo): number {
  const path = positional(args.positionals, 1, "document path");
  const address = parseAddress(positional(args.positionals, 2, "address"));
  const context = parseCount(args.values.context, "--context") ?? 1;
  const before = parseCount(args.values["before-context"], "--before-context") ?? context;
  const after = parseCount(args.values["after-context"], "--after-context") ?? context;

  const result = queryAddress(loadDocument(path, { mode: schemaMode(args) }), address, before, after);
  io.out(args.values.json ? JSON.stringify(queryToJson(result), null, 2) : renderQuery(result));
  return 0;
}

function runEdit(
  args: ParsedArgs,
  io: CliIo,
  edit: (model: RecordModel, address: Address, value: string) => RecordModel
): number {
  const path = positional(args.positionals, 1, "document path");
  const address = parseAddress(positional(args.positionals, 2, "address"));
  const value = positional(args.positionals, 3, "value");

  saveDocument(edit(loadDocument(path, { mode: schemaMode(args) }), address, value), path);
  io.logger.info("Document edited", { command: args.positionals[0], path, address });
  return 0;
}

// ============================================================
// Main
// ============================================================

/**
 * Run one CLI invocation and return its exit code.
 */
export function run(argv: string[], io: CliIo): number {
  const c = painter(io);

  try {
    const args = parseCliArgs(argv);
    const command = args.positionals[0];

    if (args.values.help || command === undefined) {
      io.out(HELP);
      return command === undefined && !args.values.help ? 2 : 0;
    }

    switch (command) {
      case "export":
        return runExport(args, io);
      case "import":
        return runImport(args, io);
      case "convert":
        return runConvert(args, io);
      case "summary":
        return runSummary(args, io);
      case "query":
        return runQuery(args, io);
      case "add-function":
        return runEdit(args, io, addFunction);
      case "add-variable":
        return runEdit(args, io, addVariable);
      case "add-comment":
        return runEdit(args, io, addComment);
      default:
        throw new UsageError(`unknown command: ${command}`);
    }
  } catch (err) {
    if (err instanceof UsageError || err instanceof MergeOptionsError) {
      io.err(c("red", `Error: ${err instanceof MergeOptionsError ? err.format() : err.message}`));
      io.err("  Run with --help for usage.");
      return 2;
    }
    if (err instanceof MalformedDataError) {
      io.err(c("red", `Error: ${err.format()}`));
      return 1;
    }
    if (
      err instanceof SchemaError ||
      err instanceof DocumentIoError ||
      err instanceof AddressRangeError
    ) {
      io.err(c("red", `Error: ${err.message}`));
      return 1;
    }
    throw err;
  }
}

function main(): void {
  validateConfig();
  initRunId();
  const logger = createLogger({
    level: config.logLevel,
    file: config.logToFile,
    logDir: config.logDir,
  });

  const code = run(process.argv.slice(2), {
    out: (text) => console.log(text),
    err: (text) => console.error(text),
    color: Boolean(process.stdout.isTTY) && !process.env.NO_COLOR,
    logger: config.env === "test" ? silentLogger : logger,
  });
  process.exit(code);
}

// Only run when executed directly (not imported by tests)
const entry = process.argv[1] ?? "";
const isDirectExecution =
  entry.endsWith("symbridge.ts") || entry.endsWith("symbridge.js") || entry.endsWith("symbridge");

if (isDirectExecution) {
  try {
    main();
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}
