/**
 * Interchange document module: the Record Model, its wire schema and codec,
 * offline edits and address queries.
 *
 * ```typescript
 * import { decodeDocument, encodeDocument, addFunction } from "./document/index.js";
 *
 * const model = decodeDocument(text, { mode: "lenient" });
 * const edited = addFunction(model, 0x401000, "main");
 * const out = encodeDocument(edited); // canonical, byte-stable
 * ```
 */

export {
  SCHEMA_VERSION,
  SUPPORTED_SCHEMA_VERSIONS,
  REQUIRED_TOP_LEVEL_KEYS,
  OPTIONAL_TOP_LEVEL_KEYS,
  KNOWN_TOP_LEVEL_KEYS,
  AddressSchema,
  SectionSchema,
  StructMemberSchema,
  buildDocumentSchema,
  parseAddressKey,
  type InterchangeFile,
  type WireStructMember,
} from "./schema.js";

export {
  createRecordModel,
  toModelInit,
  documentsEqual,
  collectAddresses,
  type Address,
  type JsonValue,
  type RecordModel,
  type RecordModelInit,
  type SectionRange,
  type StructMember,
} from "./model.js";

export {
  SchemaError,
  MalformedDataError,
  DocumentIoError,
  type DocumentIssue,
} from "./errors.js";

export {
  decodeDocument,
  parseDocument,
  encodeDocument,
  toWireDocument,
  loadDocument,
  saveDocument,
  summarizeDocument,
  type DecodeOptions,
} from "./codec.js";

export {
  addFunction,
  addVariable,
  addComment,
  rebaseDocument,
  filterCategories,
} from "./edit.js";

export {
  queryAddress,
  entryAt,
  formatAddress,
  formatEntry,
  escapeComment,
  renderQuery,
  queryToJson,
  type AddressEntry,
  type QueryResult,
} from "./query.js";
