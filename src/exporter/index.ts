/**
 * Exporter module.
 */

export {
  exportDatabase,
  type AddressExportIssue,
  type ExportIssue,
  type ExportOptions,
  type ExportResult,
  type StructureExportIssue,
} from "./exporter.js";
