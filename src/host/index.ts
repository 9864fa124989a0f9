/**
 * Host database collaborators.
 */

export {
  HostMutationError,
  type AnalysisDatabase,
  type AnalysisSink,
  type AnalysisSource,
  type SymbolKind,
  type SymbolName,
} from "./types.js";

export {
  MemoryDatabase,
  type MemoryDatabaseOptions,
  type MemoryDatabaseState,
  type MutationRecord,
  type StoredName,
} from "./memory.js";

export {
  DatabaseSnapshotSchema,
  databaseFromSnapshot,
  snapshotDatabase,
  loadDatabaseSnapshot,
  saveDatabaseSnapshot,
  type DatabaseSnapshot,
} from "./snapshot.js";
