/**
 * @foldersync/core - Core contracts and sync engine for FolderSync
 *
 * This package provides:
 * - Type definitions and contracts (RemoteStore, LocalStore, RecordCodec, SyncStateStore)
 * - SyncEngine and the phases it runs (collect, reconcile, flush, upload)
 * - Structured logging and shared error types
 *
 * Core never imports adapters; the CLI wires everything together at runtime.
 */

// Export all type definitions
export {
  UNSYNCED_MODIFIED_AT,
  type RemoteID,
  type LocalRecord,
  type LocalRecordDraft,
  type RemoteFile,
  type FileMetadata,
  type ChangeEvent,
  type ChangePage,
  type FileQuery,
  type FilePage,
  type RemoteStore,
  type RecordFilter,
  type LocalStore,
  type RecordCodec,
  type ChangeEntry,
  type ChangeSet,
  type SyncState,
  type CycleCommit,
  type SyncMode,
  type CycleStats,
  type RunSummary,
  type SyncStateStore,
  type SyncSession,
} from "./types.js";

// Export engine and its phases
export { SyncEngine, type EngineConfig } from "./engine.js";
export {
  ChangeSetCollector,
  isFileInFolder,
  type CollectResult,
} from "./change-collector.js";
export { Reconciler, type ReconcileResult } from "./reconciler.js";
export { PendingDeletionFlusher, type FlushResult } from "./deletion-flusher.js";
export { NewItemUploader, type UploadResult } from "./uploader.js";
export { LinkIndex } from "./link-index.js";
export { runWithConcurrencyLimit, mapWithConcurrencyLimit } from "./concurrency.js";

// Export logging and errors
export {
  createLogger,
  levelFromEnv,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerOptions,
} from "./logger.js";
export {
  SyncError,
  RemoteStoreError,
  CodecError,
  InvariantViolationError,
  ConfigError,
  describeError,
  type SyncErrorOptions,
} from "./errors.js";
