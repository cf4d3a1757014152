/**
 * Core type definitions and contracts for FolderSync.
 * These interfaces define the protocol that remote stores, local stores,
 * codecs and state stores must implement.
 */

/**
 * Modified time given to a record whose remote link was cleared.
 * Any real remote timestamp is greater, so the record never wins a merge by accident.
 */
export const UNSYNCED_MODIFIED_AT = -1;

/**
 * Identifier for a file in the remote store.
 */
export type RemoteID = string;

/**
 * A record held by the local store.
 */
export interface LocalRecord {
  /** Stable local identifier */
  id: string;
  /** ID of the linked remote file; empty string when the record is unsynced */
  remoteLink: RemoteID;
  /** Last modification time in epoch milliseconds */
  modifiedAt: number;
  name: string;
  /** Record body as stored locally */
  content: string;
}

/**
 * Fields needed to create a local record; the store assigns the id.
 */
export type LocalRecordDraft = Omit<LocalRecord, "id">;

/**
 * A file in the remote store, as last seen by the engine.
 */
export interface RemoteFile {
  id: RemoteID;
  name: string;
  /** IDs of the folders containing the file */
  parents: string[];
  /** Last modification time in epoch milliseconds */
  modifiedAt: number;
  trashed: boolean;
  /** Locator passed to downloadContent; null when the file has no content */
  downloadUrl: string | null;
  mimeType: string;
}

/**
 * Metadata sent with createFile/updateFile.
 */
export interface FileMetadata {
  name: string;
  folderId: string;
  mimeType: string;
  /** Requested modified time; stores that cannot honour it report their own */
  modifiedAt: number;
}

/**
 * One entry of the remote change feed, as returned by the gateway.
 */
export interface ChangeEvent {
  changeId: number;
  fileId: RemoteID;
  /** True when the file was permanently removed */
  deleted: boolean;
  /**
   * Snapshot of the file at the time of the listing, for gateways that
   * inline it. When undefined the collector fetches it.
   */
  file?: RemoteFile | null;
}

/**
 * A page of the change feed.
 */
export interface ChangePage {
  changes: ChangeEvent[];
  nextPageToken: string | null;
  /** Largest change id known to the store when the page was produced */
  largestChangeId: number;
}

/**
 * Query for a full file listing.
 */
export interface FileQuery {
  folderId: string;
  mimeType?: string;
}

/**
 * A page of a full file listing.
 */
export interface FilePage {
  files: RemoteFile[];
  nextPageToken: string | null;
}

/**
 * Remote Store Gateway. Every failure is thrown.
 */
export interface RemoteStore {
  listFiles(query: FileQuery, pageToken?: string): Promise<FilePage>;

  /**
   * List changes starting at (and including) the given change id.
   */
  listChanges(startChangeId: number, pageToken?: string): Promise<ChangePage>;

  /**
   * Fetch a single file. Resolves to null when the store does not know the id.
   */
  getFile(id: RemoteID): Promise<RemoteFile | null>;

  trashFile(id: RemoteID): Promise<void>;

  createFile(metadata: FileMetadata, content: Uint8Array): Promise<RemoteFile>;

  updateFile(
    id: RemoteID,
    metadata: FileMetadata,
    content: Uint8Array
  ): Promise<RemoteFile>;

  /**
   * Download file content from a RemoteFile's downloadUrl.
   */
  downloadContent(locator: string): Promise<Uint8Array>;

  /**
   * Largest change id at the time of the call. Only used to start an initial sync.
   */
  getLargestChangeId(): Promise<number>;
}

/**
 * Predicate for enumerating local records.
 */
export type RecordFilter = "linked" | "unlinked";

/**
 * Local record persistence.
 */
export interface LocalStore {
  listRecords(filter: RecordFilter): Promise<LocalRecord[]>;
  getRecord(id: string): Promise<LocalRecord | null>;
  createRecord(draft: LocalRecordDraft): Promise<LocalRecord>;
  updateRecord(record: LocalRecord): Promise<void>;
  deleteRecord(id: string): Promise<void>;

  /**
   * ID of the record currently being written locally, if any.
   * That record is never uploaded.
   */
  getActiveRecordId(): Promise<string | null>;
}

/**
 * Converts between downloaded file content and local records.
 */
export interface RecordCodec {
  readonly mimeType: string;

  /**
   * Remote file name used for a record.
   */
  fileName(record: LocalRecord): string;

  /**
   * Import file content as new local records.
   * @returns IDs of the records created; callers inspect the count
   */
  decode(content: Uint8Array): Promise<string[]>;

  encode(record: LocalRecord): Promise<Uint8Array>;
}

/**
 * An entry of a ChangeSet: the latest snapshot of a file, or a tombstone
 * when the file is gone or no longer in the synced folder.
 */
export type ChangeEntry =
  | { kind: "snapshot"; file: RemoteFile }
  | { kind: "tombstone" };

/**
 * Changes collected for one cycle, keyed by remote id.
 */
export type ChangeSet = Map<RemoteID, ChangeEntry>;

/**
 * Persisted per-account state.
 */
export interface SyncState {
  /** Largest fully processed change id; null until the initial sync commits */
  largestChangeId: number | null;
  /** Remote ids queued for trashing */
  pendingDeletionIds: RemoteID[];
}

/**
 * What a successful cycle writes back to the state store.
 */
export interface CycleCommit {
  /** New cursor, or null to keep the stored one */
  largestChangeId: number | null;
  /** Pending deletions handled by this cycle */
  flushedDeletionIds: RemoteID[];
}

/**
 * Sync mode chosen for a cycle.
 */
export type SyncMode = "initial" | "incremental";

/**
 * Counters gathered while running a cycle.
 */
export interface CycleStats {
  deletionsFlushed: number;
  remoteTrashed: number;
  changesCollected: number;
  changeFeedComplete: boolean;
  localDeleted: number;
  pushed: number;
  pulled: number;
  unlinked: number;
  stamped: number;
  imported: number;
  importDropped: number;
  importFailures: number;
  uploaded: number;
  uploadFailed: number;
  errors: string[];
}

/**
 * Summary of a sync run.
 */
export interface RunSummary {
  runId: string;
  accountId: string;
  mode: SyncMode | null;
  startedAt: Date;
  endedAt: Date;
  status: "success" | "partial" | "failed";
  cursorBefore: number | null;
  cursorAfter: number | null;
  stats: CycleStats;
  fatalError?: string;
}

/**
 * Persistence for cursors, pending deletions and run logs.
 * Implementations can use a JSON file, SQLite, or any other persistence layer.
 */
export interface SyncStateStore {
  /**
   * Load the state for an account. Unknown accounts get an unset cursor.
   */
  loadState(accountId: string): Promise<SyncState>;

  /**
   * Queue a remote file for trashing on the next cycle.
   */
  queueDeletion(accountId: string, remoteId: RemoteID): Promise<void>;

  /**
   * Write the outcome of a successful cycle.
   * The cursor never moves backwards, and ids queued after the cycle
   * loaded its state are kept.
   */
  commitCycle(accountId: string, commit: CycleCommit): Promise<void>;

  /**
   * Insert a summary record for a sync run.
   */
  insertRun(run: RunSummary): Promise<void>;

  /**
   * Get the run history of an account, oldest first.
   */
  getRuns(accountId: string): Promise<RunSummary[]>;
}

/**
 * Explicit context for one sync cycle.
 */
export interface SyncSession {
  accountId: string;
  /** Remote folder holding the synced files */
  folderId: string;
  remote: RemoteStore;
  local: LocalStore;
  codec: RecordCodec;
}
