/**
 * SqliteStateStore - SyncStateStore persisted in a SQLite database.
 *
 * Every operation is a single statement or transaction, so several processes
 * (a scheduler and a one-off `delete`) can share the same database file.
 */

import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import {
  createLogger,
  type CycleCommit,
  type CycleStats,
  type Logger,
  type RemoteID,
  type RunSummary,
  type SyncMode,
  type SyncState,
  type SyncStateStore,
} from "@foldersync/core";

/**
 * Configuration options for SqliteStateStore.
 */
export interface SqliteStateStoreOptions {
  /**
   * Path of the database file, or ":memory:". Created on open.
   */
  conn: string;
  /**
   * Number of run summaries kept per database (default: 100).
   */
  maxRuns?: number;
  logger?: Logger;
}

interface CursorRow {
  largest_change_id: number | null;
}

interface PendingRow {
  remote_id: string;
}

interface RunRow {
  run_id: string;
  account_id: string;
  mode: string | null;
  started_at: string;
  ended_at: string;
  status: string;
  cursor_before: number | null;
  cursor_after: number | null;
  stats: string;
  fatal_error: string | null;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS sync_state (
    account_id TEXT PRIMARY KEY,
    largest_change_id INTEGER
  );

  CREATE TABLE IF NOT EXISTS pending_deletions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    account_id TEXT NOT NULL,
    remote_id TEXT NOT NULL,
    UNIQUE(account_id, remote_id)
  );

  CREATE TABLE IF NOT EXISTS sync_runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id TEXT NOT NULL UNIQUE,
    account_id TEXT NOT NULL,
    mode TEXT CHECK(mode IN ('initial', 'incremental')),
    started_at TEXT NOT NULL,
    ended_at TEXT NOT NULL,
    status TEXT NOT NULL CHECK(status IN ('success', 'partial', 'failed')),
    cursor_before INTEGER,
    cursor_after INTEGER,
    stats TEXT NOT NULL,
    fatal_error TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_pending_deletions_account
    ON pending_deletions(account_id);

  CREATE INDEX IF NOT EXISTS idx_sync_runs_account
    ON sync_runs(account_id);
`;

const COUNTERS = [
  "deletionsFlushed",
  "remoteTrashed",
  "changesCollected",
  "localDeleted",
  "pushed",
  "pulled",
  "unlinked",
  "stamped",
  "imported",
  "importDropped",
  "importFailures",
  "uploaded",
  "uploadFailed",
] as const;

function isCycleStats(value: unknown): value is CycleStats {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const record: { [key: string]: unknown } = { ...value };
  return (
    COUNTERS.every((key) => typeof record[key] === "number") &&
    typeof record.changeFeedComplete === "boolean" &&
    Array.isArray(record.errors) &&
    record.errors.every((error: unknown) => typeof error === "string")
  );
}

function toSyncMode(value: string | null): SyncMode | null {
  return value === "initial" || value === "incremental" ? value : null;
}

function toRunStatus(value: string): RunSummary["status"] {
  switch (value) {
    case "success":
    case "partial":
    case "failed":
      return value;
    default:
      throw new Error(`Stored run has unknown status '${value}'`);
  }
}

function fromRunRow(row: RunRow): RunSummary {
  const stats: unknown = JSON.parse(row.stats);
  if (!isCycleStats(stats)) {
    throw new Error(`Stored run ${row.run_id} has malformed stats`);
  }
  const run: RunSummary = {
    runId: row.run_id,
    accountId: row.account_id,
    mode: toSyncMode(row.mode),
    startedAt: new Date(row.started_at),
    endedAt: new Date(row.ended_at),
    status: toRunStatus(row.status),
    cursorBefore: row.cursor_before,
    cursorAfter: row.cursor_after,
    stats,
  };
  if (row.fatal_error !== null) {
    run.fatalError = row.fatal_error;
  }
  return run;
}

function openDatabase(dbPath: string): Database.Database {
  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new Error(`Failed to open state database: ${dbPath}`, { cause: error });
  }
  try {
    db.pragma("journal_mode = WAL");
    db.pragma("busy_timeout = 5000");
    db.exec(SCHEMA);
  } catch (error) {
    db.close();
    throw new Error(`Failed to open state database: ${dbPath}`, { cause: error });
  }
  return db;
}

export class SqliteStateStore implements SyncStateStore {
  private db: Database.Database;
  private maxRuns: number;

  constructor(options: SqliteStateStoreOptions) {
    if (!options.conn) {
      throw new Error("SqliteStateStore requires conn");
    }
    const logger = options.logger ?? createLogger("sqlite-state");
    const dbPath = options.conn === ":memory:" ? options.conn : path.resolve(options.conn);
    this.maxRuns = options.maxRuns ?? 100;

    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = openDatabase(dbPath);
    logger.debug("State database opened", { dbPath });
  }

  async loadState(accountId: string): Promise<SyncState> {
    const cursor = this.db
      .prepare<[string], CursorRow>(
        "SELECT largest_change_id FROM sync_state WHERE account_id = ?"
      )
      .get(accountId);
    const pending = this.db
      .prepare<[string], PendingRow>(
        "SELECT remote_id FROM pending_deletions WHERE account_id = ? ORDER BY id"
      )
      .all(accountId);
    return {
      largestChangeId: cursor?.largest_change_id ?? null,
      pendingDeletionIds: pending.map((row) => row.remote_id),
    };
  }

  async queueDeletion(accountId: string, remoteId: RemoteID): Promise<void> {
    this.db
      .prepare<[string, string]>(
        "INSERT OR IGNORE INTO pending_deletions (account_id, remote_id) VALUES (?, ?)"
      )
      .run(accountId, remoteId);
  }

  /**
   * The cursor only moves forward; ids queued since the cycle started stay pending.
   */
  async commitCycle(accountId: string, commit: CycleCommit): Promise<void> {
    const upsertCursor = this.db.prepare<[string, number]>(
      `INSERT INTO sync_state (account_id, largest_change_id) VALUES (?, ?)
       ON CONFLICT(account_id) DO UPDATE SET largest_change_id =
         MAX(COALESCE(sync_state.largest_change_id, excluded.largest_change_id),
             excluded.largest_change_id)`
    );
    const removePending = this.db.prepare<[string, string]>(
      "DELETE FROM pending_deletions WHERE account_id = ? AND remote_id = ?"
    );

    const apply = this.db.transaction((largestChangeId: number | null, flushed: RemoteID[]) => {
      if (largestChangeId !== null) {
        upsertCursor.run(accountId, largestChangeId);
      }
      for (const remoteId of flushed) {
        removePending.run(accountId, remoteId);
      }
    });
    apply.immediate(commit.largestChangeId, commit.flushedDeletionIds);
  }

  async insertRun(run: RunSummary): Promise<void> {
    const insert = this.db.prepare<
      [string, string, string | null, string, string, string, number | null, number | null, string, string | null]
    >(
      `INSERT INTO sync_runs (run_id, account_id, mode, started_at, ended_at, status,
         cursor_before, cursor_after, stats, fatal_error)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const prune = this.db.prepare<[number]>(
      `DELETE FROM sync_runs WHERE id NOT IN (
         SELECT id FROM sync_runs ORDER BY id DESC LIMIT ?
       )`
    );

    const apply = this.db.transaction(() => {
      insert.run(
        run.runId,
        run.accountId,
        run.mode,
        run.startedAt.toISOString(),
        run.endedAt.toISOString(),
        run.status,
        run.cursorBefore,
        run.cursorAfter,
        JSON.stringify(run.stats),
        run.fatalError ?? null
      );
      prune.run(this.maxRuns);
    });
    apply.immediate();
  }

  async getRuns(accountId: string): Promise<RunSummary[]> {
    return this.db
      .prepare<[string], RunRow>("SELECT * FROM sync_runs WHERE account_id = ? ORDER BY id")
      .all(accountId)
      .map(fromRunRow);
  }

  /**
   * Close the database connection (for cleanup/testing).
   */
  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
