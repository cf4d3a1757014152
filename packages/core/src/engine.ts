/**
 * SyncEngine - Runs one sync cycle between a local store and a remote folder.
 * Implements the flush-collect-reconcile-upload-commit loop.
 */

import { ChangeSetCollector, type CollectResult } from "./change-collector.js";
import { PendingDeletionFlusher } from "./deletion-flusher.js";
import { describeError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { Reconciler } from "./reconciler.js";
import { NewItemUploader } from "./uploader.js";
import type {
  CycleStats,
  RunSummary,
  SyncMode,
  SyncSession,
  SyncStateStore,
} from "./types.js";

/**
 * Engine configuration shared by every session it runs.
 */
export interface EngineConfig {
  stateStore: SyncStateStore;
  /** Snapshot fetches in flight while collecting a change page */
  fetchConcurrency?: number;
  /** Uploads in flight while creating new remote files */
  uploadConcurrency?: number;
  logger?: Logger;
}

/**
 * Default engine tunables.
 */
const DEFAULT_CONCURRENCY = {
  fetchConcurrency: 4,
  uploadConcurrency: 4,
};

function emptyStats(): CycleStats {
  return {
    deletionsFlushed: 0,
    remoteTrashed: 0,
    changesCollected: 0,
    changeFeedComplete: true,
    localDeleted: 0,
    pushed: 0,
    pulled: 0,
    unlinked: 0,
    stamped: 0,
    imported: 0,
    importDropped: 0,
    importFailures: 0,
    uploaded: 0,
    uploadFailed: 0,
    errors: [],
  };
}

/**
 * SyncEngine reconciles sessions one cycle at a time.
 *
 * Callers must not run two cycles for the same account at once; the
 * scheduler is responsible for that.
 */
export class SyncEngine {
  private stateStore: SyncStateStore;
  private fetchConcurrency: number;
  private uploadConcurrency: number;
  private logger: Logger;

  constructor(config: EngineConfig) {
    this.stateStore = config.stateStore;
    this.fetchConcurrency =
      config.fetchConcurrency ?? DEFAULT_CONCURRENCY.fetchConcurrency;
    this.uploadConcurrency =
      config.uploadConcurrency ?? DEFAULT_CONCURRENCY.uploadConcurrency;
    this.logger = config.logger ?? createLogger("engine");
  }

  /**
   * Execute one sync cycle:
   * 1. Load state
   * 2. Trash remote files for locally deleted records
   * 3. Collect changes (full listing when no cursor is stored)
   * 4. Reconcile linked records and import new remote files
   * 5. Upload unsynced local records
   * 6. Commit cursor and flushed deletions
   *
   * Per-item failures are logged and counted. Any other failure ends the
   * cycle with a "failed" summary and commits nothing.
   */
  async run(session: SyncSession): Promise<RunSummary> {
    const runId = this.generateRunId();
    const startedAt = new Date();
    const { accountId, folderId } = session;
    const log = this.logger.child({ runId, accountId });
    const stats = emptyStats();
    let mode: SyncMode | null = null;
    let cursorBefore: number | null = null;

    log.info("Starting sync cycle", { folderId });

    try {
      // Step 1: Load state
      const state = await this.stateStore.loadState(accountId);
      cursorBefore = state.largestChangeId;
      mode = cursorBefore === null ? "initial" : "incremental";

      // Step 2: Flush pending deletions
      const flusher = new PendingDeletionFlusher(session.remote, log);
      const flushed = await flusher.flush(state.pendingDeletionIds, folderId);
      stats.deletionsFlushed = flushed.flushedIds.length;
      stats.remoteTrashed = flushed.trashed;

      // Step 3: Collect changes
      const collector = new ChangeSetCollector(
        session.remote,
        log,
        this.fetchConcurrency
      );
      let collected: CollectResult;
      if (cursorBefore === null) {
        collected = await collector.collectInitial(folderId);
      } else {
        collected = await collector.collect(folderId, cursorBefore);
      }
      stats.changesCollected = collected.changes.size;
      stats.changeFeedComplete = collected.complete;

      // Step 4: Reconcile
      const linked = await session.local.listRecords("linked");
      const reconciler = new Reconciler(session, log);
      const reconciled = await reconciler.reconcile(linked, collected.changes);
      stats.localDeleted = reconciled.localDeleted;
      stats.pushed = reconciled.pushed;
      stats.pulled = reconciled.pulled;
      stats.unlinked = reconciled.unlinked;
      stats.stamped = reconciled.stamped;
      stats.imported = reconciled.imported;
      stats.importDropped = reconciled.importDropped;
      stats.importFailures = reconciled.importFailures;
      stats.errors.push(...reconciled.errors);

      // Step 5: Upload unsynced records
      const uploader = new NewItemUploader(session, log, this.uploadConcurrency);
      const uploaded = await uploader.upload();
      stats.uploaded = uploaded.uploaded;
      stats.uploadFailed = uploaded.failed;
      stats.errors.push(...uploaded.errors);

      // Step 6: Commit. Failed imports keep the cursor so their events come back.
      let cursorAfter = collected.largestChangeId;
      if (reconciled.failedImportIds.length > 0) {
        log.warn("Holding cursor until failed imports succeed", {
          heldCursor: cursorBefore,
          collectedCursor: collected.largestChangeId,
          failedRemoteIds: reconciled.failedImportIds,
        });
        cursorAfter = null;
      }
      await this.stateStore.commitCycle(accountId, {
        largestChangeId: cursorAfter,
        flushedDeletionIds: flushed.flushedIds,
      });
      const committed = await this.stateStore.loadState(accountId);

      const status = stats.errors.length > 0 ? "partial" : "success";
      const summary = this.createRunSummary(runId, accountId, startedAt, status, {
        mode,
        cursorBefore,
        cursorAfter: committed.largestChangeId,
        stats,
      });
      // The commit above stands even when the run log cannot be written
      try {
        await this.stateStore.insertRun(summary);
      } catch (logError) {
        log.error("Failed to record run summary", logError);
      }

      log.info("Sync cycle completed", {
        status,
        mode,
        cursor: committed.largestChangeId,
        durationMs: summary.endedAt.getTime() - startedAt.getTime(),
      });
      return summary;
    } catch (error) {
      const errorMsg = describeError(error);
      stats.errors.push(errorMsg);
      log.error("Sync cycle failed", error);

      const summary = this.createRunSummary(runId, accountId, startedAt, "failed", {
        mode,
        cursorBefore,
        cursorAfter: cursorBefore,
        stats,
        fatalError: errorMsg,
      });
      try {
        await this.stateStore.insertRun(summary);
      } catch (logError) {
        log.error("Failed to record run summary", logError);
      }
      return summary;
    }
  }

  /**
   * Delete a local record and queue its remote file for trashing.
   * This is the hook the application calls when a user deletes a record.
   * @returns false when the record does not exist
   */
  async deleteRecord(session: SyncSession, recordId: string): Promise<boolean> {
    const record = await session.local.getRecord(recordId);
    if (record === null) {
      return false;
    }
    await session.local.deleteRecord(recordId);
    if (record.remoteLink) {
      await this.stateStore.queueDeletion(session.accountId, record.remoteLink);
    }
    this.logger.info("Deleted local record", {
      accountId: session.accountId,
      recordId,
      queuedRemoteId: record.remoteLink || null,
    });
    return true;
  }

  /**
   * Generate a unique run ID.
   */
  private generateRunId(): string {
    return `run_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }

  /**
   * Create a RunSummary object.
   */
  private createRunSummary(
    runId: string,
    accountId: string,
    startedAt: Date,
    status: RunSummary["status"],
    details: Pick<RunSummary, "mode" | "cursorBefore" | "cursorAfter" | "stats" | "fatalError">
  ): RunSummary {
    return {
      runId,
      accountId,
      startedAt,
      endedAt: new Date(),
      status,
      ...details,
    };
  }
}
