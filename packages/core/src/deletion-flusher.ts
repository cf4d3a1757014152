/**
 * PendingDeletionFlusher - Trashes remote files whose local records were deleted.
 * Runs before the change feed is read so the trash events it causes arrive
 * as ordinary tombstones for ids no local record owns any more.
 */

import { isFileInFolder } from "./change-collector.js";
import type { Logger } from "./logger.js";
import type { RemoteID, RemoteStore } from "./types.js";

export interface FlushResult {
  /** Every id handled, whether or not the remote call succeeded */
  flushedIds: RemoteID[];
  trashed: number;
  failed: number;
}

export class PendingDeletionFlusher {
  constructor(
    private readonly remote: RemoteStore,
    private readonly logger: Logger
  ) {}

  /**
   * Trash each queued file still in the folder. Failed ids are dropped, not retried:
   * a file that vanished or left the folder needs no trashing.
   */
  async flush(pendingIds: readonly RemoteID[], folderId: string): Promise<FlushResult> {
    const result: FlushResult = { flushedIds: [], trashed: 0, failed: 0 };

    for (const id of new Set(pendingIds)) {
      try {
        const file = await this.remote.getFile(id);
        if (file !== null && isFileInFolder(file, folderId)) {
          await this.remote.trashFile(id);
          result.trashed++;
          this.logger.debug("Trashed remote file", { remoteId: id });
        }
      } catch (error) {
        result.failed++;
        this.logger.error("Failed to trash remote file, dropping it", error, {
          remoteId: id,
        });
      }
      result.flushedIds.push(id);
    }

    if (result.flushedIds.length > 0) {
      this.logger.info("Flushed pending deletions", {
        flushed: result.flushedIds.length,
        trashed: result.trashed,
        failed: result.failed,
      });
    }
    return result;
  }
}
