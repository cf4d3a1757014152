/**
 * ChangeSetCollector - Turns the remote change feed (or, on first sync, a full
 * folder listing) into a ChangeSet plus the cursor to persist.
 */

import { mapWithConcurrencyLimit } from "./concurrency.js";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import type {
  ChangeEntry,
  ChangeEvent,
  ChangeSet,
  RemoteFile,
  RemoteID,
  RemoteStore,
} from "./types.js";

/**
 * Result of a collection pass.
 */
export interface CollectResult {
  changes: ChangeSet;
  /** Cursor to persist, or null to keep the stored one */
  largestChangeId: number | null;
  /** False when pagination stopped early on a failed page */
  complete: boolean;
}

/**
 * True when the file is live and sits directly in the folder.
 */
export function isFileInFolder(file: RemoteFile, folderId: string): boolean {
  return !file.trashed && file.parents.includes(folderId);
}

export class ChangeSetCollector {
  constructor(
    private readonly remote: RemoteStore,
    private readonly logger: Logger,
    private readonly fetchConcurrency: number
  ) {}

  /**
   * Collect changes made after `sinceChangeId`.
   * A failed page ends pagination; the pages already processed are kept and
   * the cursor stops at the last of them.
   */
  async collect(folderId: string, sinceChangeId: number): Promise<CollectResult> {
    const changes: ChangeSet = new Map();
    let processedMax = sinceChangeId;
    let reportedLargest = sinceChangeId;
    let pageToken: string | undefined;
    let complete = true;
    let pages = 0;

    do {
      try {
        const page = await this.remote.listChanges(sinceChangeId + 1, pageToken);
        const entries = await this.resolveEvents(page.changes, folderId);

        // Later events for the same id replace earlier ones
        for (const [fileId, entry] of entries) {
          changes.set(fileId, entry);
        }
        for (const event of page.changes) {
          processedMax = Math.max(processedMax, event.changeId);
        }
        reportedLargest = Math.max(reportedLargest, page.largestChangeId);
        pages++;
        pageToken = page.nextPageToken || undefined;
      } catch (error) {
        this.logger.error("Change page failed, stopping pagination", error, {
          page: pages,
          sinceChangeId,
        });
        complete = false;
        break;
      }
    } while (pageToken);

    const largestChangeId = complete
      ? Math.max(processedMax, reportedLargest)
      : processedMax;

    this.logger.info("Collected remote changes", {
      changes: changes.size,
      pages,
      complete,
      largestChangeId,
    });

    return { changes, largestChangeId, complete };
  }

  /**
   * Build a ChangeSet from a full listing of the folder.
   * The largest change id is read before listing so that changes landing
   * between pages are picked up by the next incremental sync.
   */
  async collectInitial(folderId: string): Promise<CollectResult> {
    const largestChangeId = await this.remote.getLargestChangeId();
    const changes: ChangeSet = new Map();
    let pageToken: string | undefined;
    let complete = true;

    do {
      try {
        const page = await this.remote.listFiles({ folderId }, pageToken);
        for (const file of page.files) {
          if (isFileInFolder(file, folderId)) {
            changes.set(file.id, { kind: "snapshot", file });
          }
        }
        pageToken = page.nextPageToken || undefined;
      } catch (error) {
        this.logger.error("File listing page failed, stopping listing", error, {
          folderId,
        });
        complete = false;
        break;
      }
    } while (pageToken);

    this.logger.info("Listed remote folder", {
      files: changes.size,
      complete,
      largestChangeId,
    });

    // An incomplete listing keeps the cursor unset so the next cycle lists again
    return {
      changes,
      largestChangeId: complete ? largestChangeId : null,
      complete,
    };
  }

  /**
   * Resolve the events of one page into ChangeSet entries, in feed order.
   * Throws if any snapshot fetch fails so the page is not applied partially.
   */
  private async resolveEvents(
    events: ChangeEvent[],
    folderId: string
  ): Promise<Array<[RemoteID, ChangeEntry]>> {
    return mapWithConcurrencyLimit(
      events,
      this.fetchConcurrency,
      async (event): Promise<[RemoteID, ChangeEntry]> => {
        if (event.deleted) {
          return [event.fileId, { kind: "tombstone" }];
        }

        let file: RemoteFile | null;
        if (event.file !== undefined) {
          file = event.file;
        } else {
          try {
            file = await this.remote.getFile(event.fileId);
          } catch (error) {
            this.logger.warn("Could not fetch changed file", {
              fileId: event.fileId,
              error: describeError(error),
            });
            throw error;
          }
        }

        // Moving out of the folder looks the same as a deletion locally
        if (file === null || !isFileInFolder(file, folderId)) {
          return [event.fileId, { kind: "tombstone" }];
        }
        return [event.fileId, { kind: "snapshot", file }];
      }
    );
  }
}
