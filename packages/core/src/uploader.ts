/**
 * NewItemUploader - Creates remote files for local records that have none.
 */

import { runWithConcurrencyLimit } from "./concurrency.js";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { LocalRecord, SyncSession } from "./types.js";

export interface UploadResult {
  uploaded: number;
  failed: number;
  /** Records left alone because they are being written locally */
  skipped: number;
  errors: string[];
}

export class NewItemUploader {
  constructor(
    private readonly session: SyncSession,
    private readonly logger: Logger,
    private readonly concurrency: number
  ) {}

  /**
   * Upload every unsynced record. A failed upload leaves the record unsynced
   * for the next cycle and does not stop the others.
   */
  async upload(): Promise<UploadResult> {
    const { local } = this.session;
    const result: UploadResult = { uploaded: 0, failed: 0, skipped: 0, errors: [] };

    const unlinked = await local.listRecords("unlinked");
    const activeId = await local.getActiveRecordId();
    const candidates = unlinked.filter((record) => {
      if (record.id === activeId) {
        result.skipped++;
        return false;
      }
      return true;
    });

    await runWithConcurrencyLimit(candidates, this.concurrency, async (record) => {
      try {
        await this.uploadRecord(record);
        result.uploaded++;
      } catch (error) {
        result.failed++;
        result.errors.push(`Failed to upload record ${record.id}: ${describeError(error)}`);
        this.logger.error("Failed to upload record", error, { recordId: record.id });
      }
    });

    if (candidates.length > 0) {
      this.logger.info("Uploaded new records", {
        uploaded: result.uploaded,
        failed: result.failed,
        skipped: result.skipped,
      });
    }
    return result;
  }

  private async uploadRecord(record: LocalRecord): Promise<void> {
    const { remote, local, codec, folderId } = this.session;
    const content = await codec.encode(record);
    const created = await remote.createFile(
      {
        name: codec.fileName(record),
        folderId,
        mimeType: codec.mimeType,
        modifiedAt: record.modifiedAt,
      },
      content
    );
    await local.updateRecord({
      ...record,
      remoteLink: created.id,
      modifiedAt: created.modifiedAt,
    });
    this.logger.debug("Uploaded record", { recordId: record.id, remoteId: created.id });
  }
}
