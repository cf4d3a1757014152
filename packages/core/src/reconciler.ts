/**
 * Reconciler - Applies a collected ChangeSet to the local store.
 *
 * Each linked local record claims its remote id from the ChangeSet and is
 * deleted, merged, or re-checked against the remote store. Whatever is left
 * unclaimed afterwards is imported as new local records.
 */

import { isFileInFolder } from "./change-collector.js";
import { CodecError, describeError } from "./errors.js";
import { LinkIndex } from "./link-index.js";
import type { Logger } from "./logger.js";
import {
  UNSYNCED_MODIFIED_AT,
  type ChangeSet,
  type LocalRecord,
  type RemoteFile,
  type RemoteID,
  type SyncSession,
} from "./types.js";

/**
 * What happened to each local record and unclaimed change.
 */
export interface ReconcileResult {
  localDeleted: number;
  pushed: number;
  pulled: number;
  unlinked: number;
  /** Conflicts settled by adopting the remote timestamp without content changes */
  stamped: number;
  imported: number;
  /** New remote files whose content did not decode to exactly one record */
  importDropped: number;
  /** New remote files that could not be downloaded; they must be re-delivered */
  importFailures: number;
  failedImportIds: RemoteID[];
  errors: string[];
}

type MergeOutcome = "noop" | "pushed" | "pulled" | "stamped";

export class Reconciler {
  constructor(
    private readonly session: SyncSession,
    private readonly logger: Logger
  ) {}

  /**
   * Reconcile linked local records against the ChangeSet.
   * The ChangeSet is consumed: every handled id is removed from it.
   * @throws InvariantViolationError if two records share a remote link
   */
  async reconcile(
    linkedRecords: readonly LocalRecord[],
    changes: ChangeSet
  ): Promise<ReconcileResult> {
    const result: ReconcileResult = {
      localDeleted: 0,
      pushed: 0,
      pulled: 0,
      unlinked: 0,
      stamped: 0,
      imported: 0,
      importDropped: 0,
      importFailures: 0,
      failedImportIds: [],
      errors: [],
    };
    const links = LinkIndex.fromRecords(linkedRecords);

    for (const record of linkedRecords) {
      if (!record.remoteLink) {
        continue;
      }
      try {
        await this.reconcileRecord(record, changes, links, result);
      } catch (error) {
        const msg = `Failed to reconcile record ${record.id}: ${describeError(error)}`;
        result.errors.push(msg);
        this.logger.error("Failed to reconcile record", error, {
          recordId: record.id,
          remoteId: record.remoteLink,
        });
      }
    }

    await this.importNewFiles(changes, links, result);
    return result;
  }

  private async reconcileRecord(
    record: LocalRecord,
    changes: ChangeSet,
    links: LinkIndex,
    result: ReconcileResult
  ): Promise<void> {
    const { local, remote, folderId } = this.session;
    const remoteId = record.remoteLink;
    const entry = changes.get(remoteId);

    if (entry !== undefined) {
      changes.delete(remoteId);

      if (entry.kind === "tombstone") {
        this.logger.debug("Deleting local record removed remotely", {
          recordId: record.id,
          remoteId,
        });
        await local.deleteRecord(record.id);
        links.unlinkLocal(record.id);
        result.localDeleted++;
        return;
      }

      this.count(await this.merge(record, entry.file, links), result);
      return;
    }

    // Not in the feed: check the file directly
    let file: RemoteFile | null;
    try {
      file = await remote.getFile(remoteId);
    } catch (error) {
      const msg = `Failed to fetch remote file ${remoteId}: ${describeError(error)}`;
      result.errors.push(msg);
      this.logger.warn("Could not fetch linked file, skipping record", {
        recordId: record.id,
        remoteId,
        error: describeError(error),
      });
      return;
    }

    if (file === null || !isFileInFolder(file, folderId)) {
      // Moved away or deleted without a feed event: upload it again as new
      this.logger.info("Linked file left the folder, unlinking record", {
        recordId: record.id,
        remoteId,
      });
      await local.updateRecord({
        ...record,
        remoteLink: "",
        modifiedAt: UNSYNCED_MODIFIED_AT,
      });
      links.unlinkLocal(record.id);
      result.unlinked++;
      return;
    }

    this.count(await this.merge(record, file, links), result);
  }

  /**
   * Settle a linked pair by comparing modified times; the newer side wins
   * the whole record.
   */
  private async merge(
    record: LocalRecord,
    file: RemoteFile,
    links: LinkIndex
  ): Promise<MergeOutcome> {
    if (record.modifiedAt > file.modifiedAt) {
      return this.push(record, file);
    }
    if (record.modifiedAt < file.modifiedAt) {
      return this.pull(record, file, links);
    }
    return "noop";
  }

  private async push(record: LocalRecord, file: RemoteFile): Promise<MergeOutcome> {
    const { remote, codec, local, folderId } = this.session;
    this.logger.debug("Pushing local change", {
      recordId: record.id,
      remoteId: file.id,
    });

    let updated: RemoteFile;
    try {
      const content = await codec.encode(record);
      updated = await remote.updateFile(
        file.id,
        {
          name: codec.fileName(record),
          folderId,
          mimeType: codec.mimeType,
          modifiedAt: record.modifiedAt,
        },
        content
      );
    } catch (error) {
      // Give up the local edit so the same conflict is not detected every cycle
      this.logger.error("Failed to push local change, adopting remote time", error, {
        recordId: record.id,
        remoteId: file.id,
      });
      await this.stamp(record, file.modifiedAt);
      return "stamped";
    }

    if (updated.modifiedAt !== record.modifiedAt) {
      await local.updateRecord({ ...record, modifiedAt: updated.modifiedAt });
    }
    return "pushed";
  }

  private async pull(
    record: LocalRecord,
    file: RemoteFile,
    links: LinkIndex
  ): Promise<MergeOutcome> {
    const { local } = this.session;
    this.logger.debug("Pulling remote change", {
      recordId: record.id,
      remoteId: file.id,
    });

    let importedIds: string[];
    try {
      importedIds = await this.download(file);
    } catch (error) {
      this.logger.error("Failed to pull remote change, adopting remote time", error, {
        recordId: record.id,
        remoteId: file.id,
      });
      await this.stamp(record, file.modifiedAt);
      return "stamped";
    }

    if (importedIds.length !== 1) {
      // Unusable remote content: keep the local record as it is
      this.logger.warn("Remote file did not decode to one record", {
        recordId: record.id,
        remoteId: file.id,
        decoded: importedIds.length,
      });
      await this.discard(importedIds);
      await this.stamp(record, file.modifiedAt);
      return "stamped";
    }

    await local.deleteRecord(record.id);
    links.unlinkLocal(record.id);
    await this.adopt(importedIds[0], file, links);
    return "pulled";
  }

  /**
   * Import every unclaimed snapshot as a new local record.
   */
  private async importNewFiles(
    changes: ChangeSet,
    links: LinkIndex,
    result: ReconcileResult
  ): Promise<void> {
    for (const [remoteId, entry] of changes) {
      // Tombstones for files no local record knows about need nothing
      if (entry.kind === "tombstone") {
        continue;
      }

      let importedIds: string[];
      try {
        importedIds = await this.download(entry.file);
      } catch (error) {
        if (error instanceof CodecError) {
          this.logger.warn("Skipping remote file with unreadable content", {
            remoteId,
            error: describeError(error),
          });
          result.importDropped++;
          continue;
        }
        const msg = `Failed to import remote file ${remoteId}: ${describeError(error)}`;
        result.errors.push(msg);
        result.importFailures++;
        result.failedImportIds.push(remoteId);
        this.logger.error("Failed to import remote file", error, { remoteId });
        continue;
      }

      if (importedIds.length !== 1) {
        this.logger.warn("Skipping remote file that did not decode to one record", {
          remoteId,
          decoded: importedIds.length,
        });
        await this.discard(importedIds);
        result.importDropped++;
        continue;
      }

      try {
        await this.adopt(importedIds[0], entry.file, links);
        result.imported++;
        this.logger.debug("Imported remote file", {
          remoteId,
          recordId: importedIds[0],
        });
      } catch (error) {
        const msg = `Failed to link imported record for ${remoteId}: ${describeError(error)}`;
        result.errors.push(msg);
        this.logger.error("Failed to link imported record", error, { remoteId });
      }
    }
    changes.clear();
  }

  /**
   * Download and decode a remote file into new local records.
   * A file without content decodes to nothing.
   */
  private async download(file: RemoteFile): Promise<string[]> {
    const { remote, codec } = this.session;
    if (!file.downloadUrl) {
      this.logger.debug("Remote file has no download URL", { remoteId: file.id });
      return [];
    }
    const content = await remote.downloadContent(file.downloadUrl);
    return codec.decode(content);
  }

  /**
   * Link a freshly imported record to the file it came from.
   */
  private async adopt(recordId: string, file: RemoteFile, links: LinkIndex): Promise<void> {
    const { local } = this.session;
    const imported = await local.getRecord(recordId);
    if (imported === null) {
      throw new Error(`Imported record ${recordId} disappeared`);
    }
    links.link(imported.id, file.id);
    await local.updateRecord({
      ...imported,
      remoteLink: file.id,
      modifiedAt: file.modifiedAt,
    });
  }

  private async stamp(record: LocalRecord, modifiedAt: number): Promise<void> {
    await this.session.local.updateRecord({ ...record, modifiedAt });
  }

  private async discard(recordIds: string[]): Promise<void> {
    for (const id of recordIds) {
      await this.session.local.deleteRecord(id);
    }
  }

  private count(outcome: MergeOutcome, result: ReconcileResult): void {
    switch (outcome) {
      case "pushed":
        result.pushed++;
        break;
      case "pulled":
        result.pulled++;
        break;
      case "stamped":
        result.stamped++;
        break;
      case "noop":
        break;
    }
  }
}
