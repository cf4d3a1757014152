/**
 * LinkIndex - Bidirectional lookup between local record ids and remote file ids.
 * Built fresh for each cycle from the linked local records; records and files
 * never reference each other directly.
 */

import { InvariantViolationError } from "./errors.js";
import type { LocalRecord, RemoteID } from "./types.js";

export class LinkIndex {
  private localToRemote: Map<string, RemoteID>;
  private remoteToLocal: Map<RemoteID, string>;

  constructor() {
    this.localToRemote = new Map();
    this.remoteToLocal = new Map();
  }

  /**
   * Build an index from linked records.
   * @throws InvariantViolationError if two records share a remote link
   */
  static fromRecords(records: readonly LocalRecord[]): LinkIndex {
    const index = new LinkIndex();
    for (const record of records) {
      if (record.remoteLink) {
        index.link(record.id, record.remoteLink);
      }
    }
    return index;
  }

  /**
   * Record that a local record owns a remote file.
   * Re-linking a record to a new file releases its previous one.
   * @throws InvariantViolationError if another record already owns the file
   */
  link(localId: string, remoteId: RemoteID): void {
    const owner = this.remoteToLocal.get(remoteId);
    if (owner !== undefined && owner !== localId) {
      throw new InvariantViolationError({
        message: `Remote file ${remoteId} is linked to both ${owner} and ${localId}`,
        details: { remoteId, owner, claimant: localId },
      });
    }

    const previous = this.localToRemote.get(localId);
    if (previous !== undefined) {
      this.remoteToLocal.delete(previous);
    }

    this.localToRemote.set(localId, remoteId);
    this.remoteToLocal.set(remoteId, localId);
  }

  /**
   * Drop the link held by a local record, if any.
   */
  unlinkLocal(localId: string): void {
    const remoteId = this.localToRemote.get(localId);
    if (remoteId === undefined) {
      return;
    }
    this.localToRemote.delete(localId);
    this.remoteToLocal.delete(remoteId);
  }

  findRemote(localId: string): RemoteID | null {
    return this.localToRemote.get(localId) ?? null;
  }

  findLocal(remoteId: RemoteID): string | null {
    return this.remoteToLocal.get(remoteId) ?? null;
  }

  get size(): number {
    return this.localToRemote.size;
  }
}
