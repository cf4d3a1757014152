/**
 * InMemoryLocalStore - An in-memory implementation of LocalStore for testing.
 */

import type {
  LocalRecord,
  LocalRecordDraft,
  LocalStore,
  RecordFilter,
} from "@foldersync/core";

export class InMemoryLocalStore implements LocalStore {
  private records: Map<string, LocalRecord>;
  private nextId: number;
  private activeRecordId: string | null;

  constructor(initialRecords: LocalRecord[] = []) {
    this.records = new Map();
    this.nextId = 1;
    this.activeRecordId = null;
    for (const record of initialRecords) {
      this.records.set(record.id, { ...record });
    }
  }

  async listRecords(filter: RecordFilter): Promise<LocalRecord[]> {
    return this.getAllRecords().filter((record) =>
      filter === "linked" ? record.remoteLink !== "" : record.remoteLink === ""
    );
  }

  async getRecord(id: string): Promise<LocalRecord | null> {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async createRecord(draft: LocalRecordDraft): Promise<LocalRecord> {
    let id = `rec_${this.nextId++}`;
    while (this.records.has(id)) {
      id = `rec_${this.nextId++}`;
    }
    const record: LocalRecord = { id, ...draft };
    this.records.set(id, record);
    return { ...record };
  }

  async updateRecord(record: LocalRecord): Promise<void> {
    if (!this.records.has(record.id)) {
      throw new Error(`Record not found: ${record.id}`);
    }
    this.records.set(record.id, { ...record });
  }

  async deleteRecord(id: string): Promise<void> {
    this.records.delete(id);
  }

  async getActiveRecordId(): Promise<string | null> {
    return this.activeRecordId;
  }

  // --- Helper methods for testing/debugging ---

  /**
   * Mark a record as being written locally (null to clear).
   */
  setActiveRecord(id: string | null): void {
    this.activeRecordId = id;
  }

  /**
   * Manually add a record (useful for testing/debugging).
   */
  addRecord(record: LocalRecord): void {
    this.records.set(record.id, { ...record });
  }

  /**
   * Get all current records (useful for testing/debugging).
   */
  getAllRecords(): LocalRecord[] {
    return Array.from(this.records.values()).map((record) => ({ ...record }));
  }

  /**
   * Find the record linked to a remote file (useful for testing/debugging).
   */
  findByRemoteLink(remoteId: string): LocalRecord | undefined {
    return this.getAllRecords().find((record) => record.remoteLink === remoteId);
  }
}
