/**
 * DirectoryLocalStore - LocalStore keeping one JSON file per record in a directory.
 * A `.active` file, when present, names the record currently being written.
 */

import { randomUUID } from "node:crypto";
import * as fs from "fs/promises";
import * as path from "path";
import type {
  LocalRecord,
  LocalRecordDraft,
  LocalStore,
  RecordFilter,
} from "@foldersync/core";

const ACTIVE_FILE = ".active";
const RECORD_SUFFIX = ".json";

/**
 * Configuration options for DirectoryLocalStore.
 */
export interface DirectoryLocalStoreOptions {
  /**
   * Directory holding the record files. Created on first write.
   */
  path: string;
}

function isLocalRecord(value: unknown): value is LocalRecord {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "id" in value &&
    typeof value.id === "string" &&
    "remoteLink" in value &&
    typeof value.remoteLink === "string" &&
    "modifiedAt" in value &&
    typeof value.modifiedAt === "number" &&
    "name" in value &&
    typeof value.name === "string" &&
    "content" in value &&
    typeof value.content === "string"
  );
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class DirectoryLocalStore implements LocalStore {
  private dir: string;

  constructor(options: DirectoryLocalStoreOptions) {
    if (!options.path) {
      throw new Error("DirectoryLocalStore requires path");
    }
    this.dir = path.resolve(options.path);
  }

  async listRecords(filter: RecordFilter): Promise<LocalRecord[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const records: LocalRecord[] = [];
    for (const name of names.sort()) {
      if (!name.endsWith(RECORD_SUFFIX)) {
        continue;
      }
      const record = await this.getRecord(name.slice(0, -RECORD_SUFFIX.length));
      if (record === null) {
        continue;
      }
      const linked = record.remoteLink !== "";
      if ((filter === "linked") === linked) {
        records.push(record);
      }
    }
    return records;
  }

  async getRecord(id: string): Promise<LocalRecord | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.recordPath(id), "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isLocalRecord(parsed) || parsed.id !== id) {
      throw new Error(`Malformed record file: ${this.recordPath(id)}`);
    }
    return parsed;
  }

  async createRecord(draft: LocalRecordDraft): Promise<LocalRecord> {
    const record: LocalRecord = { id: randomUUID(), ...draft };
    await this.write(record);
    return record;
  }

  async updateRecord(record: LocalRecord): Promise<void> {
    if ((await this.getRecord(record.id)) === null) {
      throw new Error(`Record not found: ${record.id}`);
    }
    await this.write(record);
  }

  async deleteRecord(id: string): Promise<void> {
    await fs.rm(this.recordPath(id), { force: true });
  }

  async getActiveRecordId(): Promise<string | null> {
    try {
      const id = (await fs.readFile(path.join(this.dir, ACTIVE_FILE), "utf-8")).trim();
      return id || null;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  private recordPath(id: string): string {
    if (!/^[A-Za-z0-9_-]+$/.test(id)) {
      throw new Error(`Invalid record id: ${id}`);
    }
    return path.join(this.dir, `${id}${RECORD_SUFFIX}`);
  }

  /**
   * Write through a temporary file so readers never see half a record.
   */
  private async write(record: LocalRecord): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const target = this.recordPath(record.id);
    const temp = `${target}.${process.pid}.tmp`;
    await fs.writeFile(temp, JSON.stringify(record, null, 2), "utf-8");
    await fs.rename(temp, target);
  }
}
