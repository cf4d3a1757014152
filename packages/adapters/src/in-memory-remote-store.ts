/**
 * InMemoryRemoteStore - An in-memory implementation of RemoteStore for testing.
 * Keeps files and an ordered change log, and pages both listings.
 */

import {
  RemoteStoreError,
  type ChangeEvent,
  type ChangePage,
  type FileMetadata,
  type FilePage,
  type FileQuery,
  type RemoteFile,
  type RemoteID,
  type RemoteStore,
} from "@foldersync/core";

const DOWNLOAD_PREFIX = "memory://files/";

/**
 * Operations that can be made to fail with failOn().
 */
export type RemoteOperation =
  | "listFiles"
  | "listChanges"
  | "getFile"
  | "trashFile"
  | "createFile"
  | "updateFile"
  | "downloadContent"
  | "getLargestChangeId";

/**
 * Configuration options for InMemoryRemoteStore.
 */
export interface InMemoryRemoteStoreOptions {
  /**
   * Maximum entries per listFiles/listChanges page.
   */
  pageSize?: number;
  /**
   * Include the current file snapshot in change events, like Drive does.
   * When false the engine has to fetch each changed file.
   */
  inlineChangeFiles?: boolean;
  /**
   * Clock used for modified times the caller does not set.
   */
  now?: () => number;
}

/**
 * Fields for seeding a file directly into the store.
 */
export interface FileInit {
  id?: RemoteID;
  name: string;
  parents?: string[];
  content: string | Uint8Array;
  modifiedAt?: number;
  mimeType?: string;
}

interface StoredFile {
  file: RemoteFile;
  content: Uint8Array;
}

interface LoggedChange {
  changeId: number;
  fileId: RemoteID;
  deleted: boolean;
}

interface FailureRule {
  operation: RemoteOperation;
  when?: (target: string) => boolean;
  remaining: number;
}

function toBytes(content: string | Uint8Array): Uint8Array {
  return typeof content === "string"
    ? new TextEncoder().encode(content)
    : new Uint8Array(content);
}

function copyFile(file: RemoteFile): RemoteFile {
  return { ...file, parents: [...file.parents] };
}

/**
 * In-memory remote store with a change feed.
 * Every mutation, whether made through the RemoteStore API or a test helper,
 * appends to the change log.
 */
export class InMemoryRemoteStore implements RemoteStore {
  private files: Map<RemoteID, StoredFile>;
  private changeLog: LoggedChange[];
  private largestChangeId: number;
  private nextFileNumber: number;
  private failures: FailureRule[];
  private pageSize: number;
  private inlineChangeFiles: boolean;
  private now: () => number;

  constructor(options: InMemoryRemoteStoreOptions = {}) {
    this.files = new Map();
    this.changeLog = [];
    this.largestChangeId = 0;
    this.nextFileNumber = 1;
    this.failures = [];
    this.pageSize = options.pageSize ?? 100;
    this.inlineChangeFiles = options.inlineChangeFiles ?? false;
    this.now = options.now ?? (() => Date.now());
  }

  // --- RemoteStore ---

  async listFiles(query: FileQuery, pageToken?: string): Promise<FilePage> {
    this.maybeFail("listFiles", pageToken ?? "");
    const matching = Array.from(this.files.values())
      .map((stored) => stored.file)
      .filter(
        (file) =>
          !file.trashed &&
          file.parents.includes(query.folderId) &&
          (query.mimeType === undefined || file.mimeType === query.mimeType)
      );
    const { items, nextPageToken } = this.page(matching, pageToken);
    return { files: items.map(copyFile), nextPageToken };
  }

  async listChanges(startChangeId: number, pageToken?: string): Promise<ChangePage> {
    this.maybeFail("listChanges", pageToken ?? "");
    const pending = this.changeLog.filter((change) => change.changeId >= startChangeId);
    const { items, nextPageToken } = this.page(pending, pageToken);

    const changes: ChangeEvent[] = items.map((change) => {
      const event: ChangeEvent = { ...change };
      if (this.inlineChangeFiles && !change.deleted) {
        const stored = this.files.get(change.fileId);
        event.file = stored ? copyFile(stored.file) : null;
      }
      return event;
    });

    return { changes, nextPageToken, largestChangeId: this.largestChangeId };
  }

  async getFile(id: RemoteID): Promise<RemoteFile | null> {
    this.maybeFail("getFile", id);
    const stored = this.files.get(id);
    return stored ? copyFile(stored.file) : null;
  }

  async trashFile(id: RemoteID): Promise<void> {
    this.maybeFail("trashFile", id);
    const stored = this.requireFile("trashFile", id);
    stored.file.trashed = true;
    this.recordChange(id, false);
  }

  async createFile(metadata: FileMetadata, content: Uint8Array): Promise<RemoteFile> {
    this.maybeFail("createFile", metadata.name);
    return this.addFile({
      name: metadata.name,
      parents: [metadata.folderId],
      content,
      mimeType: metadata.mimeType,
      modifiedAt: metadata.modifiedAt >= 0 ? metadata.modifiedAt : undefined,
    });
  }

  async updateFile(
    id: RemoteID,
    metadata: FileMetadata,
    content: Uint8Array
  ): Promise<RemoteFile> {
    this.maybeFail("updateFile", id);
    const stored = this.requireFile("updateFile", id);
    stored.file.name = metadata.name;
    stored.file.mimeType = metadata.mimeType;
    stored.file.modifiedAt = metadata.modifiedAt >= 0 ? metadata.modifiedAt : this.now();
    stored.content = new Uint8Array(content);
    this.recordChange(id, false);
    return copyFile(stored.file);
  }

  async downloadContent(locator: string): Promise<Uint8Array> {
    this.maybeFail("downloadContent", locator);
    const id = locator.startsWith(DOWNLOAD_PREFIX)
      ? locator.slice(DOWNLOAD_PREFIX.length)
      : locator;
    const stored = this.requireFile("downloadContent", id);
    return new Uint8Array(stored.content);
  }

  async getLargestChangeId(): Promise<number> {
    this.maybeFail("getLargestChangeId", "");
    return this.largestChangeId;
  }

  // --- Helper methods for testing/debugging ---

  /**
   * Make an operation throw.
   * @param options.times - Number of failures before the rule expires (default: forever)
   * @param options.when - Only fail for matching targets (file id, locator, page token or name)
   */
  failOn(
    operation: RemoteOperation,
    options: { times?: number; when?: (target: string) => boolean } = {}
  ): void {
    this.failures.push({
      operation,
      when: options.when,
      remaining: options.times ?? Number.POSITIVE_INFINITY,
    });
  }

  /**
   * Remove all failure rules.
   */
  clearFailures(): void {
    this.failures = [];
  }

  /**
   * Add a file as if another client had uploaded it.
   */
  addFile(init: FileInit): RemoteFile {
    const id = init.id ?? `file_${this.nextFileNumber++}`;
    const file: RemoteFile = {
      id,
      name: init.name,
      parents: [...(init.parents ?? [])],
      modifiedAt: init.modifiedAt ?? this.now(),
      trashed: false,
      downloadUrl: `${DOWNLOAD_PREFIX}${id}`,
      mimeType: init.mimeType ?? "application/json",
    };
    this.files.set(id, { file, content: toBytes(init.content) });
    this.recordChange(id, false);
    return copyFile(file);
  }

  /**
   * Change a file's content or times as if another client had edited it.
   */
  modifyFile(
    id: RemoteID,
    changes: { content?: string | Uint8Array; modifiedAt?: number; name?: string }
  ): RemoteFile {
    const stored = this.requireFile("modifyFile", id);
    if (changes.content !== undefined) {
      stored.content = toBytes(changes.content);
    }
    if (changes.name !== undefined) {
      stored.file.name = changes.name;
    }
    stored.file.modifiedAt = changes.modifiedAt ?? this.now();
    this.recordChange(id, false);
    return copyFile(stored.file);
  }

  /**
   * Replace a file's parent folders.
   */
  moveFile(id: RemoteID, parents: string[]): void {
    const stored = this.requireFile("moveFile", id);
    stored.file.parents = [...parents];
    this.recordChange(id, false);
  }

  /**
   * Remove a file for good; the feed reports it as deleted.
   */
  deleteFile(id: RemoteID): void {
    this.requireFile("deleteFile", id);
    this.files.delete(id);
    this.recordChange(id, true);
  }

  /**
   * Get all files, trashed ones included.
   */
  getAllFiles(): RemoteFile[] {
    return Array.from(this.files.values()).map((stored) => copyFile(stored.file));
  }

  /**
   * Get a file's content as text.
   */
  getContent(id: RemoteID): string | undefined {
    const stored = this.files.get(id);
    return stored ? new TextDecoder().decode(stored.content) : undefined;
  }

  private recordChange(fileId: RemoteID, deleted: boolean): void {
    this.largestChangeId++;
    this.changeLog.push({ changeId: this.largestChangeId, fileId, deleted });
  }

  private requireFile(operation: string, id: RemoteID): StoredFile {
    const stored = this.files.get(id);
    if (!stored) {
      throw new RemoteStoreError(operation, {
        message: `File not found: ${id}`,
        details: { fileId: id, statusCode: 404 },
      });
    }
    return stored;
  }

  private page<T>(
    all: T[],
    pageToken: string | undefined
  ): { items: T[]; nextPageToken: string | null } {
    const offset = pageToken ? parseInt(pageToken, 10) : 0;
    const end = offset + this.pageSize;
    return {
      items: all.slice(offset, end),
      nextPageToken: end < all.length ? String(end) : null,
    };
  }

  private maybeFail(operation: RemoteOperation, target: string): void {
    const rule = this.failures.find(
      (candidate) =>
        candidate.operation === operation &&
        candidate.remaining > 0 &&
        (candidate.when === undefined || candidate.when(target))
    );
    if (!rule) {
      return;
    }
    rule.remaining--;
    throw new RemoteStoreError(operation, {
      message: `Simulated ${operation} failure`,
      details: { target, statusCode: 503 },
    });
  }
}
