/**
 * GoogleDriveRemoteStore - A Google Drive implementation of RemoteStore.
 * Uses the Drive v2 API, whose change feed is addressed by numeric change ids.
 */

import { Readable } from "stream";
import { google, type Auth, type drive_v2 } from "googleapis";
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

export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";

/**
 * The calls this store makes on the Drive v2 client.
 */
export interface DriveApi {
  files: {
    list(params: drive_v2.Params$Resource$Files$List): Promise<{ data: drive_v2.Schema$FileList }>;
    get(params: drive_v2.Params$Resource$Files$Get): Promise<{ data: drive_v2.Schema$File }>;
    trash(params: drive_v2.Params$Resource$Files$Trash): Promise<{ data: drive_v2.Schema$File }>;
    insert(params: drive_v2.Params$Resource$Files$Insert): Promise<{ data: drive_v2.Schema$File }>;
    update(params: drive_v2.Params$Resource$Files$Update): Promise<{ data: drive_v2.Schema$File }>;
  };
  changes: {
    list(
      params: drive_v2.Params$Resource$Changes$List
    ): Promise<{ data: drive_v2.Schema$ChangeList }>;
  };
  about: {
    get(params: drive_v2.Params$Resource$About$Get): Promise<{ data: drive_v2.Schema$About }>;
  };
}

/**
 * Configuration options for GoogleDriveRemoteStore.
 * Pass either an authenticated client or OAuth credentials.
 */
export interface GoogleDriveRemoteStoreOptions {
  /**
   * Already authenticated OAuth2 client.
   */
  auth?: Auth.OAuth2Client;
  clientId?: string;
  clientSecret?: string;
  /**
   * Refresh token; the client library exchanges it for access tokens.
   */
  refreshToken?: string;
  /**
   * Page size for file and change listings (default: 100).
   */
  pageSize?: number;
  /**
   * Drive client to call instead of one built from `auth` (for testing).
   */
  drive?: DriveApi;
}

/**
 * Quote a value for a Drive search query.
 */
export function quoteQueryValue(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

/**
 * Build the search query listing live files directly inside a folder.
 */
export function buildFolderQuery(query: FileQuery): string {
  const clauses = [`${quoteQueryValue(query.folderId)} in parents`, "trashed = false"];
  if (query.mimeType) {
    clauses.push(`mimeType = ${quoteQueryValue(query.mimeType)}`);
  } else {
    clauses.push(`mimeType != ${quoteQueryValue(FOLDER_MIME_TYPE)}`);
  }
  return clauses.join(" and ");
}

/**
 * Parse a Drive change id, which the API returns as a decimal string.
 */
export function parseChangeId(value: string | null | undefined): number {
  const parsed = Number(value);
  if (value === null || value === undefined || value === "" || !Number.isSafeInteger(parsed)) {
    throw new RemoteStoreError("parseChangeId", {
      message: `Invalid change id: ${String(value)}`,
    });
  }
  return parsed;
}

/**
 * Convert a Drive file resource to a RemoteFile.
 */
export function toRemoteFile(file: drive_v2.Schema$File): RemoteFile {
  if (!file.id) {
    throw new RemoteStoreError("toRemoteFile", { message: "Drive file has no id" });
  }
  const modifiedAt = file.modifiedDate ? Date.parse(file.modifiedDate) : NaN;
  if (Number.isNaN(modifiedAt)) {
    throw new RemoteStoreError("toRemoteFile", {
      message: `Drive file ${file.id} has no valid modifiedDate`,
      details: { fileId: file.id },
    });
  }

  const parents: string[] = [];
  for (const parent of file.parents ?? []) {
    if (parent.id) {
      parents.push(parent.id);
    }
  }

  return {
    id: file.id,
    name: file.title ?? "",
    parents,
    modifiedAt,
    trashed: file.labels?.trashed === true,
    downloadUrl: file.downloadUrl || null,
    mimeType: file.mimeType ?? "",
  };
}

/**
 * Convert a Drive change to a ChangeEvent. The inlined file is kept so the
 * engine does not need to fetch it again.
 */
export function toChangeEvent(change: drive_v2.Schema$Change): ChangeEvent {
  if (!change.fileId) {
    throw new RemoteStoreError("toChangeEvent", { message: "Drive change has no fileId" });
  }
  const deleted = change.deleted === true;
  return {
    changeId: parseChangeId(change.id),
    fileId: change.fileId,
    deleted,
    file: deleted ? null : change.file ? toRemoteFile(change.file) : null,
  };
}

/**
 * HTTP status of a failed Drive call, when there is one.
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("code" in error) {
    const code = Number(error.code);
    if (Number.isInteger(code) && code >= 100 && code < 600) {
      return code;
    }
  }
  return undefined;
}

function mediaBody(content: Uint8Array): Readable {
  return Readable.from([Buffer.from(content)]);
}

/**
 * Google Drive remote store scoped to the authenticated user's Drive.
 */
export class GoogleDriveRemoteStore implements RemoteStore {
  private auth: Auth.OAuth2Client;
  private drive: DriveApi;
  private pageSize: number;

  constructor(options: GoogleDriveRemoteStoreOptions) {
    if (options.auth) {
      this.auth = options.auth;
    } else {
      // Validate required options
      if (!options.clientId) {
        throw new Error("GoogleDriveRemoteStore requires clientId");
      }
      if (!options.clientSecret) {
        throw new Error("GoogleDriveRemoteStore requires clientSecret");
      }
      if (!options.refreshToken) {
        throw new Error("GoogleDriveRemoteStore requires refreshToken");
      }
      this.auth = new google.auth.OAuth2(options.clientId, options.clientSecret);
      this.auth.setCredentials({ refresh_token: options.refreshToken });
    }
    this.drive = options.drive ?? google.drive({ version: "v2", auth: this.auth });
    this.pageSize = options.pageSize ?? 100;
  }

  async listFiles(query: FileQuery, pageToken?: string): Promise<FilePage> {
    const res = await this.call("listFiles", { folderId: query.folderId }, () =>
      this.drive.files.list({
        q: buildFolderQuery(query),
        pageToken,
        maxResults: this.pageSize,
      })
    );
    return {
      files: (res.data.items ?? []).map(toRemoteFile),
      nextPageToken: res.data.nextPageToken || null,
    };
  }

  async listChanges(startChangeId: number, pageToken?: string): Promise<ChangePage> {
    const res = await this.call("listChanges", { startChangeId }, () =>
      this.drive.changes.list({
        startChangeId: String(startChangeId),
        pageToken,
        includeDeleted: true,
        maxResults: this.pageSize,
      })
    );
    return {
      changes: (res.data.items ?? []).map(toChangeEvent),
      nextPageToken: res.data.nextPageToken || null,
      largestChangeId: parseChangeId(res.data.largestChangeId),
    };
  }

  async getFile(id: RemoteID): Promise<RemoteFile | null> {
    try {
      const res = await this.drive.files.get({ fileId: id });
      return toRemoteFile(res.data);
    } catch (error) {
      if (statusOf(error) === 404) {
        return null;
      }
      throw this.wrap("getFile", { fileId: id }, error);
    }
  }

  async trashFile(id: RemoteID): Promise<void> {
    await this.call("trashFile", { fileId: id }, () =>
      this.drive.files.trash({ fileId: id })
    );
  }

  async createFile(metadata: FileMetadata, content: Uint8Array): Promise<RemoteFile> {
    const res = await this.call("createFile", { name: metadata.name }, () =>
      this.drive.files.insert({
        requestBody: {
          title: metadata.name,
          mimeType: metadata.mimeType,
          parents: [{ id: metadata.folderId }],
        },
        media: { mimeType: metadata.mimeType, body: mediaBody(content) },
      })
    );
    return toRemoteFile(res.data);
  }

  async updateFile(
    id: RemoteID,
    metadata: FileMetadata,
    content: Uint8Array
  ): Promise<RemoteFile> {
    const res = await this.call("updateFile", { fileId: id }, () =>
      this.drive.files.update({
        fileId: id,
        setModifiedDate: metadata.modifiedAt >= 0,
        requestBody: {
          title: metadata.name,
          mimeType: metadata.mimeType,
          modifiedDate:
            metadata.modifiedAt >= 0 ? new Date(metadata.modifiedAt).toISOString() : undefined,
        },
        media: { mimeType: metadata.mimeType, body: mediaBody(content) },
      })
    );
    return toRemoteFile(res.data);
  }

  async downloadContent(locator: string): Promise<Uint8Array> {
    const res = await this.call("downloadContent", { locator }, () =>
      this.auth.request<ArrayBuffer>({ url: locator, responseType: "arraybuffer" })
    );
    return new Uint8Array(res.data);
  }

  async getLargestChangeId(): Promise<number> {
    const res = await this.call("getLargestChangeId", {}, () =>
      this.drive.about.get({ fields: "largestChangeId" })
    );
    return parseChangeId(res.data.largestChangeId);
  }

  /**
   * Find the folder with the given title in the Drive root, creating it if needed.
   * @returns The folder id
   */
  async ensureFolder(title: string): Promise<string> {
    const res = await this.call("ensureFolder", { title }, () =>
      this.drive.files.list({
        q: [
          `title = ${quoteQueryValue(title)}`,
          `mimeType = ${quoteQueryValue(FOLDER_MIME_TYPE)}`,
          "'root' in parents",
          "trashed = false",
        ].join(" and "),
        maxResults: 1,
      })
    );
    const existing = (res.data.items ?? [])[0];
    if (existing?.id) {
      return existing.id;
    }

    const created = await this.call("ensureFolder", { title }, () =>
      this.drive.files.insert({
        requestBody: { title, mimeType: FOLDER_MIME_TYPE },
      })
    );
    if (!created.data.id) {
      throw new RemoteStoreError("ensureFolder", {
        message: `Drive did not return an id for folder '${title}'`,
      });
    }
    return created.data.id;
  }

  private async call<T>(
    operation: string,
    details: { [key: string]: unknown },
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw this.wrap(operation, details, error);
    }
  }

  private wrap(
    operation: string,
    details: { [key: string]: unknown },
    error: unknown
  ): RemoteStoreError {
    if (error instanceof RemoteStoreError) {
      return error;
    }
    return new RemoteStoreError(operation, {
      message: `Drive ${operation} failed`,
      cause: error,
      details: { ...details, statusCode: statusOf(error) },
    });
  }
}
