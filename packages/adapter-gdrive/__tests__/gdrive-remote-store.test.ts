/**
 * Tests for the Google Drive remote store and its mapping helpers
 */

import type { drive_v2 } from "googleapis";
import { RemoteStoreError } from "@foldersync/core";
import {
  GoogleDriveRemoteStore,
  type DriveApi,
  buildFolderQuery,
  parseChangeId,
  quoteQueryValue,
  statusOf,
  toChangeEvent,
  toRemoteFile,
} from "../src/gdrive-remote-store";

const driveFile: drive_v2.Schema$File = {
  id: "1AbC",
  title: "Morning run.json",
  modifiedDate: "2024-05-01T10:00:00.000Z",
  parents: [{ id: "folder_1" }, {}],
  labels: { trashed: false },
  downloadUrl: "https://example.test/download/1AbC",
  mimeType: "application/json",
};

describe("buildFolderQuery", () => {
  it("should list live non-folder files by default", () => {
    expect(buildFolderQuery({ folderId: "folder_1" })).toBe(
      "'folder_1' in parents and trashed = false and mimeType != 'application/vnd.google-apps.folder'"
    );
  });

  it("should filter by MIME type when given", () => {
    expect(buildFolderQuery({ folderId: "folder_1", mimeType: "application/json" })).toBe(
      "'folder_1' in parents and trashed = false and mimeType = 'application/json'"
    );
  });

  it("should escape quotes in values", () => {
    expect(quoteQueryValue("Bob's runs")).toBe("'Bob\\'s runs'");
  });
});

describe("parseChangeId", () => {
  it("should parse decimal strings", () => {
    expect(parseChangeId("4512")).toBe(4512);
  });

  it.each([null, undefined, "", "abc"])("should reject %p", (value) => {
    expect(() => parseChangeId(value)).toThrow(RemoteStoreError);
  });
});

describe("toRemoteFile", () => {
  it("should map a Drive file", () => {
    expect(toRemoteFile(driveFile)).toEqual({
      id: "1AbC",
      name: "Morning run.json",
      parents: ["folder_1"],
      modifiedAt: Date.parse("2024-05-01T10:00:00.000Z"),
      trashed: false,
      downloadUrl: "https://example.test/download/1AbC",
      mimeType: "application/json",
    });
  });

  it("should treat a missing download URL as no content", () => {
    expect(toRemoteFile({ ...driveFile, downloadUrl: "" }).downloadUrl).toBeNull();
    expect(toRemoteFile({ ...driveFile, labels: { trashed: true } }).trashed).toBe(true);
  });

  it("should reject files without an id or modified date", () => {
    expect(() => toRemoteFile({ ...driveFile, id: undefined })).toThrow("Drive file has no id");
    expect(() => toRemoteFile({ ...driveFile, modifiedDate: "soon" })).toThrow(
      "Drive file 1AbC has no valid modifiedDate"
    );
  });
});

describe("toChangeEvent", () => {
  it("should keep the inlined file of a change", () => {
    const event = toChangeEvent({ id: "12", fileId: "1AbC", deleted: false, file: driveFile });

    expect(event.changeId).toBe(12);
    expect(event.deleted).toBe(false);
    expect(event.file?.id).toBe("1AbC");
  });

  it("should map deletions without a file", () => {
    expect(toChangeEvent({ id: "13", fileId: "1AbC", deleted: true })).toEqual({
      changeId: 13,
      fileId: "1AbC",
      deleted: true,
      file: null,
    });
  });
});

describe("statusOf", () => {
  it("should read HTTP status from client errors", () => {
    expect(statusOf({ status: 404 })).toBe(404);
    expect(statusOf({ code: "503" })).toBe(503);
    expect(statusOf({ code: "ECONNRESET" })).toBeUndefined();
    expect(statusOf("boom")).toBeUndefined();
  });
});

type Response<T> = Promise<{ data: T }>;

/**
 * In-process stand-in for the Drive v2 client.
 */
class FakeDrive implements DriveApi {
  files = {
    list: jest.fn<Response<drive_v2.Schema$FileList>, [drive_v2.Params$Resource$Files$List]>(),
    get: jest.fn<Response<drive_v2.Schema$File>, [drive_v2.Params$Resource$Files$Get]>(),
    trash: jest.fn<Response<drive_v2.Schema$File>, [drive_v2.Params$Resource$Files$Trash]>(),
    insert: jest.fn<Response<drive_v2.Schema$File>, [drive_v2.Params$Resource$Files$Insert]>(),
    update: jest.fn<Response<drive_v2.Schema$File>, [drive_v2.Params$Resource$Files$Update]>(),
  };
  changes = {
    list: jest.fn<Response<drive_v2.Schema$ChangeList>, [drive_v2.Params$Resource$Changes$List]>(),
  };
  about = {
    get: jest.fn<Response<drive_v2.Schema$About>, [drive_v2.Params$Resource$About$Get]>(),
  };
}

function httpError(status: number): Error {
  return Object.assign(new Error(`Request failed with status ${status}`), { status });
}

describe("GoogleDriveRemoteStore", () => {
  let drive: FakeDrive;
  let store: GoogleDriveRemoteStore;

  beforeEach(() => {
    drive = new FakeDrive();
    store = new GoogleDriveRemoteStore({
      clientId: "test-client",
      clientSecret: "test-secret",
      refreshToken: "test-refresh-token",
      drive,
    });
  });

  it("should require credentials when no client is given", () => {
    expect(() => new GoogleDriveRemoteStore({ clientId: "test-client" })).toThrow(
      "GoogleDriveRemoteStore requires clientSecret"
    );
  });

  describe("getFile", () => {
    it("should map the fetched file", async () => {
      drive.files.get.mockResolvedValue({ data: driveFile });

      const file = await store.getFile("1AbC");

      expect(drive.files.get).toHaveBeenCalledWith({ fileId: "1AbC" });
      expect(file?.id).toBe("1AbC");
      expect(file?.parents).toEqual(["folder_1"]);
    });

    it("should return null for a file that does not exist", async () => {
      drive.files.get.mockRejectedValue(httpError(404));

      expect(await store.getFile("gone")).toBeNull();
    });

    it("should wrap other failures with the status code", async () => {
      drive.files.get.mockRejectedValue(httpError(500));

      const error: unknown = await store.getFile("1AbC").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RemoteStoreError);
      expect(error).toMatchObject({
        operation: "getFile",
        message: "Drive getFile failed",
        details: { fileId: "1AbC", statusCode: 500 },
      });
    });
  });

  describe("updateFile", () => {
    const metadata = {
      name: "Morning run.json",
      folderId: "folder_1",
      mimeType: "application/json",
      modifiedAt: Date.parse("2024-05-02T08:30:00.000Z"),
    };

    it("should set the remote modified date from the local time", async () => {
      drive.files.update.mockResolvedValue({
        data: { ...driveFile, modifiedDate: "2024-05-02T08:30:00.000Z" },
      });

      const updated = await store.updateFile("1AbC", metadata, new TextEncoder().encode("{}"));

      expect(drive.files.update).toHaveBeenCalledWith(
        expect.objectContaining({
          fileId: "1AbC",
          setModifiedDate: true,
          requestBody: {
            title: "Morning run.json",
            mimeType: "application/json",
            modifiedDate: "2024-05-02T08:30:00.000Z",
          },
        })
      );
      expect(updated.modifiedAt).toBe(metadata.modifiedAt);
    });

    it("should let Drive pick the time for records without one", async () => {
      drive.files.update.mockResolvedValue({ data: driveFile });

      await store.updateFile("1AbC", { ...metadata, modifiedAt: -1 }, new Uint8Array());

      const [params] = drive.files.update.mock.calls[0];
      expect(params.setModifiedDate).toBe(false);
      expect(params.requestBody?.modifiedDate).toBeUndefined();
    });
  });

  describe("listChanges", () => {
    it("should map a page of changes and its largest change id", async () => {
      drive.changes.list.mockResolvedValue({
        data: {
          items: [
            { id: "12", fileId: "1AbC", deleted: false, file: driveFile },
            { id: "13", fileId: "2XyZ", deleted: true },
          ],
          nextPageToken: "page-2",
          largestChangeId: "20",
        },
      });

      const page = await store.listChanges(11);

      expect(drive.changes.list).toHaveBeenCalledWith(
        expect.objectContaining({ startChangeId: "11", includeDeleted: true, maxResults: 100 })
      );
      expect(page.largestChangeId).toBe(20);
      expect(page.nextPageToken).toBe("page-2");
      expect(page.changes.map((change) => [change.changeId, change.fileId, change.deleted])).toEqual([
        [12, "1AbC", false],
        [13, "2XyZ", true],
      ]);
      expect(page.changes[0].file?.id).toBe("1AbC");
    });

    it("should reject a page without a largest change id", async () => {
      drive.changes.list.mockResolvedValue({ data: { items: [] } });

      await expect(store.listChanges(11)).rejects.toThrow("Invalid change id: undefined");
    });
  });
});
