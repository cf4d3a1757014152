/**
 * Tests for InMemoryRemoteStore
 */

import { RemoteStoreError } from "@foldersync/core";
import { InMemoryRemoteStore } from "../src/in-memory-remote-store";

const FOLDER = "folder_tracks";

describe("InMemoryRemoteStore", () => {
  describe("Change feed", () => {
    it("should log one change per mutation with increasing ids", async () => {
      const remote = new InMemoryRemoteStore({ now: () => 1000 });
      const created = await remote.createFile(
        { name: "a.json", folderId: FOLDER, mimeType: "application/json", modifiedAt: 10 },
        new TextEncoder().encode("{}")
      );
      await remote.updateFile(
        created.id,
        { name: "a.json", folderId: FOLDER, mimeType: "application/json", modifiedAt: -1 },
        new TextEncoder().encode("[]")
      );
      await remote.trashFile(created.id);

      const page = await remote.listChanges(1);

      expect(page.changes).toEqual([
        { changeId: 1, fileId: "file_1", deleted: false },
        { changeId: 2, fileId: "file_1", deleted: false },
        { changeId: 3, fileId: "file_1", deleted: false },
      ]);
      expect(page.largestChangeId).toBe(3);
      expect(await remote.getLargestChangeId()).toBe(3);
      // A negative modified time means "let the store decide"
      expect((await remote.getFile("file_1"))?.modifiedAt).toBe(1000);
    });

    it("should page changes with tokens", async () => {
      const remote = new InMemoryRemoteStore({ pageSize: 2 });
      for (const name of ["a", "b", "c"]) {
        remote.addFile({ name, parents: [FOLDER], content: "" });
      }

      const first = await remote.listChanges(1);
      const second = await remote.listChanges(1, first.nextPageToken ?? undefined);

      expect(first.changes.map((c) => c.changeId)).toEqual([1, 2]);
      expect(first.nextPageToken).toBe("2");
      expect(second.changes.map((c) => c.changeId)).toEqual([3]);
      expect(second.nextPageToken).toBeNull();
    });

    it("should inline file snapshots when asked", async () => {
      const remote = new InMemoryRemoteStore({ inlineChangeFiles: true });
      remote.addFile({ id: "f1", name: "a", parents: [FOLDER], content: "", modifiedAt: 5 });
      remote.deleteFile("f1");

      const page = await remote.listChanges(1);

      expect(page.changes[0].file).toBeNull();
      expect(page.changes[1]).toEqual({ changeId: 2, fileId: "f1", deleted: true });
    });
  });

  describe("Files", () => {
    it("should list live files in a folder", async () => {
      const remote = new InMemoryRemoteStore();
      remote.addFile({ id: "f1", name: "a", parents: [FOLDER], content: "" });
      remote.addFile({ id: "f2", name: "b", parents: ["other"], content: "" });
      remote.addFile({ id: "f3", name: "c", parents: [FOLDER], content: "", mimeType: "text/plain" });
      remote.addFile({ id: "f4", name: "d", parents: [FOLDER], content: "" });
      await remote.trashFile("f4");

      const all = await remote.listFiles({ folderId: FOLDER });
      const json = await remote.listFiles({ folderId: FOLDER, mimeType: "application/json" });

      expect(all.files.map((f) => f.id)).toEqual(["f1", "f3"]);
      expect(json.files.map((f) => f.id)).toEqual(["f1"]);
    });

    it("should download content through the file's download URL", async () => {
      const remote = new InMemoryRemoteStore();
      const file = remote.addFile({ name: "a", parents: [FOLDER], content: "hello" });

      expect(file.downloadUrl).toBe("memory://files/file_1");
      const bytes = await remote.downloadContent(file.downloadUrl ?? "");
      expect(new TextDecoder().decode(bytes)).toBe("hello");
    });

    it("should return null for unknown files and reject updates to them", async () => {
      const remote = new InMemoryRemoteStore();

      expect(await remote.getFile("nope")).toBeNull();
      await expect(remote.trashFile("nope")).rejects.toThrow("File not found: nope");
    });

    it("should hand out copies", async () => {
      const remote = new InMemoryRemoteStore();
      remote.addFile({ id: "f1", name: "a", parents: [FOLDER], content: "" });

      const file = await remote.getFile("f1");
      file?.parents.push("other");

      expect((await remote.getFile("f1"))?.parents).toEqual([FOLDER]);
    });
  });

  describe("Failure injection", () => {
    it("should fail matching calls the given number of times", async () => {
      const remote = new InMemoryRemoteStore();
      remote.addFile({ id: "f1", name: "a", parents: [FOLDER], content: "" });
      remote.failOn("getFile", { times: 1, when: (id) => id === "f1" });

      await expect(remote.getFile("f1")).rejects.toBeInstanceOf(RemoteStoreError);
      expect((await remote.getFile("f1"))?.id).toBe("f1");
    });

    it("should stop failing after clearFailures", async () => {
      const remote = new InMemoryRemoteStore();
      remote.failOn("getLargestChangeId");

      await expect(remote.getLargestChangeId()).rejects.toThrow(
        "Simulated getLargestChangeId failure"
      );
      remote.clearFailures();
      expect(await remote.getLargestChangeId()).toBe(0);
    });
  });
});
