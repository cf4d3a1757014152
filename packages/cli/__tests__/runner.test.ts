/**
 * Tests for the job runner
 * Jobs use the in-memory remote driver, a temporary records directory and a temporary state database.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { createLogger } from "@foldersync/core";
import { DirectoryLocalStore } from "@foldersync/adapter-in-memory";
import { closeStateStores, loadStateStore } from "../src/loaders";
import { deleteRecordForJob, runJobs, statusForJob } from "../src/runner";

const logger = createLogger("test", { level: "silent" });

describe("runner", () => {
  let dir: string;
  let configPath: string;
  let local: DirectoryLocalStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "foldersync-cli-"));
    configPath = path.join(dir, "foldersync.jsonc");
    const recordsPath = path.join(dir, "records");
    local = new DirectoryLocalStore({ path: recordsPath });

    const config = {
      state: { driver: "sqlite", conn: path.join(dir, "state.db") },
      jobs: [
        {
          id: "tracks",
          account: "runner@example.com",
          remote: { driver: "in-memory", folder_id: "folder_1" },
          local: { driver: "directory", path: recordsPath },
        },
        {
          id: "paused",
          account: "paused@example.com",
          enabled: false,
          remote: { driver: "in-memory", folder_id: "folder_2" },
          local: { driver: "directory", path: path.join(dir, "paused") },
        },
      ],
    };
    await fs.writeFile(configPath, `// test config\n${JSON.stringify(config, null, 2)}`, "utf-8");
  });

  afterEach(async () => {
    closeStateStores();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should share one state store per database path", () => {
    const first = loadStateStore({ driver: "sqlite", conn: path.join(dir, "state.db") });
    const second = loadStateStore({ driver: "sqlite", conn: path.join(dir, ".", "state.db") });
    const other = loadStateStore({ driver: "sqlite", conn: path.join(dir, "other.db") });

    expect(second).toBe(first);
    expect(other).not.toBe(first);
  });

  it("should run enabled jobs and upload unsynced records", async () => {
    await local.createRecord({ remoteLink: "", modifiedAt: 10, name: "A", content: "a" });
    await local.createRecord({ remoteLink: "", modifiedAt: 20, name: "B", content: "b" });

    const results = await runJobs(configPath, undefined, { logger });

    expect(results).toHaveLength(1);
    expect(results[0].accountId).toBe("runner@example.com");
    expect(results[0].status).toBe("success");
    expect(results[0].mode).toBe("initial");
    expect(results[0].stats.uploaded).toBe(2);
    expect(results[0].cursorAfter).toBe(0);
    expect((await local.listRecords("unlinked"))).toEqual([]);

    const status = await statusForJob(configPath, "tracks");
    expect(status.state).toEqual({ largestChangeId: 0, pendingDeletionIds: [] });
    expect(status.runs.map((run) => run.runId)).toEqual([results[0].runId]);
  });

  it("should run a disabled job when asked for it by id", async () => {
    const results = await runJobs(configPath, ["paused"], { logger });

    expect(results.map((summary) => summary.accountId)).toEqual(["paused@example.com"]);
  });

  it("should reject unknown job ids", async () => {
    await expect(runJobs(configPath, ["nope"], { logger })).rejects.toThrow("Unknown job 'nope'");
  });

  it("should queue the remote file of a deleted record", async () => {
    await local.createRecord({ remoteLink: "", modifiedAt: 10, name: "A", content: "a" });
    await runJobs(configPath, ["tracks"], { logger });
    const [record] = await local.listRecords("linked");

    expect(await deleteRecordForJob(configPath, "tracks", record.id, { logger })).toBe(true);
    expect(await deleteRecordForJob(configPath, "tracks", record.id, { logger })).toBe(false);

    const status = await statusForJob(configPath, "tracks");
    expect(status.state.pendingDeletionIds).toEqual([record.remoteLink]);
    expect(await local.getRecord(record.id)).toBeNull();
  });
});
