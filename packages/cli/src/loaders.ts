/**
 * Construction of state stores, remote stores, local stores and codecs from configuration.
 */

import * as path from "path";
import {
  ConfigError,
  type LocalStore,
  type RecordCodec,
  type RemoteStore,
  type SyncStateStore,
} from "@foldersync/core";
import {
  DirectoryLocalStore,
  InMemoryRemoteStore,
  JsonRecordCodec,
} from "@foldersync/adapter-in-memory";
import { GoogleDriveRemoteStore } from "@foldersync/adapter-gdrive";
import { InMemoryStateStore, SqliteStateStore } from "@foldersync/state";
import type { CredentialsConfig, JobConfigRaw, StateConfig } from "./config.js";

/**
 * A remote store together with the id of the folder it syncs.
 */
export interface LoadedRemote {
  remote: RemoteStore;
  folderId: string;
}

// One store per database path for the life of the process
const sqliteStores = new Map<string, SqliteStateStore>();

/**
 * Get the SyncStateStore named by the configuration.
 * SQLite stores are opened once per path and shared by later calls.
 */
export function loadStateStore(config: StateConfig): SyncStateStore {
  switch (config.driver) {
    case "sqlite": {
      const dbPath = path.resolve(config.conn);
      let store = sqliteStores.get(dbPath);
      if (store === undefined) {
        store = new SqliteStateStore({ conn: dbPath });
        sqliteStores.set(dbPath, store);
      }
      return store;
    }
    case "in-memory":
      return new InMemoryStateStore();
  }
}

/**
 * Close every shared SQLite store (for shutdown/testing).
 */
export function closeStateStores(): void {
  for (const store of sqliteStores.values()) {
    store.close();
  }
  sqliteStores.clear();
}

function credential(creds: CredentialsConfig | undefined, key: string): string | undefined {
  const value = creds?.[key];
  return value === undefined ? undefined : String(value);
}

/**
 * Create the remote store for a job and resolve its folder.
 * A `folder` title is looked up in the Drive root and created when missing.
 * @throws ConfigError if the job names no usable folder
 */
export async function loadRemote(job: JobConfigRaw): Promise<LoadedRemote> {
  const remoteConfig = job.remote;

  if (remoteConfig.driver === "in-memory") {
    if (!remoteConfig.folder_id) {
      throw new ConfigError({
        message: `Job '${job.id}': the in-memory driver needs 'folder_id'`,
      });
    }
    return {
      remote: new InMemoryRemoteStore({ pageSize: remoteConfig.page_size }),
      folderId: remoteConfig.folder_id,
    };
  }

  const drive = new GoogleDriveRemoteStore({
    clientId: credential(remoteConfig.creds, "client_id"),
    clientSecret: credential(remoteConfig.creds, "client_secret"),
    refreshToken: credential(remoteConfig.creds, "refresh_token"),
    pageSize: remoteConfig.page_size,
  });

  if (remoteConfig.folder_id) {
    return { remote: drive, folderId: remoteConfig.folder_id };
  }
  if (remoteConfig.folder) {
    return { remote: drive, folderId: await drive.ensureFolder(remoteConfig.folder) };
  }
  throw new ConfigError({
    message: `Job '${job.id}': remote must have 'folder_id' or 'folder'`,
  });
}

/**
 * Create the local store for a job.
 */
export function loadLocal(job: JobConfigRaw): LocalStore {
  return new DirectoryLocalStore({ path: job.local.path });
}

/**
 * Create the codec that maps remote files to local records.
 */
export function loadCodec(local: LocalStore): RecordCodec {
  return new JsonRecordCodec(local);
}
