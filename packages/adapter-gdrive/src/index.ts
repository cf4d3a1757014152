/**
 * @foldersync/adapter-gdrive - Google Drive remote store.
 */

export {
  GoogleDriveRemoteStore,
  FOLDER_MIME_TYPE,
  buildFolderQuery,
  quoteQueryValue,
  parseChangeId,
  toRemoteFile,
  toChangeEvent,
  statusOf,
  type GoogleDriveRemoteStoreOptions,
  type DriveApi,
} from "./gdrive-remote-store.js";
