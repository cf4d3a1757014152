/**
 * @foldersync/adapter-in-memory - In-process stores and the JSON record codec.
 */

export {
  InMemoryRemoteStore,
  type InMemoryRemoteStoreOptions,
  type RemoteOperation,
  type FileInit,
} from "./in-memory-remote-store.js";
export { InMemoryLocalStore } from "./in-memory-local-store.js";
export {
  DirectoryLocalStore,
  type DirectoryLocalStoreOptions,
} from "./directory-local-store.js";
export {
  JsonRecordCodec,
  parseDocument,
  toFileName,
  type JsonRecordCodecOptions,
} from "./json-record-codec.js";
