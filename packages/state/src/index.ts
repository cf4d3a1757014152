/**
 * @foldersync/state - SyncStateStore implementations.
 */

export {
  InMemoryStateStore,
  applyCommit,
  emptyState,
} from "./in-memory-state-store.js";
export { SqliteStateStore, type SqliteStateStoreOptions } from "./sqlite-state-store.js";
