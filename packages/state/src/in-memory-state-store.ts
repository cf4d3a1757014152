/**
 * InMemoryStateStore - An in-memory implementation of SyncStateStore for testing.
 * Stores cursors, pending deletions and run logs in memory.
 */

import type {
  CycleCommit,
  RemoteID,
  RunSummary,
  SyncState,
  SyncStateStore,
} from "@foldersync/core";

/**
 * Apply a cycle commit to a stored state.
 * The cursor only moves forward; ids queued since the cycle started stay pending.
 */
export function applyCommit(state: SyncState, commit: CycleCommit): SyncState {
  let largestChangeId = state.largestChangeId;
  if (commit.largestChangeId !== null) {
    largestChangeId =
      largestChangeId === null
        ? commit.largestChangeId
        : Math.max(largestChangeId, commit.largestChangeId);
  }
  const flushed = new Set(commit.flushedDeletionIds);
  return {
    largestChangeId,
    pendingDeletionIds: state.pendingDeletionIds.filter((id) => !flushed.has(id)),
  };
}

export function emptyState(): SyncState {
  return { largestChangeId: null, pendingDeletionIds: [] };
}

export class InMemoryStateStore implements SyncStateStore {
  // Keyed by account id
  private states: Map<string, SyncState>;
  private runs: RunSummary[];

  constructor() {
    this.states = new Map();
    this.runs = [];
  }

  async loadState(accountId: string): Promise<SyncState> {
    const state = this.states.get(accountId) ?? emptyState();
    return {
      largestChangeId: state.largestChangeId,
      pendingDeletionIds: [...state.pendingDeletionIds],
    };
  }

  async queueDeletion(accountId: string, remoteId: RemoteID): Promise<void> {
    const state = await this.loadState(accountId);
    if (!state.pendingDeletionIds.includes(remoteId)) {
      state.pendingDeletionIds.push(remoteId);
    }
    this.states.set(accountId, state);
  }

  async commitCycle(accountId: string, commit: CycleCommit): Promise<void> {
    const state = await this.loadState(accountId);
    this.states.set(accountId, applyCommit(state, commit));
  }

  async insertRun(run: RunSummary): Promise<void> {
    this.runs.push({ ...run });
  }

  async getRuns(accountId: string): Promise<RunSummary[]> {
    return this.runs.filter((run) => run.accountId === accountId);
  }

  // --- Helper methods for testing/debugging ---

  /**
   * Overwrite the state of an account (useful for testing/debugging).
   */
  setState(accountId: string, state: SyncState): void {
    this.states.set(accountId, {
      largestChangeId: state.largestChangeId,
      pendingDeletionIds: [...state.pendingDeletionIds],
    });
  }

  /**
   * Clear all data (useful for testing/debugging).
   */
  clear(): void {
    this.states.clear();
    this.runs = [];
  }
}
