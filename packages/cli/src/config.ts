/**
 * Type definitions for JSONC configuration file format.
 * These types represent the raw configuration as it appears in the JSONC file.
 */

/**
 * State store driver configuration.
 */
export interface StateConfig {
  driver: "sqlite" | "in-memory";
  conn: string; // Path of the SQLite database
}

/**
 * Credentials for a remote store (as it appears in JSONC).
 * Environment variables are resolved after parsing.
 */
export interface CredentialsConfig {
  [key: string]: string | number | boolean;
}

/**
 * Remote side of a job (as it appears in JSONC).
 * Either `folder_id` or `folder` (a folder title resolved or created at startup).
 */
export interface RemoteConfigRaw {
  driver: "gdrive" | "in-memory";
  folder_id?: string;
  folder?: string;
  creds?: CredentialsConfig;
  page_size?: number;
}

/**
 * Local side of a job (as it appears in JSONC).
 */
export interface LocalConfigRaw {
  driver: "directory";
  path: string;
}

/**
 * Engine tunables (as it appears in JSONC).
 * Uses snake_case to match JSONC format.
 */
export interface SyncTuningRaw {
  fetch_concurrency?: number;
  upload_concurrency?: number;
}

/**
 * Individual job configuration (as it appears in JSONC).
 */
export interface JobConfigRaw {
  id: string;
  account: string;
  enabled?: boolean; // Defaults to true
  schedule?: string; // Cron expression; omit for manual/CLI-only
  remote: RemoteConfigRaw;
  local: LocalConfigRaw;
  sync?: SyncTuningRaw;
}

/**
 * Complete configuration file structure (as it appears in JSONC).
 */
export interface ConfigFile {
  state: StateConfig;
  jobs: JobConfigRaw[];
}
