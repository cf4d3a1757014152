/**
 * @foldersync/cli - CLI for foldersync
 */

export {
  runJobs,
  createEngineForJob,
  createSessionForJob,
  deleteRecordForJob,
  statusForJob,
  findJob,
  type JobStatus,
  type RunnerOptions,
} from "./runner.js";
export {
  loadConfigFile,
  parseConfigText,
  validateConfig,
  expandEnvVar,
  expandEnvVars,
} from "./parser.js";
export {
  loadStateStore,
  closeStateStores,
  loadRemote,
  loadLocal,
  loadCodec,
  type LoadedRemote,
} from "./loaders.js";
export type {
  ConfigFile,
  JobConfigRaw,
  RemoteConfigRaw,
  LocalConfigRaw,
  StateConfig,
  CredentialsConfig,
  SyncTuningRaw,
} from "./config.js";
