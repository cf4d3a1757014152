/**
 * Wire everything together: parse config, build stores, create engines, run sync cycles.
 */

import {
  ConfigError,
  SyncEngine,
  createLogger,
  type Logger,
  type RunSummary,
  type SyncSession,
  type SyncState,
  type SyncStateStore,
} from "@foldersync/core";
import type { ConfigFile, JobConfigRaw } from "./config.js";
import { loadCodec, loadLocal, loadRemote, loadStateStore } from "./loaders.js";
import { loadConfigFile } from "./parser.js";

/**
 * Options shared by the runner entry points.
 */
export interface RunnerOptions {
  logger?: Logger;
  /**
   * Use this store instead of the one named in the configuration.
   */
  stateStore?: SyncStateStore;
}

/**
 * State and recent runs of one job, as shown by `foldersync status`.
 */
export interface JobStatus {
  jobId: string;
  accountId: string;
  state: SyncState;
  runs: RunSummary[];
}

/**
 * Build the session a job syncs: its remote store and folder, local store and codec.
 */
export async function createSessionForJob(jobConfig: JobConfigRaw): Promise<SyncSession> {
  const { remote, folderId } = await loadRemote(jobConfig);
  const local = loadLocal(jobConfig);
  return {
    accountId: jobConfig.account,
    folderId,
    remote,
    local,
    codec: loadCodec(local),
  };
}

/**
 * Create a SyncEngine for a job configuration.
 */
export function createEngineForJob(
  jobConfig: JobConfigRaw,
  stateStore: SyncStateStore,
  logger: Logger
): SyncEngine {
  return new SyncEngine({
    stateStore,
    fetchConcurrency: jobConfig.sync?.fetch_concurrency,
    uploadConcurrency: jobConfig.sync?.upload_concurrency,
    logger: logger.child({ jobId: jobConfig.id }),
  });
}

/**
 * Find a job by id.
 * @throws ConfigError if no job has that id
 */
export function findJob(config: ConfigFile, jobId: string): JobConfigRaw {
  const job = config.jobs.find((candidate) => candidate.id === jobId);
  if (!job) {
    throw new ConfigError({ message: `Unknown job '${jobId}'` });
  }
  return job;
}

/**
 * Run one sync cycle for each job of a configuration file.
 * Disabled jobs are skipped unless asked for by id.
 * @param configFilePath - Path to the JSONC configuration file
 * @param jobIds - Optional array of job IDs to run (if not provided, runs all enabled jobs)
 * @returns Array of run summaries
 */
export async function runJobs(
  configFilePath: string,
  jobIds?: string[],
  options: RunnerOptions = {}
): Promise<RunSummary[]> {
  const logger = options.logger ?? createLogger("cli");
  const config = await loadConfigFile(configFilePath);
  const stateStore = options.stateStore ?? loadStateStore(config.state);

  let jobs: JobConfigRaw[];
  if (jobIds && jobIds.length > 0) {
    jobs = jobIds.map((jobId) => findJob(config, jobId));
  } else {
    jobs = config.jobs.filter((job) => {
      if (job.enabled === false) {
        logger.info("Skipping disabled job", { jobId: job.id });
        return false;
      }
      return true;
    });
  }

  const results: RunSummary[] = [];
  for (const jobConfig of jobs) {
    const session = await createSessionForJob(jobConfig);
    const engine = createEngineForJob(jobConfig, stateStore, logger);

    logger.info("Running job", { jobId: jobConfig.id });
    const summary = await engine.run(session);
    results.push(summary);

    if (summary.status === "failed") {
      logger.error("Job failed", summary.fatalError, { jobId: jobConfig.id });
    } else if (summary.stats.errors.length > 0) {
      logger.warn("Job completed with errors", {
        jobId: jobConfig.id,
        errors: summary.stats.errors,
      });
    } else {
      logger.info("Job completed", { jobId: jobConfig.id, status: summary.status });
    }
  }

  return results;
}

/**
 * Delete a local record of a job and queue its remote file for trashing on the next run.
 * @returns false when the record does not exist
 */
export async function deleteRecordForJob(
  configFilePath: string,
  jobId: string,
  recordId: string,
  options: RunnerOptions = {}
): Promise<boolean> {
  const logger = options.logger ?? createLogger("cli");
  const config = await loadConfigFile(configFilePath);
  const jobConfig = findJob(config, jobId);
  const stateStore = options.stateStore ?? loadStateStore(config.state);

  const session = await createSessionForJob(jobConfig);
  const engine = createEngineForJob(jobConfig, stateStore, logger);
  return engine.deleteRecord(session, recordId);
}

/**
 * Read the stored state and the most recent runs of a job.
 * @param limit - Number of runs to return, newest last
 */
export async function statusForJob(
  configFilePath: string,
  jobId: string,
  limit = 10,
  options: RunnerOptions = {}
): Promise<JobStatus> {
  const config = await loadConfigFile(configFilePath);
  const jobConfig = findJob(config, jobId);
  const stateStore = options.stateStore ?? loadStateStore(config.state);

  const state = await stateStore.loadState(jobConfig.account);
  const runs = await stateStore.getRuns(jobConfig.account);
  return {
    jobId,
    accountId: jobConfig.account,
    state,
    runs: runs.slice(-limit),
  };
}
