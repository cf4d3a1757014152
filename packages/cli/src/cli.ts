#!/usr/bin/env node
/**
 * foldersync CLI - Main entry point
 */

import { Command } from "commander";
import * as path from "path";
import * as fs from "fs/promises";
import { config } from "dotenv";
import * as cron from "node-cron";
import { createLogger, describeError } from "@foldersync/core";
import { deleteRecordForJob, runJobs, statusForJob } from "./runner.js";
import { loadConfigFile } from "./parser.js";
import { closeStateStores } from "./loaders.js";

// Load environment variables from .env file if it exists
config();

const DEFAULT_CONFIG = "foldersync.jsonc";

interface ConfigOption {
  config: string;
}

const program = new Command();

/**
 * Resolve the config path, exiting when the file does not exist.
 */
async function resolveConfigPath(configOption: string): Promise<string> {
  const configPath = path.resolve(configOption);
  try {
    await fs.access(configPath);
  } catch {
    console.error(`Error: Configuration file not found: ${configPath}`);
    process.exit(1);
  }
  return configPath;
}

program
  .name("foldersync")
  .description("Two-way sync between a local record store and a remote folder")
  .version("0.1.0");

program
  .command("run")
  .description("Run one sync cycle for each job")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .option("-j, --jobs <ids...>", "Specific job IDs to run (default: all enabled jobs)")
  .action(async (options: ConfigOption & { jobs?: string[] }) => {
    try {
      const configPath = await resolveConfigPath(options.config);
      const results = await runJobs(configPath, options.jobs);

      for (const summary of results) {
        console.log(
          `${summary.accountId}: ${summary.status} (${summary.mode ?? "no mode"}, ` +
            `cursor ${summary.cursorBefore ?? "none"} -> ${summary.cursorAfter ?? "none"})`
        );
      }
      console.log(`\nCompleted ${results.length} job(s)`);

      // Exit with error code if any job failed
      const hasFailures = results.some((r) => r.status === "failed");
      process.exit(hasFailures ? 1 : 0);
    } catch (error) {
      console.error(`Error running jobs: ${describeError(error)}`);
      process.exit(1);
    }
  });

program
  .command("schedule")
  .description("Run sync jobs on their configured schedules")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .action(async (options: ConfigOption) => {
    try {
      const configPath = await resolveConfigPath(options.config);
      const fileConfig = await loadConfigFile(configPath);
      const logger = createLogger("scheduler");

      console.log(`Starting scheduled sync jobs from ${configPath}`);
      console.log(`Found ${fileConfig.jobs.length} job(s)\n`);

      const scheduledJobs: Map<string, cron.ScheduledTask> = new Map();
      // A job is never run twice at once; ticks arriving mid-run are skipped
      const running = new Set<string>();

      for (const jobConfig of fileConfig.jobs) {
        if (jobConfig.enabled === false) {
          console.log(`Job '${jobConfig.id}' is disabled`);
          continue;
        }
        if (!jobConfig.schedule) {
          console.log(`Job '${jobConfig.id}' has no schedule (manual/CLI-only)`);
          continue;
        }
        if (!cron.validate(jobConfig.schedule)) {
          console.error(`Invalid cron expression for job '${jobConfig.id}': ${jobConfig.schedule}`);
          continue;
        }

        const jobId = jobConfig.id;
        const task = cron.schedule(
          jobConfig.schedule,
          async () => {
            if (running.has(jobId)) {
              logger.warn("Previous run still in progress, skipping tick", { jobId });
              return;
            }
            running.add(jobId);
            try {
              await runJobs(configPath, [jobId], { logger });
            } catch (error) {
              logger.error("Scheduled run failed", error, { jobId });
            } finally {
              running.delete(jobId);
            }
          },
          {
            scheduled: true,
            timezone: "UTC",
          }
        );

        scheduledJobs.set(jobId, task);
        console.log(`Scheduled job '${jobId}' with cron: ${jobConfig.schedule}`);
      }

      if (scheduledJobs.size === 0) {
        console.log("\nNo jobs with schedules found. Use 'foldersync run' to run jobs manually.");
        process.exit(0);
      }

      console.log(`\n${scheduledJobs.size} job(s) scheduled. Press Ctrl+C to stop.`);

      process.on("SIGINT", () => {
        console.log("\nShutting down...");
        for (const [jobId, task] of scheduledJobs) {
          task.stop();
          console.log(`Stopped schedule for job '${jobId}'`);
        }
        closeStateStores();
        process.exit(0);
      });

      // Keep process alive
      await new Promise<never>(() => {});
    } catch (error) {
      console.error(`Error starting scheduled jobs: ${describeError(error)}`);
      process.exit(1);
    }
  });

program
  .command("validate")
  .description("Validate a configuration file without running jobs")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .action(async (options: ConfigOption) => {
    try {
      const configPath = await resolveConfigPath(options.config);
      const fileConfig = await loadConfigFile(configPath);

      console.log(`✓ Configuration file is valid: ${configPath}`);
      console.log(`  State: ${fileConfig.state.driver}${fileConfig.state.conn ? ` (${fileConfig.state.conn})` : ""}`);
      console.log(`  Jobs: ${fileConfig.jobs.length}`);

      for (const job of fileConfig.jobs) {
        const schedule = job.schedule ? `schedule: ${job.schedule}` : "manual";
        const disabled = job.enabled === false ? ", disabled" : "";
        console.log(`    - ${job.id} [${job.remote.driver} -> ${job.local.path}] (${schedule}${disabled})`);
      }

      process.exit(0);
    } catch (error) {
      console.error(`Configuration validation failed: ${describeError(error)}`);
      process.exit(1);
    }
  });

program
  .command("status <job>")
  .description("Show the stored cursor, pending deletions and recent runs of a job")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .option("-n, --limit <count>", "Number of runs to show", "10")
  .action(async (jobId: string, options: ConfigOption & { limit: string }) => {
    try {
      const configPath = await resolveConfigPath(options.config);
      const limit = Number.parseInt(options.limit, 10);
      const status = await statusForJob(configPath, jobId, Number.isNaN(limit) ? 10 : limit);

      console.log(`Job '${status.jobId}' (account ${status.accountId})`);
      console.log(`  Cursor: ${status.state.largestChangeId ?? "none (next run is an initial sync)"}`);
      console.log(`  Pending deletions: ${status.state.pendingDeletionIds.length}`);
      console.log(`  Runs: ${status.runs.length}`);
      for (const run of status.runs) {
        console.log(
          `    - ${run.startedAt.toISOString()} ${run.status} ` +
            `pushed=${run.stats.pushed} pulled=${run.stats.pulled} ` +
            `imported=${run.stats.imported} uploaded=${run.stats.uploaded}` +
            (run.fatalError ? ` error=${run.fatalError}` : "")
        );
      }
      process.exit(0);
    } catch (error) {
      console.error(`Error reading status: ${describeError(error)}`);
      process.exit(1);
    }
  });

program
  .command("delete <job> <recordId>")
  .description("Delete a local record; its remote file is trashed on the next run")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .action(async (jobId: string, recordId: string, options: ConfigOption) => {
    try {
      const configPath = await resolveConfigPath(options.config);
      const deleted = await deleteRecordForJob(configPath, jobId, recordId);
      if (!deleted) {
        console.error(`Record '${recordId}' not found in job '${jobId}'`);
        process.exit(1);
      }
      console.log(`Deleted record '${recordId}'`);
      process.exit(0);
    } catch (error) {
      console.error(`Error deleting record: ${describeError(error)}`);
      process.exit(1);
    }
  });

// Parse command line arguments
program.parse();
