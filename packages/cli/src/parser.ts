/**
 * JSONC configuration file parsing, environment variable expansion and validation.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import { ConfigError } from "@foldersync/core";
import type {
  ConfigFile,
  CredentialsConfig,
  JobConfigRaw,
  LocalConfigRaw,
  RemoteConfigRaw,
  StateConfig,
  SyncTuningRaw,
} from "./config.js";

type JsonObject = { [key: string]: unknown };

/**
 * Load and parse a JSONC configuration file.
 * @param configPath - Path to the JSONC configuration file
 * @returns Validated configuration with environment variables expanded
 * @throws ConfigError if the file cannot be read, parsed or validated
 */
export async function loadConfigFile(configPath: string): Promise<ConfigFile> {
  const fullPath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.readFile(fullPath, "utf-8");
  } catch (error) {
    throw new ConfigError({
      message: `Failed to read config from ${fullPath}`,
      cause: error,
    });
  }

  try {
    return parseConfigText(content);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError({
        message: `Failed to load config from ${fullPath}: ${error.message}`,
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Parse JSONC text into a validated configuration.
 */
export function parseConfigText(content: string): ConfigFile {
  const errors: ParseError[] = [];

  // Parse JSONC (supports comments)
  const raw: unknown = parseJsonc(content, errors, {
    allowTrailingComma: true,
    disallowComments: false,
  });

  if (errors.length > 0) {
    const errorMessages = errors.map(
      (e) => `Error at offset ${e.offset}: ${printParseErrorCode(e.error)}`
    );
    throw new ConfigError({
      message: `Failed to parse JSONC: ${errorMessages.join(", ")}`,
    });
  }

  return validateConfig(expandEnvVars(raw));
}

/**
 * Expand environment variables in a string.
 * Supports ${VAR} and ${VAR:-default} syntax.
 * @param value - String that may contain environment variable references
 * @returns Expanded string
 */
export function expandEnvVar(value: string): string {
  return value.replace(
    /\$\{([^}:-]+)(?::-([^}]*))?\}/g,
    (match: string, varName: string, defaultValue: string | undefined) => {
      const envValue = process.env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      // Unresolved references stay as written so validation can report them
      return match;
    }
  );
}

/**
 * Recursively expand environment variables in parsed JSON.
 */
export function expandEnvVars(value: unknown): unknown {
  if (typeof value === "string") {
    return expandEnvVar(value);
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => expandEnvVars(item));
  }

  if (isObject(value)) {
    const expanded: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      expanded[key] = expandEnvVars(entry);
    }
    return expanded;
  }

  return value;
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(message: string): never {
  throw new ConfigError({ message });
}

function requireString(obj: JsonObject, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== "string" || value.length === 0) {
    fail(`${where}: '${key}' must be a non-empty string`);
  }
  if (/\$\{[^}]+\}/.test(value)) {
    fail(`${where}: '${key}' references an unset environment variable (${value})`);
  }
  return value;
}

function optionalString(obj: JsonObject, key: string, where: string): string | undefined {
  return obj[key] === undefined ? undefined : requireString(obj, key, where);
}

function optionalPositiveInt(obj: JsonObject, key: string, where: string): number | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    fail(`${where}: '${key}' must be a positive integer`);
  }
  return value;
}

/**
 * Validate the structure of the configuration object.
 * @throws ConfigError if configuration is invalid
 */
export function validateConfig(config: unknown): ConfigFile {
  if (!isObject(config)) {
    fail("Configuration file must contain an object");
  }

  if (!isObject(config.state)) {
    fail("Configuration must include 'state' section");
  }
  const driver = config.state.driver;
  if (driver !== "sqlite" && driver !== "in-memory") {
    fail("State configuration 'driver' must be 'sqlite' or 'in-memory'");
  }
  const state: StateConfig = {
    driver,
    conn: driver === "sqlite" ? requireString(config.state, "conn", "State configuration") : "",
  };

  if (!Array.isArray(config.jobs)) {
    fail("Configuration must include 'jobs' array");
  }

  const jobs = config.jobs.map((job: unknown, index: number) => validateJobConfig(job, index));
  const seen = new Set<string>();
  // State is kept per account, so two jobs on one account would share a cursor
  const accounts = new Map<string, string>();
  for (const job of jobs) {
    if (seen.has(job.id)) {
      fail(`Duplicate job id '${job.id}'`);
    }
    seen.add(job.id);
    const owner = accounts.get(job.account);
    if (owner !== undefined) {
      fail(`Job '${job.id}': account '${job.account}' is already used by job '${owner}'`);
    }
    accounts.set(job.account, job.id);
  }

  return { state, jobs };
}

/**
 * Validate a single job configuration.
 * @throws ConfigError if job configuration is invalid
 */
function validateJobConfig(job: unknown, index: number): JobConfigRaw {
  if (!isObject(job)) {
    fail(`jobs[${index}] must be an object`);
  }
  const id = requireString(job, "id", `jobs[${index}]`);
  const where = `Job '${id}'`;

  if (job.enabled !== undefined && typeof job.enabled !== "boolean") {
    fail(`${where}: 'enabled' must be a boolean`);
  }

  return {
    id,
    account: requireString(job, "account", where),
    enabled: job.enabled,
    schedule: optionalString(job, "schedule", where),
    remote: validateRemoteConfig(job.remote, where),
    local: validateLocalConfig(job.local, where),
    sync: validateSyncTuning(job.sync, where),
  };
}

function validateRemoteConfig(remote: unknown, jobWhere: string): RemoteConfigRaw {
  const where = `${jobWhere}, remote`;
  if (!isObject(remote)) {
    fail(`${jobWhere}: must have a 'remote' object`);
  }
  const driver = remote.driver;
  if (driver !== "gdrive" && driver !== "in-memory") {
    fail(`${where}: 'driver' must be 'gdrive' or 'in-memory'`);
  }

  const folderId = optionalString(remote, "folder_id", where);
  const folder = optionalString(remote, "folder", where);
  if (folderId === undefined && folder === undefined) {
    fail(`${where}: must have 'folder_id' or 'folder'`);
  }
  if (driver === "in-memory" && folderId === undefined) {
    fail(`${where}: the in-memory driver needs 'folder_id'`);
  }

  let creds: CredentialsConfig | undefined;
  if (remote.creds !== undefined) {
    if (!isObject(remote.creds)) {
      fail(`${where}: 'creds' must be an object`);
    }
    creds = {};
    for (const [key, value] of Object.entries(remote.creds)) {
      if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
        fail(`${where}: creds.${key} must be a string, number or boolean`);
      }
      creds[key] = value;
    }
  }
  if (driver === "gdrive") {
    if (creds === undefined) {
      fail(`${where}: the gdrive driver needs 'creds'`);
    }
    for (const key of ["client_id", "client_secret", "refresh_token"]) {
      requireString(creds, key, `${where}, creds`);
    }
  }

  return {
    driver,
    folder_id: folderId,
    folder,
    creds,
    page_size: optionalPositiveInt(remote, "page_size", where),
  };
}

function validateLocalConfig(local: unknown, jobWhere: string): LocalConfigRaw {
  const where = `${jobWhere}, local`;
  if (!isObject(local)) {
    fail(`${jobWhere}: must have a 'local' object`);
  }
  if (local.driver !== "directory") {
    fail(`${where}: 'driver' must be 'directory'`);
  }
  return { driver: "directory", path: requireString(local, "path", where) };
}

function validateSyncTuning(sync: unknown, jobWhere: string): SyncTuningRaw | undefined {
  if (sync === undefined) {
    return undefined;
  }
  const where = `${jobWhere}, sync`;
  if (!isObject(sync)) {
    fail(`${where}: must be an object`);
  }
  return {
    fetch_concurrency: optionalPositiveInt(sync, "fetch_concurrency", where),
    upload_concurrency: optionalPositiveInt(sync, "upload_concurrency", where),
  };
}
