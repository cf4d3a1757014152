/**
 * Error types shared by the engine, adapters and CLI.
 */

export interface SyncErrorOptions {
  message: string;
  cause?: unknown;
  details?: { [key: string]: unknown };
}

/**
 * Base error that keeps the underlying cause and structured details.
 */
export class SyncError extends Error {
  public readonly cause?: unknown;
  public readonly details?: { [key: string]: unknown };

  constructor(options: SyncErrorOptions) {
    super(options.message);
    this.name = "SyncError";
    this.cause = options.cause;
    this.details = options.details;
  }
}

/**
 * A call to the remote store failed.
 */
export class RemoteStoreError extends SyncError {
  public readonly operation: string;

  constructor(operation: string, options: SyncErrorOptions) {
    super(options);
    this.name = "RemoteStoreError";
    this.operation = operation;
  }
}

/**
 * File content could not be converted to or from local records.
 */
export class CodecError extends SyncError {
  constructor(options: SyncErrorOptions) {
    super(options);
    this.name = "CodecError";
  }
}

/**
 * A programming defect: two local records claim the same remote file.
 */
export class InvariantViolationError extends SyncError {
  constructor(options: SyncErrorOptions) {
    super(options);
    this.name = "InvariantViolationError";
  }
}

/**
 * Configuration file is missing, unreadable, or malformed.
 */
export class ConfigError extends SyncError {
  constructor(options: SyncErrorOptions) {
    super(options);
    this.name = "ConfigError";
  }
}

/**
 * Render any thrown value, including its cause chain, as one line.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const message = `${error.name}: ${error.message}`;
  if (error instanceof SyncError && error.cause !== undefined) {
    return `${message} (caused by ${describeError(error.cause)})`;
  }
  return message;
}
