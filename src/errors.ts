// CHANGE: Coded error classes shared by the catalog, session, downloader and layout.
// WHY: Retry decisions read `retryable`; the CLI reads `code` and `message` for reports.

export type ErrorCode =
  | "AUTH_ERROR"
  | "CATALOG_UNAVAILABLE"
  | "MALFORMED_RECORD"
  | "DOWNLOAD_ERROR"
  | "FILESYSTEM_ERROR"
  | "CONFIG_ERROR";

/**
 * Base class for every failure the downloader reports on purpose.
 */
export class PatchDownloaderError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, retryable = false, context?: Record<string, unknown>) {
    super(message);
    this.name = "PatchDownloaderError";
    this.code = code;
    this.retryable = retryable;
    this.context = context;
  }
}

/**
 * Credentials or session rejected by the catalog service. Aborts the run.
 */
export class AuthError extends PatchDownloaderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("AUTH_ERROR", message, false, context);
    this.name = "AuthError";
  }
}

/**
 * The catalog could not be reached, or answered with unusable data, after retries.
 */
export class CatalogUnavailableError extends PatchDownloaderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("CATALOG_UNAVAILABLE", message, true, context);
    this.name = "CatalogUnavailableError";
  }
}

/**
 * A single catalog entry failed to parse. Skipped, never fatal.
 */
export class MalformedRecordError extends PatchDownloaderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("MALFORMED_RECORD", message, false, context);
    this.name = "MalformedRecordError";
  }
}

/**
 * Transfer failure for one download task.
 */
export class DownloadError extends PatchDownloaderError {
  constructor(message: string, retryable: boolean, context?: Record<string, unknown>) {
    super("DOWNLOAD_ERROR", message, retryable, context);
    this.name = "DownloadError";
  }
}

/**
 * Directory creation, rename or manifest write failure. Fatal for the task only.
 */
export class FilesystemError extends PatchDownloaderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("FILESYSTEM_ERROR", message, false, context);
    this.name = "FilesystemError";
  }
}

/**
 * Invalid configuration file, environment value or filter pattern.
 */
export class ConfigError extends PatchDownloaderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("CONFIG_ERROR", message, false, context);
    this.name = "ConfigError";
  }
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
