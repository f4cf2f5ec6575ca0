// CHANGE: Execute download tasks with resume, bounded retries and size/digest verification.
// WHY: A target path only ever receives a complete, verified file, via rename from its partial file.

import fs from "fs-extra";
import path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { DOWNLOAD, NET } from "./config.js";
import { describeError, DownloadError, FilesystemError } from "./errors.js";
import { debug, info, warn } from "./logger.js";
import { Session, SessionHandle, sessionHeaders } from "./session.js";
import { DownloadTask } from "./task.js";
import { ProgressFunction } from "./types.js";
import { sha256File } from "./utils/hashing.js";
import { httpClient, isAuthRejection, isTransientError, RetryPolicy, sleep, statusOf } from "./utils/http.js";

export type TaskError = DownloadError | FilesystemError;

/**
 * Result of one task. `skipped` means the target already held a file of the expected size.
 */
export type DownloadOutcome =
  | { readonly ok: true; readonly kind: "downloaded" | "skipped"; readonly value: string }
  | { readonly ok: false; readonly kind: "failed"; readonly error: TaskError };

export interface DownloadManagerOptions {
  readonly session: SessionHandle;
  readonly retry: RetryPolicy;
  readonly onProgress?: ProgressFunction;
  /** Longest silence allowed while a body streams before the attempt fails as a timeout. */
  readonly idleTimeoutMs?: number;
}

/**
 * Partial file sitting beside the target while it downloads.
 */
export function partialPath(targetPath: string): string {
  return `${targetPath}${DOWNLOAD.PARTIAL_SUFFIX}`;
}

/**
 * Size of the file at `filePath`, or undefined when there is no regular file.
 */
export async function fileSize(filePath: string): Promise<number | undefined> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() ? stats.size : undefined;
  } catch (error) {
    if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

/**
 * Whether an error reports a full disk.
 */
export function isDiskFull(error: unknown): boolean {
  if (error instanceof FilesystemError) {
    return error.context?.code === "ENOSPC";
  }
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOSPC";
}

function filesystemError(message: string, cause: unknown): FilesystemError {
  const code = typeof cause === "object" && cause !== null && "code" in cause ? cause.code : undefined;
  return new FilesystemError(`${message}: ${describeError(cause)}`, { code });
}

/**
 * Runs one task at a time; safe to share between workers since it keeps no per-task state.
 */
export class DownloadManager {
  constructor(private readonly options: DownloadManagerOptions) {}

  /**
   * Bring `task.targetPath` to a complete file.
   *
   * Never throws for task-level failures; they come back as a `failed` outcome with the task marked failed.
   */
  async execute(task: DownloadTask): Promise<DownloadOutcome> {
    let existing: number | undefined;
    try {
      existing = await fileSize(task.targetPath);
    } catch (cause) {
      return this.fail(task, filesystemError(`Cannot inspect ${task.targetPath}`, cause));
    }
    if (existing === task.expectedSizeBytes) {
      task.transition("done");
      debug(`Skipping ${task.fileName}: already present with expected size.`);
      this.options.onProgress?.(task.fileName, task.expectedSizeBytes, task.expectedSizeBytes);
      return { ok: true, kind: "skipped", value: task.targetPath };
    }
    if (existing !== undefined) {
      warn(`${task.targetPath} has ${existing} bytes, expected ${task.expectedSizeBytes}; downloading again.`);
    }

    task.transition("in-progress");
    try {
      await fs.ensureDir(path.dirname(task.targetPath));
    } catch (cause) {
      return this.fail(task, filesystemError(`Cannot create directory for ${task.targetPath}`, cause));
    }

    const transferred = await this.transferWithRetry(task);
    if (!transferred.ok) {
      return this.fail(task, transferred.error);
    }

    try {
      await fs.move(partialPath(task.targetPath), task.targetPath, { overwrite: true });
    } catch (cause) {
      return this.fail(task, filesystemError(`Cannot rename into ${task.targetPath}`, cause));
    }
    task.transition("done");
    info(`Downloaded ${task.fileName} (${task.expectedSizeBytes} bytes).`);
    return { ok: true, kind: "downloaded", value: task.targetPath };
  }

  private fail(task: DownloadTask, error: TaskError): DownloadOutcome {
    task.transition("failed");
    warn(`Download failed for ${task.fileName}: ${error.message}`);
    return { ok: false, kind: "failed", error };
  }

  private async transferWithRetry(
    task: DownloadTask
  ): Promise<{ readonly ok: true } | { readonly ok: false; readonly error: TaskError }> {
    const attempts = Math.max(1, this.options.retry.attempts);
    let attempt = 0;
    let refreshed = false;
    let session: Session;
    try {
      session = await this.options.session.current();
    } catch (cause) {
      return { ok: false, error: new DownloadError(`No session for ${task.fileName}: ${describeError(cause)}`, false) };
    }

    for (;;) {
      try {
        await this.transfer(task, session);
        await this.verify(task);
        return { ok: true };
      } catch (error) {
        if (error instanceof FilesystemError) {
          return { ok: false, error };
        }
        if (isDiskFull(error)) {
          return { ok: false, error: filesystemError(`Disk full while writing ${task.fileName}`, error) };
        }
        if (isAuthRejection(error) && !refreshed) {
          refreshed = true;
          debug(`Session rejected while downloading ${task.fileName}; refreshing.`);
          try {
            session = await this.options.session.refresh(session);
          } catch (cause) {
            return { ok: false, error: new DownloadError(`Session refresh failed: ${describeError(cause)}`, false) };
          }
          continue;
        }
        attempt += 1;
        if (attempt >= attempts || !isTransientError(error)) {
          return {
            ok: false,
            error: new DownloadError(`${task.fileName} failed after ${attempt} attempt(s): ${describeError(error)}`, false, {
              status: statusOf(error)
            })
          };
        }
        const backoff = this.options.retry.baseDelayMs * 2 ** (attempt - 1);
        debug(`Retrying ${task.fileName} (${attempt + 1}/${attempts}) after ${backoff}ms.`);
        await sleep(backoff);
      }
    }
  }

  private async transfer(task: DownloadTask, session: Session): Promise<void> {
    const partial = partialPath(task.targetPath);
    let offset = (await fileSize(partial)) ?? 0;
    if (offset > task.expectedSizeBytes) {
      await fs.remove(partial);
      offset = 0;
    }
    if (offset === task.expectedSizeBytes && offset > 0) {
      return;
    }

    const headers: Record<string, string> = { ...sessionHeaders(session) };
    if (offset > 0) {
      headers.Range = `bytes=${offset}-`;
    }
    const response = await httpClient.get<Readable>(task.source, {
      responseType: "stream",
      headers,
      timeout: NET.TIMEOUT,
      validateStatus: status => status >= 200 && status < 300
    });

    if (offset > 0 && response.status !== 206) {
      debug(`Server ignored range request for ${task.fileName}; restarting.`);
      offset = 0;
    } else if (offset > 0) {
      debug(`Resuming ${task.fileName} at byte ${offset}.`);
    }

    const body = response.data;
    const idleTimeoutMs = this.options.idleTimeoutMs ?? NET.IDLE_TIMEOUT_MS;
    let idle: NodeJS.Timeout | undefined;
    const armIdleTimer = (): void => {
      clearTimeout(idle);
      idle = setTimeout(() => {
        body.destroy(
          new DownloadError(`${task.fileName} stalled for ${idleTimeoutMs}ms`, true, { code: "ETIMEDOUT" })
        );
      }, idleTimeoutMs);
    };

    let received = offset;
    body.on("data", (chunk: Buffer) => {
      armIdleTimer();
      received += chunk.length;
      this.options.onProgress?.(task.fileName, task.expectedSizeBytes, received);
    });
    armIdleTimer();
    try {
      await pipeline(body, fs.createWriteStream(partial, { flags: offset > 0 ? "a" : "w" }));
    } finally {
      clearTimeout(idle);
    }
  }

  private async verify(task: DownloadTask): Promise<void> {
    const partial = partialPath(task.targetPath);
    const size = (await fileSize(partial)) ?? 0;
    if (size < task.expectedSizeBytes) {
      throw new DownloadError(`${task.fileName} is incomplete (${size}/${task.expectedSizeBytes} bytes)`, true);
    }
    if (size > task.expectedSizeBytes) {
      await fs.remove(partial);
      throw new DownloadError(`${task.fileName} is larger than expected (${size}/${task.expectedSizeBytes} bytes)`, true);
    }
    const expectedDigest = task.record.sha256;
    if (expectedDigest) {
      const actual = await sha256File(partial);
      if (actual !== expectedDigest) {
        await fs.remove(partial);
        throw new DownloadError(`${task.fileName} checksum does not match the catalog's`, true, {
          expected: expectedDigest,
          actual
        });
      }
    }
  }
}
