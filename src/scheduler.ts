// CHANGE: Run planned tasks through a bounded worker pool with a global stop signal.
// WHY: One failed task never aborts the batch; a stop only prevents tasks that have not started.

import pLimit from "p-limit";
import path from "path";
import { DownloadManager, fileSize, isDiskFull, partialPath } from "./downloader.js";
import { describeError } from "./errors.js";
import { LayoutWriter } from "./layout.js";
import { debug, info, warn } from "./logger.js";
import { DownloadTask } from "./task.js";
import { freeBytes } from "./utils/disk.js";

/**
 * Cooperative stop flag checked before each task starts.
 */
export class StopSignal {
  private stopReason: string | undefined;

  get stopped(): boolean {
    return this.stopReason !== undefined;
  }

  get reason(): string | undefined {
    return this.stopReason;
  }

  /**
   * Request a stop. The first reason wins.
   */
  stop(reason: string): void {
    if (this.stopReason === undefined) {
      this.stopReason = reason;
      warn(`Stopping: ${reason}. In-flight downloads will finish.`);
    }
  }
}

export interface TaskFailure {
  readonly fileName: string;
  readonly targetPath: string;
  readonly message: string;
}

export interface RunSummary {
  readonly total: number;
  readonly downloaded: number;
  readonly skipped: number;
  readonly failed: number;
  readonly notStarted: number;
  readonly failures: readonly TaskFailure[];
  readonly stopReason?: string;
}

export interface RunOptions {
  readonly manager: Pick<DownloadManager, "execute">;
  readonly layout: Pick<LayoutWriter, "record">;
  readonly concurrency: number;
  readonly signal?: StopSignal;
  readonly freeSpace?: (directory: string) => Promise<number | undefined>;
}

/**
 * Bytes still to be written for `task`: nothing when the target is complete, otherwise what its partial file lacks.
 */
async function bytesNeeded(task: DownloadTask): Promise<number> {
  try {
    if ((await fileSize(task.targetPath)) === task.expectedSizeBytes) {
      return 0;
    }
    const partial = (await fileSize(partialPath(task.targetPath))) ?? 0;
    return partial <= task.expectedSizeBytes ? task.expectedSizeBytes - partial : task.expectedSizeBytes;
  } catch (error) {
    debug(`Cannot inspect ${task.targetPath}: ${describeError(error)}`);
    return task.expectedSizeBytes;
  }
}

/**
 * Execute every task with at most `concurrency` in flight.
 *
 * Before a task starts, the free space of its directory minus the bytes in-flight tasks have yet to write
 * must cover what the task still needs; otherwise the stop signal is raised.
 */
export async function runTasks(tasks: readonly DownloadTask[], options: RunOptions): Promise<RunSummary> {
  const limit = pLimit(Math.max(1, options.concurrency));
  const signal = options.signal ?? new StopSignal();
  const freeSpace = options.freeSpace ?? freeBytes;
  const failures: TaskFailure[] = [];
  let downloaded = 0;
  let skipped = 0;
  const reservations = new Map<DownloadTask, number>();

  // Reservations shrink as in-flight tasks fill their partial files.
  const refreshReservations = async (): Promise<void> => {
    await Promise.all(
      Array.from(reservations.keys()).map(async inFlight => {
        const remaining = await bytesNeeded(inFlight);
        const current = reservations.get(inFlight);
        if (current !== undefined) {
          reservations.set(inFlight, Math.min(current, remaining));
        }
      })
    );
  };

  const reservedBytes = (): number => {
    let total = 0;
    for (const bytes of reservations.values()) {
      total += bytes;
    }
    return total;
  };

  const runOne = async (task: DownloadTask): Promise<void> => {
    if (signal.stopped) {
      return;
    }
    const needed = await bytesNeeded(task);
    if (needed > 0) {
      await refreshReservations();
      const available = await freeSpace(path.dirname(task.targetPath));
      if (available !== undefined) {
        const free = available - reservedBytes();
        if (free < needed) {
          signal.stop(`disk space exhausted (${free} bytes free, ${task.fileName} needs ${needed})`);
          return;
        }
      }
    }

    if (signal.stopped) {
      return;
    }
    reservations.set(task, needed);
    try {
      const outcome = await options.manager.execute(task);
      if (!outcome.ok) {
        failures.push({ fileName: task.fileName, targetPath: task.targetPath, message: outcome.error.message });
        if (isDiskFull(outcome.error)) {
          signal.stop("disk full");
        }
        return;
      }
      if (outcome.kind === "skipped") {
        skipped += 1;
      } else {
        downloaded += 1;
      }
      try {
        await options.layout.record(task);
      } catch (error) {
        failures.push({ fileName: task.fileName, targetPath: task.targetPath, message: describeError(error) });
      }
    } finally {
      reservations.delete(task);
    }
  };

  info(`Downloading ${tasks.length} files with ${Math.max(1, options.concurrency)} workers.`);
  await Promise.all(tasks.map(task => limit(() => runOne(task))));

  const notStarted = tasks.filter(task => task.status === "pending").length;
  debug(`Run finished: ${downloaded} downloaded, ${skipped} skipped, ${failures.length} failed, ${notStarted} not started.`);
  return {
    total: tasks.length,
    downloaded,
    skipped,
    failed: failures.length,
    notStarted,
    failures,
    stopReason: signal.reason
  };
}
