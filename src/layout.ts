// CHANGE: Write finished files into every directory that needs them, with one manifest line each.
// WHY: Manifests describe what a directory holds; re-runs must not duplicate their lines.

import fs from "fs-extra";
import path from "path";
import { DOWNLOAD } from "./config.js";
import { fileSize, partialPath } from "./downloader.js";
import { describeError, FilesystemError } from "./errors.js";
import { debug } from "./logger.js";
import { DownloadTask } from "./task.js";
import { ManifestEntry, Placement } from "./types.js";

/**
 * Render one manifest line. Line breaks inside descriptions are folded to spaces.
 */
export function formatManifestLine(entry: ManifestEntry): string {
  return `${entry.file_name} - ${entry.description.replace(/\s*[\r\n]+\s*/g, " ").trim()}`;
}

/**
 * Places finished files and appends their manifest lines to `description.txt` in each directory.
 *
 * Appends to one manifest are chained so concurrent workers never interleave or duplicate lines.
 */
export class LayoutWriter {
  private readonly queues = new Map<string, Promise<void>>();

  /**
   * Record a finished task in the manifest of every directory it is placed in, copying the file into
   * the directories other than the download target.
   *
   * @param task - Task in `done` state.
   * @throws FilesystemError when a copy, directory or manifest cannot be written.
   */
  async record(task: DownloadTask): Promise<void> {
    if (task.status !== "done") {
      throw new Error(`Cannot record ${task.targetPath} in status ${task.status}`);
    }
    for (const placement of task.placements) {
      if (placement.targetPath !== task.targetPath) {
        await this.place(task, placement.targetPath);
      }
      await this.enqueue(placement);
    }
  }

  private async place(task: DownloadTask, targetPath: string): Promise<void> {
    try {
      if ((await fileSize(targetPath)) === task.expectedSizeBytes) {
        debug(`${targetPath} already present.`);
        return;
      }
      const partial = partialPath(targetPath);
      await fs.copy(task.targetPath, partial, { overwrite: true });
      await fs.move(partial, targetPath, { overwrite: true });
      debug(`Copied ${task.fileName} to ${targetPath}.`);
    } catch (cause) {
      throw new FilesystemError(`Cannot place ${task.fileName} at ${targetPath}: ${describeError(cause)}`, {
        code: typeof cause === "object" && cause !== null && "code" in cause ? cause.code : undefined
      });
    }
  }

  private async enqueue(placement: Placement): Promise<void> {
    const directory = path.dirname(placement.targetPath);
    const manifestPath = path.join(directory, DOWNLOAD.MANIFEST_FILE);
    const line = formatManifestLine(placement.manifest);

    const previous = this.queues.get(manifestPath) ?? Promise.resolve();
    const next = previous.then(() => this.append(directory, manifestPath, line));
    const tail = next.catch(() => undefined);
    this.queues.set(manifestPath, tail);
    try {
      await next;
    } finally {
      if (this.queues.get(manifestPath) === tail) {
        this.queues.delete(manifestPath);
      }
    }
  }

  private async append(directory: string, manifestPath: string, line: string): Promise<void> {
    try {
      await fs.ensureDir(directory);
      if (await fs.pathExists(manifestPath)) {
        const existing = await fs.readFile(manifestPath, "utf8");
        if (existing.split(/\r?\n/).includes(line)) {
          debug(`Manifest ${manifestPath} already lists ${line}`);
          return;
        }
      }
      await fs.appendFile(manifestPath, `${line}\n`, "utf8");
    } catch (cause) {
      throw new FilesystemError(`Cannot update manifest ${manifestPath}: ${describeError(cause)}`);
    }
  }
}
