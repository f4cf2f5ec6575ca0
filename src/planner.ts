// CHANGE: Collapse resolved records into unique download tasks and estimate the total size.
// WHY: Every target path is fetched once; the dry-run estimate is the sum over those tasks.

import path from "path";
import sanitize from "sanitize-filename";
import { debug, warn } from "./logger.js";
import { DownloadTask } from "./task.js";
import { Destination, PatchRecord, PlacedRecord } from "./types.js";
import { recordKey } from "./utils/record-key.js";

export const QUARTER_DIRECTORY = "quarter_patches";
export const OPATCH_DIRECTORY = "opatch";
export const AHF_DIRECTORY = "ahf";

export interface PlanOptions {
  readonly downloadRoot: string;
}

export interface Plan {
  readonly tasks: readonly DownloadTask[];
  readonly totalBytes: number;
  readonly duplicates: number;
}

function segment(value: string, fallback: string): string {
  const cleaned = sanitize(value).trim();
  return cleaned === "" ? sanitize(fallback) || "unnamed" : cleaned;
}

/**
 * Directory a record lands in under `downloadRoot`.
 */
export function destinationDirectory(downloadRoot: string, record: PatchRecord, destination: Destination): string {
  switch (destination.kind) {
    case "opatch":
      return path.join(downloadRoot, OPATCH_DIRECTORY);
    case "ahf":
      return path.join(downloadRoot, AHF_DIRECTORY);
    case "group":
      return path.join(
        downloadRoot,
        ...destination.directory
          .split(/[\\/]+/)
          .filter(part => part !== "" && part !== "." && part !== "..")
          .map(part => segment(part, "group"))
      );
    case "quarter":
      return path.join(
        downloadRoot,
        QUARTER_DIRECTORY,
        segment(record.release, "unknown-release"),
        segment(record.platform.name, record.platform.code)
      );
  }
}

/**
 * Build the deduplicated task set.
 *
 * Records sharing a key collapse into one task; when a duplicate resolves to another directory, that
 * directory becomes an extra placement of the task so its manifest lists the file too. Records resolving
 * to a target path already taken share its task. `totalBytes` is the sum of expected sizes over the tasks.
 */
export function plan(records: Iterable<PlacedRecord>, options: PlanOptions): Plan {
  const byKey = new Map<string, DownloadTask>();
  const byTarget = new Map<string, DownloadTask>();
  let duplicates = 0;

  for (const { record, destination } of records) {
    const directory = destinationDirectory(options.downloadRoot, record, destination);
    const targetPath = path.join(directory, segment(record.file_name, `${record.patch_number}.zip`));
    const manifest = { file_name: path.basename(targetPath), description: record.description };
    const key = recordKey(record);

    const sameRecord = byKey.get(key);
    if (sameRecord) {
      duplicates += 1;
      if (!byTarget.has(targetPath) && sameRecord.addPlacement(targetPath, manifest)) {
        byTarget.set(targetPath, sameRecord);
        debug(`${sameRecord.fileName} is also placed at ${targetPath}.`);
      }
      continue;
    }

    const existing = byTarget.get(targetPath);
    if (existing) {
      duplicates += 1;
      if (existing.expectedSizeBytes !== record.size_bytes) {
        warn(
          `Conflicting sizes for ${targetPath}: ${existing.expectedSizeBytes} vs ${record.size_bytes}; keeping the first.`
        );
      }
      byKey.set(key, existing);
      continue;
    }
    const task = new DownloadTask(targetPath, record.download_ref, record.size_bytes, record, manifest);
    byKey.set(key, task);
    byTarget.set(targetPath, task);
  }

  const tasks = Array.from(new Set(byTarget.values()));
  const totalBytes = tasks.reduce((sum, task) => sum + task.expectedSizeBytes, 0);
  debug(`Planned ${tasks.length} downloads (${duplicates} duplicates collapsed, ${totalBytes} bytes).`);
  return { tasks, totalBytes, duplicates };
}
