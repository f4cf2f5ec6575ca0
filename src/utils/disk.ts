// CHANGE: Report free bytes for a directory that may not exist yet.
// WHY: The space check runs before destination directories are created.

import { statfs } from "fs/promises";
import fs from "fs-extra";
import path from "path";
import { describeError } from "../errors.js";
import { debug } from "../logger.js";

/**
 * Bytes available to the current user on the filesystem holding `target`.
 * Walks up to the nearest existing ancestor, since the download tree may not exist yet.
 *
 * @returns Free bytes, or undefined when the platform cannot report them.
 */
export async function freeBytes(target: string): Promise<number | undefined> {
  let current = path.resolve(target);
  while (!(await fs.pathExists(current))) {
    const parent = path.dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
  try {
    const stats = await statfs(current);
    return stats.bavail * stats.bsize;
  } catch (error) {
    debug(`Free space unavailable for ${current}: ${describeError(error)}`);
    return undefined;
  }
}

/**
 * Format a byte count in megabytes with two decimals and thousands separators.
 */
export function formatMegabytes(bytes: number): string {
  return `${(bytes / 1024 / 1024).toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 })} MB`;
}
