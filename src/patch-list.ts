// CHANGE: Read a CSV patch list and resolve each row's platform column against the catalog.
// WHY: A row may name a code, an exact name, a name pattern or nothing for the generic platform.

import fs from "fs-extra";
import { PATCHES } from "./config.js";
import { ConfigError, describeError } from "./errors.js";
import { warn } from "./logger.js";
import { PatchListRow, Platform } from "./types.js";

/**
 * Parse patch-list CSV content: `patch_number,platform[,directory]` per line.
 * Blank lines and lines starting with `#` are ignored; rows without a numeric patch number are skipped with a warning.
 */
export function parsePatchList(content: string): PatchListRow[] {
  const rows: PatchListRow[] = [];
  content.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) {
      return;
    }
    const columns = trimmed.split(",").map(column => column.trim());
    const [patchNumber = "", platformPattern = "", directory = ""] = columns;
    if (!/^\d+$/.test(patchNumber) || columns.length > 3) {
      warn(`Skipping patch list line ${index + 1}: ${trimmed}`);
      return;
    }
    rows.push({
      patch_number: patchNumber,
      platform_pattern: platformPattern,
      directory: directory === "" ? undefined : directory
    });
  });
  return rows;
}

/**
 * Read and parse a patch-list file.
 *
 * @throws ConfigError when the file cannot be read.
 */
export async function readPatchList(filePath: string): Promise<PatchListRow[]> {
  try {
    return parsePatchList(await fs.readFile(filePath, "utf8"));
  } catch (cause) {
    throw new ConfigError(`Cannot read patch list ${filePath}: ${describeError(cause)}`);
  }
}

/**
 * Platforms a patch-list row refers to.
 *
 * An empty pattern means the generic platform; a code or exact name picks one platform;
 * anything else is matched as a regular expression against whole platform names.
 */
export function resolveRowPlatforms(pattern: string, platforms: readonly Platform[]): Platform[] {
  if (pattern === "") {
    const generic = platforms.find(platform => platform.code === PATCHES.GENERIC_PLATFORM);
    return [generic ?? { code: PATCHES.GENERIC_PLATFORM, name: "Generic Platform" }];
  }
  const exact = platforms.filter(platform => platform.code === pattern || platform.name === pattern);
  if (exact.length > 0) {
    return exact;
  }
  if (/^\d+$/.test(pattern)) {
    return [{ code: pattern, name: pattern }];
  }
  let regex: RegExp;
  try {
    regex = new RegExp(`^(?:${pattern})$`);
  } catch (cause) {
    warn(`Invalid platform pattern ${pattern}: ${describeError(cause)}`);
    return [];
  }
  return platforms.filter(platform => regex.test(platform.name));
}
