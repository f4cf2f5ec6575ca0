// CHANGE: Provide canonical record key derivation shared by dedup and logging.
// WHY: Patch number, platform code and release identify an archive; file name separates multi-part patches.

import { PatchRecord } from "../types.js";

/**
 * Compute unique identifier for catalog records.
 *
 * @returns Stable uniqueness key.
 */
export function recordKey(record: PatchRecord): string {
  return [record.patch_number, record.platform.code, record.release, record.file_name].join("::");
}
