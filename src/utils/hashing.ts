// CHANGE: Stream a downloaded file through SHA-256.
// WHY: Patch archives are too large to read into memory for verification.

import { createHash } from "crypto";
import fs from "fs-extra";

/**
 * Stream a file through SHA-256.
 *
 * @returns Upper-case hexadecimal digest, the form the catalog publishes.
 */
export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex").toUpperCase();
}
