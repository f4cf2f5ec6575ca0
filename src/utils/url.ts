// CHANGE: Resolve catalog download references and derive file names from them.
// WHY: Catalog entries mix absolute URLs and host-relative paths.

/**
 * Resolve a catalog download reference against the host it was published with.
 *
 * @param reference - Absolute URL, or a path relative to `base`.
 * @param base - Host or base URL of the catalog.
 * @returns Absolute URL.
 */
export function resolveDownloadUrl(reference: string, base: string): string {
  return new URL(reference, base.endsWith("/") ? base : `${base}/`).toString();
}

/**
 * Last path segment of a download URL, without its query string.
 *
 * @returns File name, or an empty string when the URL has no path.
 */
export function fileNameFromUrl(url: string): string {
  const withoutQuery = url.replace(/[?#].*$/, "");
  const segment = withoutQuery.split("/").pop() ?? "";
  return decodeURIComponent(segment);
}
