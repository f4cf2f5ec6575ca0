// CHANGE: Define strongly typed domain models for patch resolution and download.
// WHY: Records, tasks and manifests flow between every stage; their shapes pin the dedup and layout invariants.

/**
 * JSON-like value type used for catalog payloads without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Operating-system/architecture target recognised by the catalog.
 *
 * Invariant: unique by `code`.
 */
export interface Platform {
  readonly code: string;
  readonly name: string;
}

/**
 * Dotted product version line, e.g. `19.0.0.0.0`.
 */
export type Release = string;

/**
 * Normalised catalog entry describing one downloadable archive.
 *
 * @property patch_number - Vendor patch number.
 * @property release - Release the patch belongs to.
 * @property platform - Target platform.
 * @property description - Abstract reported by the catalog.
 * @property file_name - Archive file name.
 * @property size_bytes - Archive size reported by the catalog.
 * @property download_ref - Absolute URL accepted by the download manager.
 * @property sha256 - Upper-case SHA-256 digest, when the catalog reports one.
 */
export interface PatchRecord {
  readonly patch_number: string;
  readonly release: Release;
  readonly platform: Platform;
  readonly description: string;
  readonly file_name: string;
  readonly size_bytes: number;
  readonly download_ref: string;
  readonly sha256?: string;
}

/**
 * Raw filter configuration as supplied by the user.
 */
export interface FilterConfig {
  readonly platforms: readonly string[];
  readonly ignored_releases: readonly string[];
  readonly ignored_description_words: readonly string[];
}

/**
 * Where a record is laid out under the download root.
 */
export type Destination =
  | { readonly kind: "quarter" }
  | { readonly kind: "opatch" }
  | { readonly kind: "ahf" }
  | { readonly kind: "group"; readonly directory: string };

/**
 * A record paired with the directory category it belongs to.
 */
export interface PlacedRecord {
  readonly record: PatchRecord;
  readonly destination: Destination;
}

/**
 * Line appended to a directory's `description.txt`.
 */
export interface ManifestEntry {
  readonly file_name: string;
  readonly description: string;
}

/**
 * A further location a downloaded file is placed at, with the manifest line for that directory.
 */
export interface Placement {
  readonly targetPath: string;
  readonly manifest: ManifestEntry;
}

/**
 * Discriminated result type used where failures are values rather than exceptions.
 */
export type Result<T, E> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: E };

/**
 * Credentials for the catalog service.
 */
export interface Credentials {
  readonly username: string;
  readonly password?: string;
}

/**
 * Validated contents of the configuration file.
 *
 * Invariant: `max_concurrency` is a positive integer.
 */
export interface AppConfig extends FilterConfig {
  readonly credentials: Credentials;
  readonly download_root: string;
  readonly max_concurrency: number;
}

/**
 * One row of the patch-list input file.
 *
 * @property platform_pattern - Platform code, exact name, name regex, or empty for the generic platform.
 * @property directory - Optional sub-directory of the download root.
 */
export interface PatchListRow {
  readonly patch_number: string;
  readonly platform_pattern: string;
  readonly directory?: string;
}

/**
 * Progress callback invoked while a file streams to disk.
 */
export type ProgressFunction = (fileName: string, totalBytes: number, receivedBytes: number) => void;
