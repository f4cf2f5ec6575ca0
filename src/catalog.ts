// CHANGE: Implement catalog-facing queries for platforms, recommendations and patch lookups.
// WHY: Vendor field names are mapped to PatchRecord here and nowhere else; filtering is left to the filter engine.

import { AuthError, CatalogUnavailableError, describeError, MalformedRecordError } from "./errors.js";
import { debug, warn } from "./logger.js";
import { SessionHandle, sessionHeaders } from "./session.js";
import { JsonValue, PatchRecord, Platform, Result } from "./types.js";
import { executeWithRetry, getJson, isAuthRejection, RetryPolicy, statusOf } from "./utils/http.js";
import { fileNameFromUrl, resolveDownloadUrl } from "./utils/url.js";

type JsonObject = { readonly [key: string]: JsonValue };

/**
 * Narrows the recommendation query sent to the service. The client never filters locally.
 */
export interface ReleaseFilter {
  readonly release?: string;
}

export interface CatalogClientOptions {
  readonly baseUrl: string;
  readonly retry: RetryPolicy;
}

function isRecord(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function text(value: JsonValue): string | undefined {
  if (typeof value === "string") {
    return value.trim();
  }
  if (typeof value === "number") {
    return String(value);
  }
  return undefined;
}

function parseSize(value: JsonValue): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 0 ? value : undefined;
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return undefined;
}

function collection(payload: JsonValue, field: string, url: string): readonly JsonValue[] {
  if (!isRecord(payload)) {
    throw new CatalogUnavailableError(`Malformed catalog response from ${url}`);
  }
  const items = payload[field];
  if (!Array.isArray(items)) {
    throw new CatalogUnavailableError(`Catalog response from ${url} has no "${field}" collection`);
  }
  return items;
}

/**
 * Map a vendor platform entry (`{id, name}`) to a Platform.
 */
export function toPlatform(raw: JsonValue): Platform | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const code = text(raw.id);
  const name = text(raw.name);
  return code && name ? { code, name } : undefined;
}

/**
 * Flatten one vendor patch entry into one record per archive file.
 *
 * Missing sizes, download URLs or platform data make the affected file a MalformedRecordError.
 *
 * @param raw - Patch entry as published by the catalog.
 * @param baseUrl - Used to resolve relative download URLs that carry no host.
 * @param platformNames - Known code → name mapping for entries that carry only a platform id.
 */
export function normalisePatch(
  raw: JsonValue,
  baseUrl: string,
  platformNames: ReadonlyMap<string, string> = new Map()
): Result<PatchRecord, MalformedRecordError>[] {
  if (!isRecord(raw)) {
    return [{ ok: false, error: new MalformedRecordError("Patch entry is not an object") }];
  }
  const patchNumber = text(raw.name) ?? text(raw.patch_number);
  if (!patchNumber) {
    return [{ ok: false, error: new MalformedRecordError("Patch entry without a number") }];
  }
  const releaseRaw = raw.release;
  const release = isRecord(releaseRaw) ? text(releaseRaw.name) : text(releaseRaw);
  const platformRaw = raw.platform;
  const platformCode = isRecord(platformRaw) ? text(platformRaw.id) : text(platformRaw);
  if (!release || !platformCode) {
    return [
      { ok: false, error: new MalformedRecordError(`Patch ${patchNumber} lacks release or platform`, { patchNumber }) }
    ];
  }
  const platform: Platform = {
    code: platformCode,
    name: (isRecord(platformRaw) ? text(platformRaw.name) : undefined) ?? platformNames.get(platformCode) ?? platformCode
  };
  const description = text(raw.abstract) ?? (isRecord(raw.bug) ? text(raw.bug.abstract) : undefined) ?? "";
  const files = raw.files;
  if (!Array.isArray(files) || files.length === 0) {
    return [{ ok: false, error: new MalformedRecordError(`Patch ${patchNumber} lists no files`, { patchNumber }) }];
  }

  return files.map((file): Result<PatchRecord, MalformedRecordError> => {
    if (!isRecord(file)) {
      return { ok: false, error: new MalformedRecordError(`Patch ${patchNumber} has a malformed file entry`, { patchNumber }) };
    }
    const urlText = text(file.download_url);
    if (!urlText) {
      return { ok: false, error: new MalformedRecordError(`Patch ${patchNumber} file without download URL`, { patchNumber }) };
    }
    const host = text(file.host);
    const downloadRef = resolveDownloadUrl(urlText, host || baseUrl);
    const fileName = text(file.name) || fileNameFromUrl(downloadRef);
    const size = parseSize(file.size);
    if (size === undefined) {
      return {
        ok: false,
        error: new MalformedRecordError(`Patch ${patchNumber} file ${fileName} has no usable size`, { patchNumber, fileName })
      };
    }
    const digest = text(file.digest) ?? text(file.sha256);
    return {
      ok: true,
      value: {
        patch_number: patchNumber,
        release,
        platform,
        description,
        file_name: fileName,
        size_bytes: size,
        download_ref: downloadRef,
        sha256: digest ? digest.toUpperCase() : undefined
      }
    };
  });
}

/**
 * Catalog service client. Every call carries the current session; one rejected session is refreshed
 * and replayed, a second rejection is an AuthError.
 */
export class CatalogClient {
  private readonly platformNames = new Map<string, string>();

  constructor(
    private readonly session: SessionHandle,
    private readonly options: CatalogClientOptions
  ) {}

  /**
   * Platforms known to the catalog, in catalog order.
   */
  async listPlatforms(): Promise<Platform[]> {
    const url = `${this.options.baseUrl}/platforms`;
    const items = await this.fetchCollection("/platforms", "platforms");
    const platforms: Platform[] = [];
    for (const item of items) {
      const platform = toPlatform(item);
      if (!platform) {
        warn(`Skipping malformed platform entry from ${url}`);
        continue;
      }
      this.platformNames.set(platform.code, platform.name);
      platforms.push(platform);
    }
    debug(`Catalog lists ${platforms.length} platforms.`);
    return platforms;
  }

  /**
   * Records recommended for the current quarter, scoped by `releaseFilter`.
   */
  async *queryRecommendedPatches(releaseFilter: ReleaseFilter = {}): AsyncGenerator<PatchRecord> {
    const params: Record<string, string> = releaseFilter.release ? { release: releaseFilter.release } : {};
    yield* this.records("/recommendations", params);
  }

  /**
   * Records for one patch number, queried platform by platform.
   */
  async *queryPatchByNumber(patchNumber: string, platforms: readonly Platform[]): AsyncGenerator<PatchRecord> {
    for (const platform of platforms) {
      yield* this.records("/patches", { patch_number: patchNumber, platform: platform.code });
    }
  }

  private async *records(path: string, params: Record<string, string>): AsyncGenerator<PatchRecord> {
    const items = await this.fetchCollection(path, "patches", params);
    let produced = 0;
    for (const item of items) {
      for (const result of normalisePatch(item, this.options.baseUrl, this.platformNames)) {
        if (!result.ok) {
          warn(`Skipping malformed catalog record: ${result.error.message}`);
          continue;
        }
        produced += 1;
        yield result.value;
      }
    }
    debug(`Catalog ${path} ${JSON.stringify(params)} produced ${produced} records.`);
  }

  /**
   * Fetch `path` and return its `field` array. A payload without the array is retried like a transient failure.
   */
  private async fetchCollection(
    path: string,
    field: string,
    params: Record<string, string> = {}
  ): Promise<readonly JsonValue[]> {
    const url = `${this.options.baseUrl}${path}`;
    let session = await this.session.current();
    let refreshed = false;

    for (;;) {
      const active = session;
      try {
        return await executeWithRetry(
          async () => {
            const response = await getJson<JsonValue>(url, { headers: sessionHeaders(active), params });
            debug(`Fetched ${url} with status ${response.status}`);
            return collection(response.data, field, url);
          },
          this.options.retry,
          url
        );
      } catch (error) {
        if (error instanceof CatalogUnavailableError) {
          throw error;
        }
        if (isAuthRejection(error)) {
          if (refreshed) {
            throw new AuthError(`Catalog rejected the session for ${url}`, { status: statusOf(error) });
          }
          debug(`Session rejected by ${url}; refreshing once.`);
          refreshed = true;
          session = await this.session.refresh(active);
          continue;
        }
        throw new CatalogUnavailableError(`Not able to query ${url}: ${describeError(error)}`, {
          status: statusOf(error)
        });
      }
    }
  }
}
