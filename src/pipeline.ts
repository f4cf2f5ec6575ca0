// CHANGE: Orchestrate one run: catalog queries, selection, planning, then dry-run report or execution.
// WHY: Catalog queries complete before planning; dry-run returns before any worker or directory exists.

import { CatalogClient } from "./catalog.js";
import { PATCHES } from "./config.js";
import { DownloadManager } from "./downloader.js";
import { select, selectPlatforms } from "./filter.js";
import { LayoutWriter } from "./layout.js";
import { debug, info, warn } from "./logger.js";
import { resolveRowPlatforms } from "./patch-list.js";
import { Plan, plan } from "./planner.js";
import { RunSummary, runTasks, StopSignal } from "./scheduler.js";
import { AppConfig, Destination, FilterConfig, PatchListRow, PatchRecord, PlacedRecord, Platform } from "./types.js";
import { formatMegabytes, freeBytes } from "./utils/disk.js";

export type CatalogQueries = Pick<CatalogClient, "listPlatforms" | "queryRecommendedPatches" | "queryPatchByNumber">;

export interface PipelineDeps {
  readonly catalog: CatalogQueries;
  readonly manager: Pick<DownloadManager, "execute">;
  readonly layout: Pick<LayoutWriter, "record">;
  readonly freeSpace?: (directory: string) => Promise<number | undefined>;
}

export interface PipelineOptions {
  readonly config: AppConfig;
  readonly patchList?: readonly PatchListRow[];
  readonly dryRun: boolean;
  readonly signal?: StopSignal;
}

export type PipelineResult =
  | { readonly kind: "dry-run"; readonly plan: Plan }
  | { readonly kind: "run"; readonly plan: Plan; readonly summary: RunSummary };

async function place(
  records: AsyncIterable<PatchRecord>,
  destination: Destination,
  into: PlacedRecord[]
): Promise<void> {
  for await (const record of records) {
    into.push({ record, destination });
  }
}

/**
 * Platform selection applies to every record; release and description exclusions only to quarter patches.
 */
function applyFilter(placed: readonly PlacedRecord[], cfg: FilterConfig): PlacedRecord[] {
  const isQuarter = (entry: PlacedRecord): boolean => entry.destination.kind === "quarter";
  const quarter = new Set(select(placed.filter(isQuarter).map(entry => entry.record), cfg));
  const tools = new Set(
    select(
      placed.filter(entry => !isQuarter(entry)).map(entry => entry.record),
      { platforms: cfg.platforms, ignored_releases: [], ignored_description_words: [] }
    )
  );
  return placed.filter(entry => (isQuarter(entry) ? quarter : tools).has(entry.record));
}

/**
 * Recommended mode: AHF and OPatch for the selected platforms, then the quarter's recommendations.
 */
async function collectRecommended(catalog: CatalogQueries, config: AppConfig, platforms: readonly Platform[]): Promise<PlacedRecord[]> {
  const selected = selectPlatforms(platforms, config);
  if (selected.length === 0) {
    warn("No catalog platform matches the configured platforms.");
  }
  debug(`Selected platforms: ${selected.map(platform => `${platform.code} (${platform.name})`).join(", ")}`);
  const placed: PlacedRecord[] = [];
  await place(catalog.queryPatchByNumber(PATCHES.AHF, selected), { kind: "ahf" }, placed);
  await place(catalog.queryPatchByNumber(PATCHES.OPATCH, selected), { kind: "opatch" }, placed);
  await place(catalog.queryRecommendedPatches(), { kind: "quarter" }, placed);
  return applyFilter(placed, config);
}

/**
 * Patch-list mode: each row names its own platforms; exclusions apply to rows without a directory.
 */
async function collectListed(
  catalog: CatalogQueries,
  config: AppConfig,
  platforms: readonly Platform[],
  rows: readonly PatchListRow[]
): Promise<PlacedRecord[]> {
  const placed: PlacedRecord[] = [];
  const rowPlatformCodes = new Set<string>();
  for (const row of rows) {
    const rowPlatforms = resolveRowPlatforms(row.platform_pattern, platforms);
    if (rowPlatforms.length === 0) {
      warn(`Platform (${row.platform_pattern}) for patch ${row.patch_number} is missing. Skipping this line.`);
      continue;
    }
    rowPlatforms.forEach(platform => rowPlatformCodes.add(platform.code));
    const destination: Destination = row.directory ? { kind: "group", directory: row.directory } : { kind: "quarter" };
    const before = placed.length;
    await place(catalog.queryPatchByNumber(row.patch_number, rowPlatforms), destination, placed);
    if (placed.length === before) {
      warn(`No files found for patch ${row.patch_number} platform ${row.platform_pattern || PATCHES.GENERIC_PLATFORM}.`);
    }
  }
  return applyFilter(placed, {
    platforms: Array.from(rowPlatformCodes),
    ignored_releases: config.ignored_releases,
    ignored_description_words: config.ignored_description_words
  });
}

/**
 * Query the catalog and return the filtered, placed records for this run.
 */
export async function collectRecords(
  catalog: CatalogQueries,
  config: AppConfig,
  patchList?: readonly PatchListRow[]
): Promise<PlacedRecord[]> {
  const platforms = await catalog.listPlatforms();
  return patchList
    ? collectListed(catalog, config, platforms, patchList)
    : collectRecommended(catalog, config, platforms);
}

/**
 * Resolve, plan and (unless dry-run) download.
 */
export async function runPipeline(deps: PipelineDeps, options: PipelineOptions): Promise<PipelineResult> {
  const placed = await collectRecords(deps.catalog, options.config, options.patchList);
  const resolved = plan(placed, { downloadRoot: options.config.download_root });
  info(`Resolved ${resolved.tasks.length} files, ~ ${formatMegabytes(resolved.totalBytes)}.`);

  if (options.dryRun) {
    return { kind: "dry-run", plan: resolved };
  }

  const freeSpace = deps.freeSpace ?? freeBytes;
  const available = await freeSpace(options.config.download_root);
  if (available !== undefined && available < resolved.totalBytes) {
    warn(
      `Only ${formatMegabytes(available)} free under ${options.config.download_root}; the plan needs up to ${formatMegabytes(resolved.totalBytes)}.`
    );
  }

  const summary = await runTasks(resolved.tasks, {
    manager: deps.manager,
    layout: deps.layout,
    concurrency: options.config.max_concurrency,
    signal: options.signal,
    freeSpace
  });
  return { kind: "run", plan: resolved, summary };
}
