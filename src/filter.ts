// CHANGE: Compile platform, release and description filters once and apply them as ordered stages.
// WHY: Each stage reports how many records it dropped so an empty plan can be explained.

import { ConfigError } from "./errors.js";
import { debug } from "./logger.js";
import { FilterConfig, PatchRecord, Platform } from "./types.js";

/**
 * Predicates compiled once from a FilterConfig.
 */
export interface CompiledFilter {
  readonly includesPlatform: (platform: Platform) => boolean;
  readonly excludesRelease: (release: string) => boolean;
  readonly excludesDescription: (description: string) => boolean;
}

export interface SelectionStats {
  readonly considered: number;
  readonly selected: number;
  readonly droppedByPlatform: number;
  readonly droppedByRelease: number;
  readonly droppedByDescription: number;
}

function compile(pattern: string, field: string, anchored: boolean): RegExp {
  try {
    return new RegExp(anchored ? `^(?:${pattern})$` : pattern);
  } catch (cause) {
    throw new ConfigError(`Invalid regular expression in ${field}: ${pattern}`, { cause: String(cause) });
  }
}

const compiledCache = new WeakMap<FilterConfig, CompiledFilter>();

/**
 * Compile the configured patterns into immutable predicates.
 *
 * Platform patterns match a code exactly or the whole platform name as a regular expression.
 * Release and description patterns match anywhere in the text, case-sensitively.
 *
 * @throws ConfigError for an invalid regular expression.
 */
export function compileFilter(cfg: FilterConfig): CompiledFilter {
  const cached = compiledCache.get(cfg);
  if (cached) {
    return cached;
  }
  const platformCodes = new Set(cfg.platforms);
  const platformNames = cfg.platforms.map(pattern => compile(pattern, "platforms", true));
  const releases = cfg.ignored_releases.map(pattern => compile(pattern, "ignored_releases", false));
  const words = cfg.ignored_description_words.map(pattern => compile(pattern, "ignored_description_words", false));

  const compiled: CompiledFilter = Object.freeze({
    includesPlatform: (platform: Platform) =>
      platformCodes.has(platform.code) || platformNames.some(regex => regex.test(platform.name)),
    excludesRelease: (release: string) => releases.some(regex => regex.test(release)),
    excludesDescription: (description: string) => words.some(regex => regex.test(description))
  });
  compiledCache.set(cfg, compiled);
  return compiled;
}

/**
 * Select records and count what each stage dropped.
 * Stages run platform → release → description and stop at the first that drops a record.
 */
export function selectWithStats(
  records: Iterable<PatchRecord>,
  cfg: FilterConfig
): { readonly records: PatchRecord[]; readonly stats: SelectionStats } {
  const filter = compileFilter(cfg);
  const selected: PatchRecord[] = [];
  let considered = 0;
  let droppedByPlatform = 0;
  let droppedByRelease = 0;
  let droppedByDescription = 0;

  for (const record of records) {
    considered += 1;
    if (!filter.includesPlatform(record.platform)) {
      droppedByPlatform += 1;
    } else if (filter.excludesRelease(record.release)) {
      droppedByRelease += 1;
    } else if (filter.excludesDescription(record.description)) {
      droppedByDescription += 1;
    } else {
      selected.push(record);
    }
  }

  const stats: SelectionStats = {
    considered,
    selected: selected.length,
    droppedByPlatform,
    droppedByRelease,
    droppedByDescription
  };
  debug(
    `Filter kept ${stats.selected}/${stats.considered} records (platform -${droppedByPlatform}, release -${droppedByRelease}, description -${droppedByDescription}).`
  );
  return { records: selected, stats };
}

/**
 * Records that pass every filter stage, in input order.
 */
export function select(records: Iterable<PatchRecord>, cfg: FilterConfig): PatchRecord[] {
  return selectWithStats(records, cfg).records;
}

/**
 * Platforms whose code or name matches the configured patterns, in catalog order.
 */
export function selectPlatforms(platforms: readonly Platform[], cfg: FilterConfig): Platform[] {
  const filter = compileFilter(cfg);
  return platforms.filter(platform => filter.includesPlatform(platform));
}
