// CHANGE: Centralise configuration sources with environment and file validation.
// WHY: Tunables come from `.env`; the user's selection comes from a JSON file validated once at startup.

import * as dotenv from "dotenv";
import fs from "fs-extra";
import { ConfigError, describeError } from "./errors.js";
import { AppConfig, JsonValue } from "./types.js";

dotenv.config();

function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Catalog service endpoints.
 *
 * Invariant: `BASE_URL` must be non-empty before any catalog query runs.
 */
export const CATALOG = {
  BASE_URL: (process.env.CATALOG_BASE_URL ?? "").replace(/\/+$/, ""),
  LOGIN_URL: process.env.CATALOG_LOGIN_URL ?? "",
  PASSWORD: process.env.CATALOG_PASSWORD ?? "",
  RETRY_ATTEMPTS: envInt("CATALOG_RETRY_ATTEMPTS", 3)
} as const;

/**
 * Network-level configuration shared by catalog queries and transfers.
 */
export const NET = {
  TIMEOUT: envInt("HTTP_TIMEOUT", 60000),
  RETRY_BASE_DELAY_MS: envInt("RETRY_BASE_DELAY_MS", 500),
  IDLE_TIMEOUT_MS: envInt("DOWNLOAD_IDLE_TIMEOUT_MS", 60000),
  USER_AGENT: "Wget/1.21.4"
} as const;

/**
 * Download behaviour.
 */
export const DOWNLOAD = {
  RETRY_ATTEMPTS: envInt("DOWNLOAD_RETRY_ATTEMPTS", 3),
  PARTIAL_SUFFIX: ".part",
  MANIFEST_FILE: "description.txt",
  DEFAULT_CONCURRENCY: 3
} as const;

/**
 * Session lifetime before a proactive refresh.
 */
export const SESSION = {
  TTL_MS: envInt("SESSION_TTL_MS", 30 * 60 * 1000),
  MAX_REDIRECTS: 10
} as const;

/**
 * Well-known patch numbers and the catalog's generic platform.
 */
export const PATCHES = {
  AHF: "30166242",
  OPATCH: "6880880",
  GENERIC_PLATFORM: "2000"
} as const;

export const DEFAULT_CONFIG_PATH = "config.json";

function isRecord(value: JsonValue): value is { readonly [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringList(value: JsonValue, field: string, required: boolean): string[] {
  if (value === undefined || value === null) {
    if (required) {
      throw new ConfigError(`Missing "${field}" in configuration`);
    }
    return [];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ConfigError(`"${field}" must be an array of strings`);
  }
  return [...value];
}

/**
 * Validate a parsed configuration document.
 *
 * @param value - Parsed JSON.
 * @param source - File path used in error messages.
 * @throws ConfigError when a field is missing or has the wrong type.
 */
export function parseConfig(value: JsonValue, source = DEFAULT_CONFIG_PATH): AppConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid config file ${source}: expected a JSON object`);
  }
  const credentials = value.credentials;
  if (!isRecord(credentials) || typeof credentials.username !== "string" || credentials.username.trim() === "") {
    throw new ConfigError(`Missing "credentials.username" in ${source}`);
  }
  if (credentials.password !== undefined && typeof credentials.password !== "string") {
    throw new ConfigError(`"credentials.password" must be a string in ${source}`);
  }
  if (typeof value.download_root !== "string" || value.download_root.trim() === "") {
    throw new ConfigError(`Missing "download_root" in ${source}`);
  }
  const platforms = stringList(value.platforms, "platforms", true);
  if (platforms.length === 0) {
    throw new ConfigError(`"platforms" must list at least one platform in ${source}`);
  }
  const concurrency = value.max_concurrency ?? DOWNLOAD.DEFAULT_CONCURRENCY;
  if (typeof concurrency !== "number" || !Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`"max_concurrency" must be a positive integer in ${source}`);
  }

  return {
    credentials: {
      username: credentials.username,
      password: typeof credentials.password === "string" && credentials.password !== "" ? credentials.password : undefined
    },
    platforms,
    ignored_releases: stringList(value.ignored_releases, "ignored_releases", false),
    ignored_description_words: stringList(value.ignored_description_words, "ignored_description_words", false),
    download_root: value.download_root,
    max_concurrency: concurrency
  };
}

/**
 * Read and validate the JSON configuration file.
 *
 * @throws ConfigError when the file is absent, unparseable or invalid.
 */
export async function loadConfig(path: string = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  if (!(await fs.pathExists(path))) {
    throw new ConfigError(`Config file not found: ${path}`);
  }
  let parsed: JsonValue;
  try {
    parsed = await fs.readJson(path);
  } catch (cause) {
    throw new ConfigError(`Invalid config file ${path} - ${describeError(cause)}`);
  }
  return parseConfig(parsed, path);
}
