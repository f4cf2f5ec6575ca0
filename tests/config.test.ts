import fs from "fs-extra";
import path from "path";
import { describe, expect, it } from "vitest";
import { loadConfig, parseConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";
import { makeTempDir } from "./helpers.js";

const valid = {
  credentials: { username: "scott", password: "test-secret" },
  platforms: ["Linux x86-64"],
  ignored_releases: ["^12\\.1"],
  ignored_description_words: ["OJVM"],
  download_root: "/data/patches",
  max_concurrency: 4
};

describe("parseConfig", () => {
  it("accepts a complete document", () => {
    expect(parseConfig(valid)).toEqual(valid);
  });

  it("fills defaults for optional fields", () => {
    const config = parseConfig({ credentials: { username: "scott", password: "" }, platforms: ["226"], download_root: "/data" });
    expect(config).toEqual({
      credentials: { username: "scott", password: undefined },
      platforms: ["226"],
      ignored_releases: [],
      ignored_description_words: [],
      download_root: "/data",
      max_concurrency: 3
    });
  });

  it.each([
    [{ ...valid, credentials: {} }, 'Missing "credentials.username" in config.json'],
    [{ ...valid, credentials: { username: "scott", password: 1 } }, '"credentials.password" must be a string in config.json'],
    [{ ...valid, download_root: "" }, 'Missing "download_root" in config.json'],
    [{ ...valid, platforms: [] }, '"platforms" must list at least one platform in config.json'],
    [{ ...valid, platforms: undefined }, 'Missing "platforms" in configuration'],
    [{ ...valid, ignored_releases: "12.1" }, '"ignored_releases" must be an array of strings'],
    [{ ...valid, max_concurrency: 0 }, '"max_concurrency" must be a positive integer in config.json'],
    [["not", "an", "object"], "Invalid config file config.json: expected a JSON object"]
  ])("rejects %j", (document, message) => {
    expect(() => parseConfig(document)).toThrow(new ConfigError(message));
  });
});

describe("loadConfig", () => {
  it("reads and validates a file", async () => {
    const dir = await makeTempDir();
    try {
      const file = path.join(dir, "config.json");
      await fs.writeJson(file, valid);
      await expect(loadConfig(file)).resolves.toEqual(valid);
    } finally {
      await fs.remove(dir);
    }
  });

  it("reports unparseable files", async () => {
    const dir = await makeTempDir();
    try {
      const file = path.join(dir, "config.json");
      await fs.writeFile(file, "{ not json");
      await expect(loadConfig(file)).rejects.toThrow(`Invalid config file ${file} - `);
    } finally {
      await fs.remove(dir);
    }
  });

  it("reports a missing file", async () => {
    await expect(loadConfig("/nonexistent-patch-root/config.json")).rejects.toThrow(
      "Config file not found: /nonexistent-patch-root/config.json"
    );
  });
});
