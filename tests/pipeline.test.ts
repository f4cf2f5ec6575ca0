// CHANGE: Run whole resolutions against an in-memory catalog.
// WHY: Covers recommended and patch-list modes end to end, including the dry-run guarantee of no writes.

import fs from "fs-extra";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DownloadOutcome } from "../src/downloader.js";
import { LayoutWriter } from "../src/layout.js";
import { CatalogQueries, runPipeline } from "../src/pipeline.js";
import { DownloadTask } from "../src/task.js";
import { AppConfig, PatchRecord, Platform } from "../src/types.js";
import { LINUX, makeRecord, makeTempDir, SOLARIS } from "./helpers.js";

const MB = 1024 * 1024;

const quarterRecords = [
  makeRecord({ patch_number: "35643107", description: "DATABASE RELEASE UPDATE 19.21.0.0.0", file_name: "p35643107.zip" }),
  makeRecord({ patch_number: "35648110", description: "OJVM RELEASE UPDATE 19.21.0.0.231017", file_name: "p35648110.zip" }),
  makeRecord({ patch_number: "35642822", description: "GI RELEASE UPDATE 19.21.0.0.0", file_name: "p35642822.zip" })
];

function fakeCatalog(recommended: readonly PatchRecord[], byNumber: Readonly<Record<string, readonly PatchRecord[]>> = {}): CatalogQueries {
  return {
    listPlatforms: async () => [LINUX, SOLARIS],
    async *queryRecommendedPatches() {
      yield* recommended;
    },
    async *queryPatchByNumber(patchNumber: string, platforms: readonly Platform[]) {
      for (const record of byNumber[patchNumber] ?? []) {
        if (platforms.some(platform => platform.code === record.platform.code)) {
          yield record;
        }
      }
    }
  };
}

async function writeFile(task: DownloadTask): Promise<DownloadOutcome> {
  task.transition("in-progress");
  await fs.outputFile(task.targetPath, "x".repeat(task.expectedSizeBytes));
  task.transition("done");
  return { ok: true, kind: "downloaded", value: task.targetPath };
}

const plentyOfSpace = async (): Promise<number> => Number.MAX_SAFE_INTEGER;

describe("runPipeline", () => {
  let dir: string;
  let config: AppConfig;

  beforeEach(async () => {
    dir = await makeTempDir();
    config = {
      credentials: { username: "scott" },
      platforms: ["Linux.*"],
      ignored_releases: [],
      ignored_description_words: [],
      download_root: path.join(dir, "patches"),
      max_concurrency: 2
    };
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it("downloads the quarter's recommendations and lists them in the manifest", async () => {
    const manager = { execute: vi.fn(writeFile) };

    const result = await runPipeline(
      { catalog: fakeCatalog(quarterRecords), manager, layout: new LayoutWriter(), freeSpace: plentyOfSpace },
      { config, dryRun: false }
    );

    expect(result.kind).toBe("run");
    expect(result.plan.tasks).toHaveLength(3);
    const manifest = await fs.readFile(
      path.join(config.download_root, "quarter_patches", "19.0.0.0.0", "Linux x86-64", "description.txt"),
      "utf8"
    );
    expect(manifest.trimEnd().split("\n")).toHaveLength(3);
    if (result.kind === "run") {
      expect(result.summary).toMatchObject({ total: 3, downloaded: 3, failed: 0, notStarted: 0 });
    }
  });

  it("drops records matching an ignored description word", async () => {
    const result = await runPipeline(
      { catalog: fakeCatalog(quarterRecords), manager: { execute: vi.fn(writeFile) }, layout: new LayoutWriter() },
      { config: { ...config, ignored_description_words: ["OJVM"] }, dryRun: true }
    );
    expect(result.plan.tasks.map(task => task.fileName)).toEqual(["p35643107.zip", "p35642822.zip"]);
  });

  it("reports the total size in dry-run mode without touching the disk", async () => {
    const manager = { execute: vi.fn(writeFile) };
    const records = [
      makeRecord({ file_name: "db.zip", size_bytes: 512 * MB }),
      makeRecord({ patch_number: "35642822", file_name: "gi.zip", size_bytes: 768 * MB })
    ];

    const result = await runPipeline(
      { catalog: fakeCatalog(records), manager, layout: new LayoutWriter(), freeSpace: plentyOfSpace },
      { config, dryRun: true }
    );

    expect(result.kind).toBe("dry-run");
    expect(result.plan.totalBytes).toBe(1342177280);
    expect(manager.execute).not.toHaveBeenCalled();
    expect(await fs.pathExists(config.download_root)).toBe(false);
  });

  it("places AHF and OPatch for the selected platforms in their own directories", async () => {
    const ahf = makeRecord({ patch_number: "30166242", file_name: "ahf.zip", description: "AHF" });
    const opatchLinux = makeRecord({ patch_number: "6880880", file_name: "opatch-linux.zip", description: "OPatch" });
    const opatchSparc = makeRecord({ patch_number: "6880880", platform: SOLARIS, file_name: "opatch-sparc.zip", description: "OPatch" });

    const result = await runPipeline(
      {
        catalog: fakeCatalog(quarterRecords.slice(0, 1), { "30166242": [ahf], "6880880": [opatchLinux, opatchSparc] }),
        manager: { execute: vi.fn(writeFile) },
        layout: new LayoutWriter()
      },
      { config, dryRun: true }
    );

    expect(result.plan.tasks.map(task => path.relative(config.download_root, task.targetPath))).toEqual([
      path.join("ahf", "ahf.zip"),
      path.join("opatch", "opatch-linux.zip"),
      path.join("quarter_patches", "19.0.0.0.0", "Linux x86-64", "p35643107.zip")
    ]);
  });

  it("downloads the rows of a patch list into their group directories", async () => {
    const opatch = makeRecord({ patch_number: "6880880", file_name: "p6880880.zip", description: "OPatch" });
    const oldOpatch = makeRecord({ patch_number: "6880880", release: "12.1.0.1.0", file_name: "old.zip", description: "OPatch" });
    const sparcPatch = makeRecord({ patch_number: "35643107", platform: SOLARIS, file_name: "sparc.zip" });
    const oldSparcPatch = makeRecord({ patch_number: "35643107", platform: SOLARIS, release: "12.1.0.2.0", file_name: "sparc-old.zip" });

    const result = await runPipeline(
      {
        catalog: fakeCatalog([], { "6880880": [opatch, oldOpatch], "35643107": [sparcPatch, oldSparcPatch] }),
        manager: { execute: vi.fn(writeFile) },
        layout: new LayoutWriter()
      },
      {
        config: { ...config, ignored_releases: ["^12\\.1"] },
        patchList: [
          { patch_number: "6880880", platform_pattern: "226", directory: "tools/opatch" },
          { patch_number: "35643107", platform_pattern: "Oracle Solaris.*" },
          { patch_number: "1", platform_pattern: "Nonexistent" }
        ],
        dryRun: true
      }
    );

    expect(result.plan.tasks.map(task => path.relative(config.download_root, task.targetPath))).toEqual([
      path.join("tools", "opatch", "p6880880.zip"),
      path.join("tools", "opatch", "old.zip"),
      path.join("quarter_patches", "19.0.0.0.0", "Oracle Solaris on SPARC (64-bit)", "sparc.zip")
    ]);
  });

  it("keeps AHF and OPatch when their release is excluded for quarter patches", async () => {
    const ahf = makeRecord({ patch_number: "30166242", file_name: "ahf.zip", description: "AHF" });
    const opatch = makeRecord({ patch_number: "6880880", file_name: "p6880880.zip", description: "OPatch" });

    const result = await runPipeline(
      {
        catalog: fakeCatalog(quarterRecords, { "30166242": [ahf], "6880880": [opatch] }),
        manager: { execute: vi.fn(writeFile) },
        layout: new LayoutWriter()
      },
      { config: { ...config, ignored_releases: ["^19"] }, dryRun: true }
    );

    expect(result.plan.tasks.map(task => path.relative(config.download_root, task.targetPath))).toEqual([
      path.join("ahf", "ahf.zip"),
      path.join("opatch", "p6880880.zip")
    ]);
  });

  it("downloads a patch listed under two directories once and places it in both", async () => {
    const opatch = makeRecord({ patch_number: "6880880", file_name: "p6880880.zip", description: "OPatch", size_bytes: 16 });
    const manager = { execute: vi.fn(writeFile) };

    const result = await runPipeline(
      { catalog: fakeCatalog([], { "6880880": [opatch] }), manager, layout: new LayoutWriter(), freeSpace: plentyOfSpace },
      {
        config,
        patchList: [
          { patch_number: "6880880", platform_pattern: "226", directory: "dirA" },
          { patch_number: "6880880", platform_pattern: "226", directory: "dirB" }
        ],
        dryRun: false
      }
    );

    expect(result.plan.tasks).toHaveLength(1);
    expect(manager.execute).toHaveBeenCalledTimes(1);
    expect(await fs.readFile(path.join(config.download_root, "dirB", "p6880880.zip"), "utf8")).toBe("x".repeat(16));
    for (const directory of ["dirA", "dirB"]) {
      expect(await fs.readFile(path.join(config.download_root, directory, "description.txt"), "utf8")).toBe(
        "p6880880.zip - OPatch\n"
      );
    }
    if (result.kind === "run") {
      expect(result.summary).toMatchObject({ total: 1, downloaded: 1, failed: 0 });
    }
  });

  it("lists OPatch in the quarter manifest when it is also a recommendation", async () => {
    const opatch = makeRecord({ patch_number: "6880880", file_name: "p6880880.zip", description: "OPatch", size_bytes: 16 });
    const manager = { execute: vi.fn(writeFile) };

    const result = await runPipeline(
      {
        catalog: fakeCatalog([quarterRecords[0] ?? makeRecord(), opatch], { "6880880": [opatch] }),
        manager,
        layout: new LayoutWriter(),
        freeSpace: plentyOfSpace
      },
      { config, dryRun: false }
    );

    const quarterDir = path.join(config.download_root, "quarter_patches", "19.0.0.0.0", "Linux x86-64");
    expect(result.plan.tasks.map(task => path.relative(config.download_root, task.targetPath))).toEqual([
      path.join("opatch", "p6880880.zip"),
      path.join("quarter_patches", "19.0.0.0.0", "Linux x86-64", "p35643107.zip")
    ]);
    expect(manager.execute).toHaveBeenCalledTimes(2);
    expect(await fs.readFile(path.join(quarterDir, "p6880880.zip"), "utf8")).toBe("x".repeat(16));
    const quarterManifest = await fs.readFile(path.join(quarterDir, "description.txt"), "utf8");
    expect(quarterManifest.trimEnd().split("\n").sort()).toEqual([
      "p35643107.zip - DATABASE RELEASE UPDATE 19.21.0.0.0",
      "p6880880.zip - OPatch"
    ]);
    expect(await fs.readFile(path.join(config.download_root, "opatch", "description.txt"), "utf8")).toBe(
      "p6880880.zip - OPatch\n"
    );
  });
});
