#!/usr/bin/env node
// CHANGE: Run the CLI when executed and expose the library surface when imported.
// WHY: Tests and embedding callers import the modules without parsing argv.
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { CatalogClient } from "./catalog.js";
export { DownloadManager } from "./downloader.js";
export { compileFilter, select } from "./filter.js";
export { LayoutWriter } from "./layout.js";
export { plan } from "./planner.js";
export { runTasks, StopSignal } from "./scheduler.js";
export { SessionProvider } from "./session.js";
