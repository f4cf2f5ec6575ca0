import { describe, expect, it } from "vitest";
import { DownloadTask } from "../src/task.js";
import { makeRecord } from "./helpers.js";

function newTask(): DownloadTask {
  const record = makeRecord();
  return new DownloadTask("/tmp/a.zip", record.download_ref, record.size_bytes, record, {
    file_name: "a.zip",
    description: record.description
  });
}

describe("DownloadTask", () => {
  it("moves from pending through in-progress to done", () => {
    const task = newTask();
    expect(task.status).toBe("pending");
    task.transition("in-progress");
    expect(task.isTerminal()).toBe(false);
    task.transition("done");
    expect(task.isTerminal()).toBe(true);
  });

  it("goes straight to done when the file is already present", () => {
    const task = newTask();
    task.transition("done");
    expect(task.status).toBe("done");
  });

  it("rejects transitions out of terminal states", () => {
    const task = newTask();
    task.transition("in-progress");
    task.transition("failed");
    expect(() => task.transition("in-progress")).toThrow("Illegal task transition failed -> in-progress for /tmp/a.zip");
  });

  it("cannot fail before it starts", () => {
    expect(() => newTask().transition("failed")).toThrow("Illegal task transition pending -> failed");
  });
});
