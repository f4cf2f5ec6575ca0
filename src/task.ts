// CHANGE: Model one unique download with its lifecycle and every place its file is needed.
// WHY: The same archive can be wanted in several directories but is only transferred once.

import { ManifestEntry, PatchRecord, Placement } from "./types.js";

export type TaskStatus = "pending" | "in-progress" | "done" | "failed";

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["in-progress", "done"],
  "in-progress": ["done", "failed"],
  done: [],
  failed: []
};

/**
 * One unique file to fetch.
 *
 * Owned by the download manager while it runs. `pending → in-progress → done | failed`,
 * plus `pending → done` when the file is already present. `done` and `failed` are terminal.
 */
export class DownloadTask {
  private currentStatus: TaskStatus = "pending";
  private readonly extraPlacements: Placement[] = [];

  /**
   * @param targetPath - Final location of the file; unique across a plan.
   * @param source - Download URL.
   * @param expectedSizeBytes - Size reported by the catalog.
   * @param record - Representative record, used for digests and manifest lines.
   * @param manifest - Line written to the manifest of the target's directory once done.
   */
  constructor(
    readonly targetPath: string,
    readonly source: string,
    readonly expectedSizeBytes: number,
    readonly record: PatchRecord,
    readonly manifest: ManifestEntry
  ) {}

  get status(): TaskStatus {
    return this.currentStatus;
  }

  get fileName(): string {
    return this.manifest.file_name;
  }

  /**
   * The download target first, then every copy requested by other directories.
   */
  get placements(): readonly Placement[] {
    return [{ targetPath: this.targetPath, manifest: this.manifest }, ...this.extraPlacements];
  }

  /**
   * Ask for the finished file to be placed at `targetPath` as well.
   *
   * @returns false when that path is already one of the task's placements.
   */
  addPlacement(targetPath: string, manifest: ManifestEntry): boolean {
    if (this.placements.some(placement => placement.targetPath === targetPath)) {
      return false;
    }
    this.extraPlacements.push({ targetPath, manifest });
    return true;
  }

  isTerminal(): boolean {
    return TRANSITIONS[this.currentStatus].length === 0;
  }

  /**
   * Move to `next`.
   *
   * @throws Error on a transition the state machine does not allow.
   */
  transition(next: TaskStatus): void {
    if (!TRANSITIONS[this.currentStatus].includes(next)) {
      throw new Error(`Illegal task transition ${this.currentStatus} -> ${next} for ${this.targetPath}`);
    }
    this.currentStatus = next;
  }
}
