import type { ImportRecord } from "./import-record.js";
import type { Admission } from "./types.js";

/**
 * The only place that decides whether an event is a duplicate. An admitted id
 * stays reserved until it is confirmed or released, so an id repeated inside one
 * pending batch is skipped as well.
 */
export class DuplicateTracker {
  private readonly reserved = new Set<string>();

  constructor(
    private readonly record: ImportRecord,
    private readonly skipDuplicates: boolean,
  ) {}

  admit(stableId: string): Admission {
    if (!this.skipDuplicates) {
      return "proceed";
    }
    if (this.record.has(stableId) || this.reserved.has(stableId)) {
      return "skip_duplicate";
    }
    this.reserved.add(stableId);
    return "proceed";
  }

  /** Called after a failed commit so a later occurrence can be attempted. */
  release(stableId: string) {
    this.reserved.delete(stableId);
  }
}
