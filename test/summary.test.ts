import { describe, expect, it } from "vitest";
import { RunTally, exitCodeFor, mergeSummaries, type ProgressEvent } from "../src/importer/summary.js";
import { createSilentLogger } from "../src/logger.js";

describe("RunTally", () => {
  it("counts each terminal outcome once and reports progress", () => {
    const progress: ProgressEvent[] = [];
    const tally = new RunTally("primary", false, 4, (event) => progress.push(event));

    tally.recordImported("a", { attendees: 3 });
    tally.recordDuplicate("b");
    tally.recordFiltered(null, "parse_anomaly");
    tally.recordFailed("d", "Review", "HTTP 400");
    tally.warn("a", "Unresolved time zone 'Mars Standard Time', using UTC");

    const summary = tally.finalize("exhausted");
    expect(summary.processed).toBe(4);
    expect(summary.counts).toEqual({ imported: 1, skippedDuplicate: 1, skippedFiltered: 1, failed: 1 });
    expect(summary.attendeesImported).toBe(3);
    expect(summary.warnings).toEqual(["a: Unresolved time zone 'Mars Standard Time', using UTC"]);
    expect(progress.map((event) => [event.processed, event.outcome])).toEqual([
      [1, "imported"],
      [2, "skipped_duplicate"],
      [3, "filtered"],
      [4, "failed"],
    ]);
    expect(progress[3].total).toBe(4);
  });

  it("freezes the summary and finalizes only once", () => {
    const tally = new RunTally("primary", true, null);
    const summary = tally.finalize("limit");

    expect(Object.isFrozen(summary)).toBe(true);
    expect(Object.isFrozen(summary.counts)).toBe(true);
    expect(() => tally.finalize("limit")).toThrow("Run summary already finalized");
    expect(() => tally.recordDuplicate("a")).toThrow("Run summary already finalized");
  });

  it("keeps counting when a progress listener throws", () => {
    const tally = new RunTally(
      "primary",
      false,
      null,
      () => {
        throw new Error("listener failed");
      },
      createSilentLogger(),
    );

    tally.recordImported("a", { attendees: 0 });
    expect(tally.finalize("exhausted").counts.imported).toBe(1);
  });
});

describe("exitCodeFor", () => {
  it("distinguishes clean runs, failures and aborts", () => {
    const clean = new RunTally("primary", false, null);
    clean.recordImported("a", { attendees: 0 });

    const failed = new RunTally("primary", false, null);
    failed.recordFailed("a", null, "HTTP 400");

    const aborted = new RunTally("primary", false, null);

    expect(exitCodeFor(clean.finalize("exhausted"))).toBe(0);
    expect(exitCodeFor(failed.finalize("exhausted"))).toBe(1);
    expect(exitCodeFor(aborted.finalize("aborted", "Google refresh token rejected. Run auth:google again."))).toBe(2);
  });
});

describe("mergeSummaries", () => {
  it("adds counts and keeps the last stop state", () => {
    const first = new RunTally("primary", false, null);
    first.recordImported("a", { attendees: 2 });
    first.recordFiltered("b", "outside_date_range");

    const second = new RunTally("primary", false, null);
    second.recordImported("c", { attendees: 0, withoutAttendees: true });
    second.recordFailed("d", "Review", "HTTP 400");

    const merged = mergeSummaries([first.finalize("exhausted"), second.finalize("limit")]);

    expect(merged.processed).toBe(4);
    expect(merged.counts).toEqual({ imported: 2, skippedDuplicate: 0, skippedFiltered: 1, failed: 1 });
    expect(merged.filteredByReason.outside_date_range).toBe(1);
    expect(merged.importedWithoutAttendees).toBe(1);
    expect(merged.attendeesImported).toBe(2);
    expect(merged.failures).toEqual([{ stableId: "d", summary: "Review", reason: "HTTP 400" }]);
    expect(merged.stopReason).toBe("limit");
  });

  it("needs at least one summary", () => {
    expect(() => mergeSummaries([])).toThrow("No summaries to merge");
  });
});
