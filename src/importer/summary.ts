import type pino from "pino";
import type { EventOutcome, FilterReason } from "./types.js";

export interface RunCounts {
  imported: number;
  skippedDuplicate: number;
  skippedFiltered: number;
  failed: number;
}

export interface FailureRecord {
  stableId: string | null;
  summary: string | null;
  reason: string;
}

export type StopReason = "exhausted" | "limit" | "signal" | "aborted";

export interface RunSummary {
  readonly calendarId: string;
  readonly dryRun: boolean;
  readonly processed: number;
  readonly counts: Readonly<RunCounts>;
  readonly filteredByReason: Readonly<Record<FilterReason, number>>;
  readonly failures: readonly Readonly<FailureRecord>[];
  readonly warnings: readonly string[];
  readonly importedWithoutAttendees: number;
  readonly attendeesImported: number;
  readonly stopReason: StopReason;
  readonly abortReason: string | null;
}

export interface ProgressEvent {
  processed: number;
  total: number | null;
  counts: RunCounts;
  stableId: string | null;
  outcome: EventOutcome;
}

export type ProgressListener = (event: ProgressEvent) => void;

const FILTER_REASONS: readonly FilterReason[] = [
  "parse_anomaly",
  "invalid_time_range",
  "attendee_limit_exceeded",
  "outside_date_range",
];

function emptyFilterCounts(): Record<FilterReason, number> {
  return {
    parse_anomaly: 0,
    invalid_time_range: 0,
    attendee_limit_exceeded: 0,
    outside_date_range: 0,
  };
}

/** Mutable counters for one run; `finalize` produces the frozen summary exactly once. */
export class RunTally {
  private readonly counts: RunCounts = {
    imported: 0,
    skippedDuplicate: 0,
    skippedFiltered: 0,
    failed: 0,
  };
  private readonly filteredByReason = emptyFilterCounts();
  private readonly failures: FailureRecord[] = [];
  private readonly warnings: string[] = [];
  private importedWithoutAttendees = 0;
  private attendeesImported = 0;
  private processedCount = 0;
  private finalized = false;

  constructor(
    private readonly calendarId: string,
    private readonly dryRun: boolean,
    private readonly total: number | null,
    private readonly onProgress?: ProgressListener,
    private readonly logger?: pino.Logger,
  ) {}

  get processed(): number {
    return this.processedCount;
  }

  recordImported(stableId: string, details: { attendees: number; withoutAttendees?: boolean }) {
    this.counts.imported += 1;
    this.attendeesImported += details.attendees;
    if (details.withoutAttendees) {
      this.importedWithoutAttendees += 1;
    }
    this.advance(stableId, "imported");
  }

  recordDuplicate(stableId: string) {
    this.counts.skippedDuplicate += 1;
    this.advance(stableId, "skipped_duplicate");
  }

  recordFiltered(stableId: string | null, reason: FilterReason) {
    this.counts.skippedFiltered += 1;
    this.filteredByReason[reason] += 1;
    this.advance(stableId, "filtered");
  }

  recordFailed(stableId: string | null, summary: string | null, reason: string) {
    this.counts.failed += 1;
    this.failures.push({ stableId, summary, reason });
    this.advance(stableId, "failed");
  }

  warn(stableId: string, message: string) {
    this.warnings.push(`${stableId}: ${message}`);
  }

  finalize(stopReason: StopReason, abortReason: string | null = null): RunSummary {
    if (this.finalized) {
      throw new Error("Run summary already finalized");
    }
    this.finalized = true;

    return Object.freeze({
      calendarId: this.calendarId,
      dryRun: this.dryRun,
      processed: this.processedCount,
      counts: Object.freeze({ ...this.counts }),
      filteredByReason: Object.freeze({ ...this.filteredByReason }),
      failures: Object.freeze(this.failures.map((failure) => Object.freeze({ ...failure }))),
      warnings: Object.freeze([...this.warnings]),
      importedWithoutAttendees: this.importedWithoutAttendees,
      attendeesImported: this.attendeesImported,
      stopReason,
      abortReason,
    });
  }

  private advance(stableId: string | null, outcome: EventOutcome) {
    if (this.finalized) {
      throw new Error("Run summary already finalized");
    }
    this.processedCount += 1;
    if (!this.onProgress) {
      return;
    }

    try {
      this.onProgress({
        processed: this.processedCount,
        total: this.total,
        counts: { ...this.counts },
        stableId,
        outcome,
      });
    } catch (error) {
      this.logger?.warn({ err: error }, "Progress listener threw");
    }
  }
}

export function exitCodeFor(summary: RunSummary): number {
  if (summary.stopReason === "aborted") {
    return 2;
  }
  return summary.counts.failed > 0 ? 1 : 0;
}

/** Combines per-file summaries of one invocation; the last summary's stop state wins. */
export function mergeSummaries(summaries: readonly RunSummary[]): RunSummary {
  const last = summaries.at(-1);
  if (!last) {
    throw new Error("No summaries to merge");
  }

  const counts: RunCounts = { imported: 0, skippedDuplicate: 0, skippedFiltered: 0, failed: 0 };
  const filteredByReason = emptyFilterCounts();
  let processed = 0;
  let importedWithoutAttendees = 0;
  let attendeesImported = 0;

  for (const summary of summaries) {
    processed += summary.processed;
    importedWithoutAttendees += summary.importedWithoutAttendees;
    attendeesImported += summary.attendeesImported;
    counts.imported += summary.counts.imported;
    counts.skippedDuplicate += summary.counts.skippedDuplicate;
    counts.skippedFiltered += summary.counts.skippedFiltered;
    counts.failed += summary.counts.failed;
    for (const reason of FILTER_REASONS) {
      filteredByReason[reason] += summary.filteredByReason[reason];
    }
  }

  return Object.freeze({
    calendarId: last.calendarId,
    dryRun: last.dryRun,
    processed,
    counts: Object.freeze(counts),
    filteredByReason: Object.freeze(filteredByReason),
    failures: Object.freeze(summaries.flatMap((summary) => summary.failures)),
    warnings: Object.freeze(summaries.flatMap((summary) => summary.warnings)),
    importedWithoutAttendees,
    attendeesImported,
    stopReason: last.stopReason,
    abortReason: last.abortReason,
  });
}
