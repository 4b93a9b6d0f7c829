import type pino from "pino";
import { AuthError, classifyError, describeError } from "../errors.js";
import type { RetryPolicy } from "../retry.js";
import { ImportExecutor } from "./executor.js";
import type { ImportRecord } from "./import-record.js";
import { EventNormalizer } from "./normalizer.js";
import { stableIdFor } from "./stable-id.js";
import { RunTally, type ProgressListener, type RunSummary, type StopReason } from "./summary.js";
import type { ImportTarget } from "./target.js";
import type { TimezoneResolver } from "./timezones.js";
import { DuplicateTracker } from "./tracker.js";
import type { NormalizePolicy, NormalizedEvent, SourceEntry } from "./types.js";

export interface ImportRunOptions {
  calendarId: string;
  dryRun: boolean;
  skipDuplicates: boolean;
  batchSize: number;
  batchDelayMs: number;
  limit?: number;
  signal?: AbortSignal;
  onProgress?: ProgressListener;
  sleep?: (ms: number) => Promise<void>;
}

export interface ImportRunSetup {
  target: ImportTarget;
  record: ImportRecord;
  resolver: TimezoneResolver;
  retryPolicy: RetryPolicy;
  policy: NormalizePolicy;
  options: ImportRunOptions;
  logger: pino.Logger;
}

type EntrySource = Iterable<SourceEntry> | AsyncIterable<SourceEntry>;

export class RunController {
  constructor(
    private readonly normalizer: EventNormalizer,
    private readonly tracker: DuplicateTracker,
    private readonly executor: ImportExecutor,
    private readonly options: ImportRunOptions,
    private readonly logger: pino.Logger,
  ) {}

  async run(entries: EntrySource, total: number | null = null): Promise<RunSummary> {
    const { limit, signal, batchSize } = this.options;
    const expected = total !== null && limit !== undefined ? Math.min(total, limit) : (total ?? limit ?? null);
    const tally = new RunTally(
      this.options.calendarId,
      this.options.dryRun,
      expected,
      this.options.onProgress,
      this.logger,
    );

    let pending: NormalizedEvent[] = [];
    let stopReason: StopReason = "exhausted";

    try {
      for await (const entry of entries) {
        if (signal?.aborted) {
          stopReason = "signal";
          break;
        }
        if (limit !== undefined && tally.processed + pending.length >= limit) {
          stopReason = "limit";
          break;
        }

        const admitted = this.offer(entry, tally);
        if (admitted) {
          pending.push(admitted);
        }

        if (pending.length >= batchSize) {
          const result = await this.executor.commitBatch(pending, tally, signal);
          pending = [];
          if (result.interrupted) {
            stopReason = "signal";
            break;
          }
        }
      }

      if (pending.length > 0) {
        if (stopReason === "signal") {
          for (const event of pending) {
            this.tracker.release(event.stableId);
          }
        } else {
          const result = await this.executor.commitBatch(pending, tally, signal);
          if (result.interrupted) {
            stopReason = "signal";
          }
        }
      }
    } catch (error) {
      if (error instanceof AuthError) {
        this.logger.error({ err: error, processed: tally.processed }, "Authentication failed, aborting run");
        return tally.finalize("aborted", error.message);
      }
      throw error;
    }

    return tally.finalize(stopReason);
  }

  private offer(entry: SourceEntry, tally: RunTally): NormalizedEvent | undefined {
    if (entry.type === "anomaly") {
      this.logger.debug({ index: entry.anomaly.index, reason: entry.anomaly.reason }, "Skipping malformed event");
      tally.recordFiltered(entry.anomaly.uid, "parse_anomaly");
      return undefined;
    }

    const result = this.normalizer.normalize(entry.event);
    if (result.status === "filtered") {
      this.logger.debug(
        { stableId: stableIdFor(entry.event), reason: result.reason, detail: result.detail },
        "Event filtered",
      );
      tally.recordFiltered(stableIdFor(entry.event), result.reason);
      return undefined;
    }

    const { event, warnings } = result;
    for (const warning of warnings) {
      tally.warn(event.stableId, warning);
    }

    if (this.tracker.admit(event.stableId) === "skip_duplicate") {
      tally.recordDuplicate(event.stableId);
      return undefined;
    }
    return event;
  }
}

/**
 * Wires normalizer, tracker and executor for one (source file, calendar) pair,
 * seeds the import record from the calendar, and runs the entries through.
 */
export async function runImport(
  entries: EntrySource,
  setup: ImportRunSetup,
  total: number | null = null,
): Promise<RunSummary> {
  const { target, record, options, logger } = setup;

  if (options.skipDuplicates) {
    try {
      const seeded = record.seed(await target.listExistingKeys(options.calendarId));
      logger.info(
        { calendarId: options.calendarId, seeded, known: record.size },
        "Loaded existing events for duplicate detection",
      );
    } catch (error) {
      if (classifyError(error) === "fatal") {
        const message = error instanceof AuthError ? error.message : describeError(error);
        logger.error({ err: error }, "Authentication failed while listing existing events");
        return new RunTally(options.calendarId, options.dryRun, total).finalize("aborted", message);
      }
      logger.warn(
        { err: error, calendarId: options.calendarId },
        "Could not list existing events; relying on local import records",
      );
    }
  }

  const tracker = new DuplicateTracker(record, options.skipDuplicates);
  const executor = new ImportExecutor(
    target,
    record,
    tracker,
    setup.retryPolicy,
    {
      calendarId: options.calendarId,
      dryRun: options.dryRun,
      batchDelayMs: options.batchDelayMs,
      sleep: options.sleep,
    },
    logger,
  );
  const normalizer = new EventNormalizer(setup.resolver, setup.policy);

  return new RunController(normalizer, tracker, executor, options, logger).run(entries, total);
}
