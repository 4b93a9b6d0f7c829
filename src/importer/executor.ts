import type pino from "pino";
import { AuthError, describeError, googleErrorMessage, googleErrorReasons } from "../errors.js";
import { HttpError, wait } from "../http.js";
import type { RetryPolicy } from "../retry.js";
import type { ImportRecord } from "./import-record.js";
import type { RunTally } from "./summary.js";
import type { ImportTarget, ImportedEvent } from "./target.js";
import type { DuplicateTracker } from "./tracker.js";
import type { NormalizedEvent } from "./types.js";

const PARTICIPANT_REASON = "participantIsNeitherOrganizerNorAttendee";

export interface ImportExecutorOptions {
  calendarId: string;
  dryRun: boolean;
  /** Pause between two committed batches. */
  batchDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface BatchResult {
  completed: number;
  interrupted: boolean;
}

function isParticipantError(error: unknown): boolean {
  if (!(error instanceof HttpError) || error.status !== 400) {
    return false;
  }
  if (googleErrorReasons(error).includes(PARTICIPANT_REASON)) {
    return true;
  }
  return googleErrorMessage(error)?.includes(PARTICIPANT_REASON) ?? false;
}

function hasParticipants(event: NormalizedEvent): boolean {
  return Boolean(event.organizer) || event.attendees.length > 0;
}

export class ImportExecutor {
  private batchesCommitted = 0;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly target: ImportTarget,
    private readonly record: ImportRecord,
    private readonly tracker: DuplicateTracker,
    private readonly retryPolicy: RetryPolicy,
    private readonly options: ImportExecutorOptions,
    private readonly logger: pino.Logger,
  ) {
    this.sleep = options.sleep ?? wait;
  }

  /**
   * Commits events one at a time. A failed event never undoes earlier ones; only
   * an authentication failure escapes, as an AuthError. The stop signal is
   * checked before each event, and events not reached are handed back to the
   * tracker.
   */
  async commitBatch(batch: NormalizedEvent[], tally: RunTally, signal?: AbortSignal): Promise<BatchResult> {
    if (batch.length === 0) {
      return { completed: 0, interrupted: false };
    }

    if (!this.options.dryRun && this.batchesCommitted > 0 && this.options.batchDelayMs > 0) {
      await this.sleep(this.options.batchDelayMs);
    }
    this.batchesCommitted += 1;

    for (let index = 0; index < batch.length; index += 1) {
      if (signal?.aborted) {
        for (const pending of batch.slice(index)) {
          this.tracker.release(pending.stableId);
        }
        return { completed: index, interrupted: true };
      }

      try {
        await this.commitOne(batch[index], tally);
      } catch (error) {
        for (const pending of batch.slice(index)) {
          this.tracker.release(pending.stableId);
        }
        throw error;
      }
    }

    return { completed: batch.length, interrupted: false };
  }

  private async commitOne(event: NormalizedEvent, tally: RunTally) {
    if (this.options.dryRun) {
      this.logger.debug({ stableId: event.stableId, summary: event.summary }, "Would import event");
      tally.recordImported(event.stableId, { attendees: event.attendees.length });
      return;
    }

    let imported: ImportedEvent;
    try {
      imported = await this.attempt(event);
    } catch (error) {
      if (error instanceof HttpError && error.status === 409) {
        this.record.register(event.stableId, null);
        this.logger.info({ stableId: event.stableId }, "Event already exists on calendar");
        tally.recordDuplicate(event.stableId);
        return;
      }

      if (isParticipantError(error) && hasParticipants(event)) {
        await this.commitWithoutParticipants(event, tally);
        return;
      }

      this.fail(event, error, tally);
      return;
    }

    this.record.register(event.stableId, imported.id);
    tally.recordImported(event.stableId, { attendees: event.attendees.length });
  }

  private async commitWithoutParticipants(event: NormalizedEvent, tally: RunTally) {
    const stripped: NormalizedEvent = { ...event, organizer: undefined, attendees: [] };
    this.logger.info(
      { stableId: event.stableId },
      "Calendar owner is neither organizer nor attendee, importing without participants",
    );

    let imported: ImportedEvent;
    try {
      imported = await this.attempt(stripped);
    } catch (error) {
      this.fail(event, error, tally);
      return;
    }

    this.record.register(event.stableId, imported.id);
    tally.recordImported(event.stableId, { attendees: 0, withoutAttendees: true });
  }

  private attempt(event: NormalizedEvent): Promise<ImportedEvent> {
    return this.retryPolicy.execute(
      () => this.target.importEvent(this.options.calendarId, event),
      ({ attempt, maxAttempts, delayMs, error }) => {
        this.logger.warn(
          {
            stableId: event.stableId,
            attempt,
            maxAttempts,
            delayMs,
            status: error instanceof HttpError ? error.status : undefined,
          },
          "Transient import failure, backing off",
        );
      },
    );
  }

  private fail(event: NormalizedEvent, error: unknown, tally: RunTally) {
    if (this.retryPolicy.classifyError(error) === "fatal") {
      throw error instanceof AuthError
        ? error
        : new AuthError(`Authentication rejected: ${describeError(error)}`, { cause: error });
    }

    const reason = describeError(error);
    this.tracker.release(event.stableId);
    this.logger.warn({ stableId: event.stableId, reason }, "Event import failed");
    tally.recordFailed(event.stableId, event.summary, reason);
  }
}
