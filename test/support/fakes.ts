import { HttpError } from "../../src/http.js";
import type {
  ImportRecordEntry,
  ImportRecordPersistence,
  ImportRecordScope,
} from "../../src/importer/import-record.js";
import type { ImportTarget, ImportedEvent } from "../../src/importer/target.js";
import type { NormalizedEvent, RawEvent } from "../../src/importer/types.js";

export interface ImportCall {
  calendarId: string;
  event: NormalizedEvent;
}

/** In-memory calendar. Failures are queued per stable id and thrown in order. */
export class FakeImportTarget implements ImportTarget {
  readonly name = "fake";
  readonly calls: ImportCall[] = [];
  readonly stored = new Map<string, string>();
  listCalls = 0;
  timeZone: string | undefined = "Europe/Berlin";
  listError: unknown = undefined;
  private readonly failures = new Map<string, unknown[]>();
  private nextId = 1;

  failWith(stableId: string, ...errors: unknown[]) {
    this.failures.set(stableId, [...(this.failures.get(stableId) ?? []), ...errors]);
  }

  async importEvent(calendarId: string, event: NormalizedEvent): Promise<ImportedEvent> {
    this.calls.push({ calendarId, event });
    const queued = this.failures.get(event.stableId);
    if (queued && queued.length > 0) {
      throw queued.shift();
    }

    const id = `remote-${this.nextId}`;
    this.nextId += 1;
    this.stored.set(event.stableId, id);
    return { id };
  }

  async listExistingKeys(): Promise<Map<string, string>> {
    this.listCalls += 1;
    if (this.listError !== undefined) {
      throw this.listError;
    }
    return new Map(this.stored);
  }

  async getDefaultTimeZone(): Promise<string | undefined> {
    return this.timeZone;
  }
}

/** Keeps every saved record entry so tests can see what was written through. */
export class MemoryRecordPersistence implements ImportRecordPersistence {
  readonly saved: ImportRecordEntry[] = [];

  load(_scope: ImportRecordScope): ImportRecordEntry[] {
    return [...this.saved];
  }

  save(_scope: ImportRecordScope, entry: ImportRecordEntry): void {
    this.saved.push(entry);
  }
}

export function googleError(status: number, reason?: string, message?: string): HttpError {
  const body = {
    error: {
      code: status,
      message: message ?? reason ?? "error",
      errors: reason ? [{ reason, message: message ?? reason }] : [],
    },
  };
  return new HttpError(
    `POST /calendar/v3/calendars/primary/events/import failed with status ${status}`,
    status,
    body,
    new Headers(),
  );
}

export function rawEvent(overrides: Partial<RawEvent> = {}): RawEvent {
  return {
    uid: "event-1@example.com",
    uidSynthesized: false,
    summary: "Planning",
    description: null,
    location: null,
    start: { kind: "dateTime", dateTime: "2024-03-04T09:00:00", tzid: "Europe/Berlin", utc: false },
    end: { kind: "dateTime", dateTime: "2024-03-04T10:00:00", tzid: "Europe/Berlin", utc: false },
    durationSeconds: null,
    recurrenceId: null,
    organizer: null,
    attendees: [],
    recurrence: [],
    status: null,
    transparency: null,
    classification: null,
    sequence: null,
    busyStatus: null,
    alarms: [],
    calendarTimeZone: null,
    ...overrides,
  };
}

export const noSleep = async (_ms: number): Promise<void> => {};

export function normalizedEvent(stableId: string, overrides: Partial<NormalizedEvent> = {}): NormalizedEvent {
  return {
    stableId,
    iCalUid: stableId,
    summary: "Planning",
    start: { dateTime: "2024-03-04T09:00:00", timeZone: "Europe/Berlin" },
    end: { dateTime: "2024-03-04T10:00:00", timeZone: "Europe/Berlin" },
    attendees: [],
    recurrence: [],
    reminders: [],
    ...overrides,
  };
}
