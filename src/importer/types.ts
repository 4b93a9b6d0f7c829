/**
 * A start/end value as written in the source file. `dateTime` is the wall-clock
 * time without offset (`YYYY-MM-DDTHH:mm:ss`); `utc` marks values that carried a
 * trailing `Z`, and `tzid` is the TZID parameter exactly as exported.
 */
export type RawEventTime =
  | { kind: "date"; date: string }
  | { kind: "dateTime"; dateTime: string; tzid: string | null; utc: boolean };

export type ResponseStatus = "accepted" | "declined" | "tentative" | "needsAction";

export interface RawAttendee {
  address: string;
  displayName: string | null;
  responseStatus: ResponseStatus;
  isResource: boolean;
  role: string | null;
}

export interface RawOrganizer {
  address: string;
  displayName: string | null;
}

export interface RawAlarm {
  action: string;
  minutesBefore: number;
}

export interface RawEvent {
  uid: string;
  uidSynthesized: boolean;
  summary: string | null;
  description: string | null;
  location: string | null;
  start: RawEventTime;
  end: RawEventTime | null;
  durationSeconds: number | null;
  recurrenceId: RawEventTime | null;
  organizer: RawOrganizer | null;
  attendees: RawAttendee[];
  /** RRULE / EXDATE / RDATE content lines, in file order. */
  recurrence: string[];
  status: string | null;
  transparency: string | null;
  classification: string | null;
  sequence: number | null;
  busyStatus: string | null;
  alarms: RawAlarm[];
  calendarTimeZone: string | null;
}

export interface ParseAnomaly {
  index: number;
  uid: string | null;
  reason: string;
}

export type SourceEntry =
  | { type: "event"; event: RawEvent }
  | { type: "anomaly"; anomaly: ParseAnomaly };

export type EventDateTime = { dateTime: string; timeZone: string } | { date: string };

export interface NormalizedAttendee {
  email: string;
  displayName?: string;
  responseStatus: ResponseStatus;
  optional?: boolean;
  resource?: boolean;
}

export interface EventReminder {
  method: "popup" | "email";
  minutes: number;
}

export interface NormalizedEvent {
  stableId: string;
  iCalUid: string;
  summary: string;
  description?: string;
  location?: string;
  start: EventDateTime;
  end: EventDateTime;
  originalStartTime?: EventDateTime;
  organizer?: { email: string; displayName?: string };
  attendees: NormalizedAttendee[];
  recurrence: string[];
  status?: "confirmed" | "tentative" | "cancelled";
  transparency?: "opaque" | "transparent";
  visibility?: "default" | "private" | "confidential";
  sequence?: number;
  reminders: EventReminder[];
}

export type FilterReason =
  | "parse_anomaly"
  | "invalid_time_range"
  | "attendee_limit_exceeded"
  | "outside_date_range";

export interface NormalizePolicy {
  /** Inclusive lower bound, `YYYY-MM-DD`. */
  startDate?: string;
  /** Exclusive upper bound, `YYYY-MM-DD`. */
  endDate?: string;
  includeAttendees: boolean;
  addSelf?: string;
  excludeResources: boolean;
  maxAttendees: number;
  fallbackTimeZone: string;
}

export type NormalizeResult =
  | { status: "normalized"; event: NormalizedEvent; warnings: string[] }
  | { status: "filtered"; reason: FilterReason; detail: string };

export type Admission = "proceed" | "skip_duplicate";

export type EventOutcome = "imported" | "skipped_duplicate" | "filtered" | "failed";
