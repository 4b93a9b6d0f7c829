import { formatContentLine, parseContentLine } from "../ics/content-line.js";
import { stableIdFor } from "./stable-id.js";
import { TimezoneUnresolvedError, isIanaTimeZone, type TimezoneResolver } from "./timezones.js";
import type {
  EventDateTime,
  EventReminder,
  NormalizePolicy,
  NormalizeResult,
  NormalizedAttendee,
  NormalizedEvent,
  RawAttendee,
  RawEvent,
  RawEventTime,
} from "./types.js";

const DEFAULT_EVENT_SECONDS = 60 * 60;
const SECONDS_PER_DAY = 24 * 60 * 60;
const MAX_REMINDER_MINUTES = 40_320;
const MAX_REMINDERS = 5;
const RESOURCE_DOMAIN_SUFFIX = "resource.calendar.google.com";

export function isPlaceholderAddress(address: string): boolean {
  const trimmed = address.trim();
  return trimmed.toLowerCase().startsWith("invalid:") || !trimmed.includes("@");
}

export function isResourceAttendee(attendee: RawAttendee): boolean {
  if (attendee.isResource) {
    return true;
  }
  const domain = attendee.address.slice(attendee.address.lastIndexOf("@") + 1).toLowerCase();
  return domain === RESOURCE_DOMAIN_SUFFIX || domain.endsWith(`.${RESOURCE_DOMAIN_SUFFIX}`);
}

/** Null when the result leaves the four-digit year range. */
function addSeconds(wallClock: string, seconds: number): string | null {
  const shifted = new Date(Date.parse(`${wallClock}Z`) + seconds * 1000);
  if (Number.isNaN(shifted.getTime())) {
    return null;
  }
  const year = shifted.getUTCFullYear();
  if (year < 1 || year > 9999) {
    return null;
  }
  return shifted.toISOString().slice(0, 19);
}

function addDays(date: string, days: number): string | null {
  return addSeconds(`${date}T00:00:00`, days * SECONDS_PER_DAY)?.slice(0, 10) ?? null;
}

function calendarDateOf(time: RawEventTime): string {
  return time.kind === "date" ? time.date : time.dateTime.slice(0, 10);
}

function resolveEnd(raw: RawEvent): RawEventTime | null {
  const { start } = raw;

  if (raw.end) {
    if (start.kind === "date" && raw.end.kind === "dateTime") {
      return { kind: "date", date: raw.end.dateTime.slice(0, 10) };
    }
    if (start.kind === "dateTime" && raw.end.kind === "date") {
      return { ...start, dateTime: `${raw.end.date}T00:00:00` };
    }
    return raw.end;
  }

  if (start.kind === "date") {
    const days =
      raw.durationSeconds !== null ? Math.max(1, Math.round(raw.durationSeconds / SECONDS_PER_DAY)) : 1;
    const date = addDays(start.date, days);
    return date ? { kind: "date", date } : null;
  }

  const dateTime = addSeconds(start.dateTime, raw.durationSeconds ?? DEFAULT_EVENT_SECONDS);
  return dateTime ? { ...start, dateTime } : null;
}

function endsBeforeStart(start: RawEventTime, end: RawEventTime): boolean {
  if (start.kind === "date" && end.kind === "date") {
    return end.date < start.date;
  }
  if (start.kind === "dateTime" && end.kind === "dateTime") {
    // Wall-clock values are only comparable inside one zone.
    if (start.utc === end.utc && start.tzid === end.tzid) {
      return end.dateTime < start.dateTime;
    }
  }
  return false;
}

function inferTitle(raw: RawEvent): string {
  const haystack = `${raw.description ?? ""} ${raw.location ?? ""}`.toLowerCase();
  if (haystack.includes("zoom")) {
    return "Zoom Meeting";
  }
  if (haystack.includes("teams")) {
    return "Teams Meeting";
  }
  if (haystack.includes("webex")) {
    return "Webex Meeting";
  }
  if (haystack.includes("meet.google")) {
    return "Google Meet";
  }

  const busyStatus = raw.busyStatus?.toUpperCase();
  if (busyStatus) {
    switch (busyStatus) {
      case "FREE":
        return "Free";
      case "TENTATIVE":
        return "Tentative";
      case "OOF":
        return "Out of Office";
      default:
        return "Busy";
    }
  }
  return raw.transparency?.toUpperCase() === "TRANSPARENT" ? "Free" : "Busy";
}

function toReminders(raw: RawEvent): EventReminder[] {
  const seen = new Set<string>();
  const reminders: EventReminder[] = [];

  for (const alarm of raw.alarms) {
    const method = alarm.action.toUpperCase() === "EMAIL" ? "email" : "popup";
    const minutes = Math.min(Math.abs(Math.trunc(alarm.minutesBefore)), MAX_REMINDER_MINUTES);
    const key = `${method}:${minutes}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    reminders.push({ method, minutes });
  }

  return reminders.slice(0, MAX_REMINDERS);
}

function toStatus(value: string | null): NormalizedEvent["status"] {
  if (!value) {
    return undefined;
  }
  switch (value.toUpperCase()) {
    case "CANCELLED":
      return "cancelled";
    case "TENTATIVE":
      return "tentative";
    default:
      return "confirmed";
  }
}

function toVisibility(value: string | null): NormalizedEvent["visibility"] {
  if (!value) {
    return undefined;
  }
  switch (value.toUpperCase()) {
    case "PRIVATE":
      return "private";
    case "CONFIDENTIAL":
      return "confidential";
    default:
      return "default";
  }
}

function nonEmpty(value: string | null): string | undefined {
  return value && value.trim() ? value : undefined;
}

export class EventNormalizer {
  constructor(
    private readonly resolver: TimezoneResolver,
    private readonly policy: NormalizePolicy,
  ) {}

  normalize(raw: RawEvent): NormalizeResult {
    const warnings: string[] = [];

    const end = resolveEnd(raw);
    if (!end) {
      return {
        status: "filtered",
        reason: "invalid_time_range",
        detail: `end of the event starting ${calendarDateOf(raw.start)} is out of range`,
      };
    }
    if (endsBeforeStart(raw.start, end)) {
      return {
        status: "filtered",
        reason: "invalid_time_range",
        detail: `end ${calendarDateOf(end)} is before start ${calendarDateOf(raw.start)}`,
      };
    }

    const organizer =
      raw.organizer && !isPlaceholderAddress(raw.organizer.address)
        ? {
            email: raw.organizer.address.trim(),
            ...(raw.organizer.displayName ? { displayName: raw.organizer.displayName } : {}),
          }
        : undefined;

    const attendees = this.filterAttendees(raw.attendees);
    if (attendees.length > this.policy.maxAttendees) {
      return {
        status: "filtered",
        reason: "attendee_limit_exceeded",
        detail: `${attendees.length} attendees exceeds limit of ${this.policy.maxAttendees}`,
      };
    }
    this.appendSelf(attendees);

    if (raw.uidSynthesized) {
      warnings.push("No UID in the source, using one derived from the event content");
    }

    const calendarZone = this.resolveCalendarZone(raw.calendarTimeZone, warnings);
    const start = this.toEventDateTime(raw.start, calendarZone, warnings);
    const normalizedEnd = this.toEventDateTime(end, calendarZone, warnings);

    const startDate = calendarDateOf(raw.start);
    if (this.policy.startDate && startDate < this.policy.startDate) {
      return {
        status: "filtered",
        reason: "outside_date_range",
        detail: `starts ${startDate}, before ${this.policy.startDate}`,
      };
    }
    if (this.policy.endDate && startDate >= this.policy.endDate) {
      return {
        status: "filtered",
        reason: "outside_date_range",
        detail: `starts ${startDate}, not before ${this.policy.endDate}`,
      };
    }

    const transparency = raw.transparency
      ? raw.transparency.toUpperCase() === "TRANSPARENT"
        ? "transparent"
        : "opaque"
      : undefined;

    const event: NormalizedEvent = {
      stableId: stableIdFor(raw),
      iCalUid: raw.uid,
      summary: nonEmpty(raw.summary) ?? inferTitle(raw),
      description: nonEmpty(raw.description),
      location: nonEmpty(raw.location),
      start,
      end: normalizedEnd,
      originalStartTime: raw.recurrenceId
        ? this.toEventDateTime(raw.recurrenceId, calendarZone, warnings)
        : undefined,
      organizer,
      attendees,
      recurrence: raw.recurrence.map((line) => this.translateRecurrenceLine(line, warnings)),
      status: toStatus(raw.status),
      transparency,
      visibility: toVisibility(raw.classification),
      sequence: raw.sequence ?? undefined,
      reminders: toReminders(raw),
    };

    return { status: "normalized", event, warnings: Array.from(new Set(warnings)) };
  }

  private filterAttendees(rawAttendees: RawAttendee[]): NormalizedAttendee[] {
    if (!this.policy.includeAttendees) {
      return [];
    }

    const seen = new Set<string>();
    const attendees: NormalizedAttendee[] = [];
    for (const raw of rawAttendees) {
      const email = raw.address.trim();
      if (isPlaceholderAddress(email)) {
        continue;
      }
      const resource = isResourceAttendee(raw);
      if (resource && this.policy.excludeResources) {
        continue;
      }
      const key = email.toLowerCase();
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);

      attendees.push({
        email,
        ...(raw.displayName ? { displayName: raw.displayName } : {}),
        responseStatus: raw.responseStatus,
        ...(raw.role?.toUpperCase() === "OPT-PARTICIPANT" ? { optional: true } : {}),
        ...(resource ? { resource: true } : {}),
      });
    }
    return attendees;
  }

  private appendSelf(attendees: NormalizedAttendee[]) {
    const self = this.policy.addSelf?.trim();
    if (!self || !this.policy.includeAttendees) {
      return;
    }
    const present = attendees.some((attendee) => attendee.email.toLowerCase() === self.toLowerCase());
    if (!present) {
      attendees.push({ email: self, responseStatus: "accepted" });
    }
  }

  private tryResolveZone(name: string): string | undefined {
    if (isIanaTimeZone(name)) {
      return name;
    }
    try {
      return this.resolver.resolve(name);
    } catch (error) {
      if (error instanceof TimezoneUnresolvedError) {
        return undefined;
      }
      throw error;
    }
  }

  private resolveCalendarZone(name: string | null, warnings: string[]): string {
    if (!name) {
      return this.policy.fallbackTimeZone;
    }
    const zone = this.tryResolveZone(name);
    if (!zone) {
      warnings.push(`Unresolved time zone '${name}', using ${this.policy.fallbackTimeZone}`);
      return this.policy.fallbackTimeZone;
    }
    return zone;
  }

  private toEventDateTime(time: RawEventTime, calendarZone: string, warnings: string[]): EventDateTime {
    if (time.kind === "date") {
      return { date: time.date };
    }
    if (time.utc) {
      return { dateTime: `${time.dateTime}Z`, timeZone: "UTC" };
    }
    if (!time.tzid) {
      return { dateTime: time.dateTime, timeZone: calendarZone };
    }

    const zone = this.tryResolveZone(time.tzid);
    if (!zone) {
      warnings.push(`Unresolved time zone '${time.tzid}', using ${calendarZone}`);
      return { dateTime: time.dateTime, timeZone: calendarZone };
    }
    return { dateTime: time.dateTime, timeZone: zone };
  }

  /** RRULE stays opaque; only the TZID parameter of EXDATE/RDATE lines is translated. */
  private translateRecurrenceLine(line: string, warnings: string[]): string {
    const parsed = parseContentLine(line);
    if (!parsed || (parsed.name !== "EXDATE" && parsed.name !== "RDATE")) {
      return line;
    }
    const tzid = parsed.params.TZID;
    if (!tzid) {
      return line;
    }

    const zone = this.tryResolveZone(tzid);
    if (!zone) {
      warnings.push(`Unresolved time zone '${tzid}' in ${parsed.name}`);
      return line;
    }
    if (zone === tzid) {
      return line;
    }
    return formatContentLine({ ...parsed, params: { ...parsed.params, TZID: zone } });
  }
}
