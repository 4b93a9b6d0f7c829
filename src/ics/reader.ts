import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import type {
  ParseAnomaly,
  RawAlarm,
  RawAttendee,
  RawEvent,
  RawEventTime,
  ResponseStatus,
  SourceEntry,
} from "../importer/types.js";
import { type ContentLine, parseContentLine, unescapeText, unfoldLines } from "./content-line.js";

const SYNTHETIC_UID_SUFFIX = "@imported";
const RECURRENCE_PROPERTIES = new Set(["RRULE", "EXDATE", "RDATE"]);

interface EventBlock {
  lines: string[];
  props: ContentLine[];
  alarms: ContentLine[][];
}

export interface ParsedCalendar {
  entries: SourceEntry[];
  calendarTimeZone: string | null;
}

function getFirstProperty(props: ContentLine[], name: string): ContentLine | undefined {
  return props.find((prop) => prop.name === name);
}

function isValidDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

export function parseEventTime(prop: ContentLine): RawEventTime | null {
  const value = prop.value.trim();
  const isDateOnly = prop.params.VALUE?.toUpperCase() === "DATE" || /^\d{8}$/.test(value);

  if (isDateOnly) {
    const match = value.match(/^(\d{4})(\d{2})(\d{2})$/);
    if (!match) {
      return null;
    }
    const [, year, month, day] = match;
    if (!isValidDate(Number(year), Number(month), Number(day))) {
      return null;
    }
    return { kind: "date", date: `${year}-${month}-${day}` };
  }

  const match = value.match(/^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})?(Z)?$/i);
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, rawSecond = "00", zulu] = match;
  if (
    !isValidDate(Number(year), Number(month), Number(day)) ||
    Number(hour) > 23 ||
    Number(minute) > 59 ||
    Number(rawSecond) > 60
  ) {
    return null;
  }
  // Leap seconds have no wall-clock representation downstream.
  const second = rawSecond === "60" ? "59" : rawSecond;

  const utc = Boolean(zulu);
  return {
    kind: "dateTime",
    dateTime: `${year}-${month}-${day}T${hour}:${minute}:${second}`,
    tzid: utc ? null : (prop.params.TZID?.trim() || null),
    utc,
  };
}

/** ISO 8601 duration as used by DURATION and TRIGGER, in signed seconds. */
export function parseDuration(value: string): number | null {
  const match = value
    .trim()
    .match(/^([+-])?P(?:(\d+)W)?(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/i);
  if (!match) {
    return null;
  }

  const [, sign, weeks, days, hours, minutes, seconds] = match;
  if ([weeks, days, hours, minutes, seconds].every((part) => part === undefined)) {
    return null;
  }

  const total =
    Number(weeks ?? 0) * 7 * 86_400 +
    Number(days ?? 0) * 86_400 +
    Number(hours ?? 0) * 3_600 +
    Number(minutes ?? 0) * 60 +
    Number(seconds ?? 0);
  return sign === "-" ? -total : total;
}

function stripMailto(value: string): string {
  return value.trim().replace(/^mailto:/i, "");
}

function toResponseStatus(partstat: string | undefined): ResponseStatus {
  switch (partstat?.toUpperCase()) {
    case "ACCEPTED":
      return "accepted";
    case "DECLINED":
      return "declined";
    case "TENTATIVE":
      return "tentative";
    default:
      return "needsAction";
  }
}

function toAttendee(prop: ContentLine): RawAttendee {
  const cutype = prop.params.CUTYPE?.toUpperCase() ?? null;
  return {
    address: stripMailto(prop.value),
    displayName: prop.params.CN?.trim() || null,
    responseStatus: toResponseStatus(prop.params.PARTSTAT),
    isResource: cutype === "RESOURCE" || cutype === "ROOM",
    role: prop.params.ROLE?.toUpperCase() ?? null,
  };
}

function toAlarm(props: ContentLine[]): RawAlarm | null {
  const trigger = getFirstProperty(props, "TRIGGER");
  if (!trigger || trigger.params.VALUE?.toUpperCase() === "DATE-TIME") {
    return null;
  }
  const seconds = parseDuration(trigger.value);
  if (seconds === null) {
    return null;
  }
  return {
    action: getFirstProperty(props, "ACTION")?.value.trim().toUpperCase() || "DISPLAY",
    minutesBefore: Math.max(0, Math.round(-seconds / 60)),
  };
}

function textOf(props: ContentLine[], name: string): string | null {
  const prop = getFirstProperty(props, name);
  return prop ? unescapeText(prop.value) : null;
}

function synthesizeUid(lines: string[]): string {
  const digest = createHash("sha256").update(lines.join("\n")).digest("hex");
  return `${digest}${SYNTHETIC_UID_SUFFIX}`;
}

function buildEntry(block: EventBlock, index: number, calendarTimeZone: string | null): SourceEntry {
  const { props } = block;
  const uidValue = getFirstProperty(props, "UID")?.value;
  const declaredUid = uidValue && uidValue.trim() ? uidValue : null;
  const anomaly = (reason: string): SourceEntry => {
    const value: ParseAnomaly = { index, uid: declaredUid, reason };
    return { type: "anomaly", anomaly: value };
  };

  const dtStart = getFirstProperty(props, "DTSTART");
  if (!dtStart) {
    return anomaly("missing DTSTART");
  }
  const start = parseEventTime(dtStart);
  if (!start) {
    return anomaly(`unparseable DTSTART '${dtStart.value}'`);
  }

  const dtEnd = getFirstProperty(props, "DTEND");
  const end = dtEnd ? parseEventTime(dtEnd) : null;
  if (dtEnd && !end) {
    return anomaly(`unparseable DTEND '${dtEnd.value}'`);
  }

  const durationProp = getFirstProperty(props, "DURATION");
  const durationSeconds = durationProp ? parseDuration(durationProp.value) : null;
  if (durationProp && durationSeconds === null) {
    return anomaly(`unparseable DURATION '${durationProp.value}'`);
  }

  const recurrenceIdProp = getFirstProperty(props, "RECURRENCE-ID");
  const recurrenceId = recurrenceIdProp ? parseEventTime(recurrenceIdProp) : null;
  if (recurrenceIdProp && !recurrenceId) {
    return anomaly(`unparseable RECURRENCE-ID '${recurrenceIdProp.value}'`);
  }

  const organizerProp = getFirstProperty(props, "ORGANIZER");
  const sequenceValue = getFirstProperty(props, "SEQUENCE")?.value.trim();
  const sequence = sequenceValue && /^\d+$/.test(sequenceValue) ? Number(sequenceValue) : null;

  const event: RawEvent = {
    uid: declaredUid ?? synthesizeUid(block.lines),
    uidSynthesized: declaredUid === null,
    summary: textOf(props, "SUMMARY"),
    description: textOf(props, "DESCRIPTION"),
    location: textOf(props, "LOCATION"),
    start,
    end,
    durationSeconds,
    recurrenceId,
    organizer: organizerProp
      ? { address: stripMailto(organizerProp.value), displayName: organizerProp.params.CN?.trim() || null }
      : null,
    attendees: props.filter((prop) => prop.name === "ATTENDEE").map(toAttendee),
    recurrence: block.lines.filter((line) => {
      const parsed = parseContentLine(line);
      return parsed !== null && RECURRENCE_PROPERTIES.has(parsed.name);
    }),
    status: getFirstProperty(props, "STATUS")?.value.trim() || null,
    transparency: getFirstProperty(props, "TRANSP")?.value.trim() || null,
    classification: getFirstProperty(props, "CLASS")?.value.trim() || null,
    sequence,
    busyStatus: getFirstProperty(props, "X-MICROSOFT-CDO-BUSYSTATUS")?.value.trim() || null,
    alarms: block.alarms.map(toAlarm).filter((alarm): alarm is RawAlarm => alarm !== null),
    calendarTimeZone,
  };

  return { type: "event", event };
}

/**
 * Parses every VEVENT of an iCalendar document, in file order. Malformed events
 * come back as anomalies so the caller can count them.
 */
export function parseIcsEntries(icsText: string): ParsedCalendar {
  const lines = unfoldLines(icsText);
  const blocks: EventBlock[] = [];
  const components: string[] = [];
  let current: EventBlock | null = null;
  let currentAlarm: ContentLine[] | null = null;
  let wrTimeZone: string | null = null;
  let firstVTimezone: string | null = null;

  for (const line of lines) {
    if (!line.trim()) {
      continue;
    }
    const prop = parseContentLine(line);
    if (!prop) {
      continue;
    }

    if (prop.name === "BEGIN") {
      const component = prop.value.trim().toUpperCase();
      components.push(component);
      if (component === "VEVENT") {
        current = { lines: [], props: [], alarms: [] };
      } else if (component === "VALARM" && current) {
        currentAlarm = [];
      }
      continue;
    }

    if (prop.name === "END") {
      const component = prop.value.trim().toUpperCase();
      components.pop();
      if (component === "VEVENT" && current) {
        blocks.push(current);
        current = null;
      } else if (component === "VALARM" && current && currentAlarm) {
        current.alarms.push(currentAlarm);
        currentAlarm = null;
      }
      continue;
    }

    const inside = components.at(-1);
    if (inside === "VALARM" && currentAlarm) {
      currentAlarm.push(prop);
    } else if (inside === "VEVENT" && current) {
      current.lines.push(line);
      current.props.push(prop);
    } else if (inside === "VCALENDAR" && prop.name === "X-WR-TIMEZONE") {
      wrTimeZone = prop.value.trim() || null;
    } else if (inside === "VTIMEZONE" && prop.name === "TZID" && firstVTimezone === null) {
      firstVTimezone = prop.value.trim() || null;
    }
  }

  const calendarTimeZone = wrTimeZone ?? firstVTimezone;
  return {
    entries: blocks.map((block, index) => buildEntry(block, index, calendarTimeZone)),
    calendarTimeZone,
  };
}

export async function readIcsFile(filePath: string): Promise<ParsedCalendar> {
  return parseIcsEntries(await fs.readFile(filePath, "utf8"));
}

/** A single .ics file, or every .ics file directly inside a directory, sorted by name. */
export async function findIcsFiles(inputPath: string): Promise<string[]> {
  const stat = await fs.stat(inputPath);
  if (stat.isFile()) {
    return [inputPath];
  }

  const names = await fs.readdir(inputPath);
  return names
    .filter((name) => name.toLowerCase().endsWith(".ics"))
    .sort((a, b) => a.localeCompare(b))
    .map((name) => path.join(inputPath, name));
}
