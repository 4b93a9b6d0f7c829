import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { parseContentLine, unescapeText } from "../src/ics/content-line.js";
import { findIcsFiles, parseDuration, parseIcsEntries } from "../src/ics/reader.js";
import type { RawEvent, SourceEntry } from "../src/importer/types.js";

const calendar = [
  "BEGIN:VCALENDAR",
  "VERSION:2.0",
  "X-WR-TIMEZONE:Eastern Standard Time",
  "BEGIN:VTIMEZONE",
  "TZID:W. Europe Standard Time",
  "BEGIN:STANDARD",
  "DTSTART:16010101T030000",
  "TZOFFSETFROM:+0200",
  "TZOFFSETTO:+0100",
  "END:STANDARD",
  "END:VTIMEZONE",
  "BEGIN:VEVENT",
  "UID:series-1@example.com",
  "SUMMARY:Weekly\\, sync",
  "DESCRIPTION:Line one\\nLine two",
  "DTSTART;TZID=W. Europe Standard Time:20240304T090000",
  "DTEND;TZID=W. Europe Standard Time:20240304T093000",
  "RRULE:FREQ=WEEKLY;COUNT=4",
  "EXDATE;TZID=W. Europe Standard Time:20240311T090000",
  "ORGANIZER;CN=Jane Doe:mailto:jane@example.com",
  'ATTENDEE;CN="Doe, Ann";PARTSTAT=ACCEPTED;ROLE=REQ-PARTICIPANT:mailto:ann@example.com',
  "ATTENDEE;CUTYPE=ROOM;CN=Room 4;PARTSTAT=NEEDS-ACTION:mailto:room-4@example.com",
  "ATTENDEE;ROLE=OPT-PARTICIPANT;PARTSTAT=TENTATIVE:MAILTO:bob@example.com",
  "SEQUENCE:2",
  "TRANSP:OPAQUE",
  "X-MICROSOFT-CDO-BUSYSTATUS:BUSY",
  "BEGIN:VALARM",
  "ACTION:DISPLAY",
  "TRIGGER:-PT15M",
  "END:VALARM",
  "END:VEVENT",
  "BEGIN:VEVENT",
  "UID:series-1@example.com",
  "RECURRENCE-ID;TZID=W. Europe Standard Time:20240318T090000",
  "DTSTART;TZID=W. Europe Standard Time:20240318T100000",
  "DURATION:PT45M",
  "DESCRIPTION:Moved to the after",
  " noon",
  "END:VEVENT",
  "BEGIN:VEVENT",
  "UID:broken@example.com",
  "SUMMARY:No start",
  "END:VEVENT",
  "BEGIN:VEVENT",
  "DTSTART;VALUE=DATE:20240401",
  "SUMMARY:Holiday",
  "END:VEVENT",
  "BEGIN:VEVENT",
  "UID:bad-date@example.com",
  "DTSTART:20240230T090000",
  "END:VEVENT",
  "END:VCALENDAR",
].join("\r\n");

function eventAt(entries: SourceEntry[], index: number): RawEvent {
  const entry = entries[index];
  if (entry.type !== "event") {
    throw new Error(`entry ${index} is an anomaly: ${entry.anomaly.reason}`);
  }
  return entry.event;
}

describe("parseIcsEntries", () => {
  const { entries, calendarTimeZone } = parseIcsEntries(calendar);

  it("keeps file order and reports malformed events as anomalies", () => {
    expect(entries.map((entry) => entry.type)).toEqual(["event", "event", "anomaly", "event", "anomaly"]);
    expect(entries[2]).toEqual({
      type: "anomaly",
      anomaly: { index: 2, uid: "broken@example.com", reason: "missing DTSTART" },
    });
    expect(entries[4]).toEqual({
      type: "anomaly",
      anomaly: { index: 4, uid: "bad-date@example.com", reason: "unparseable DTSTART '20240230T090000'" },
    });
  });

  it("prefers X-WR-TIMEZONE as the calendar zone", () => {
    expect(calendarTimeZone).toBe("Eastern Standard Time");
    expect(eventAt(entries, 0).calendarTimeZone).toBe("Eastern Standard Time");
  });

  it("reads times, text and recurrence lines", () => {
    const series = eventAt(entries, 0);

    expect(series.uid).toBe("series-1@example.com");
    expect(series.uidSynthesized).toBe(false);
    expect(series.summary).toBe("Weekly, sync");
    expect(series.description).toBe("Line one\nLine two");
    expect(series.start).toEqual({
      kind: "dateTime",
      dateTime: "2024-03-04T09:00:00",
      tzid: "W. Europe Standard Time",
      utc: false,
    });
    expect(series.end).toEqual({
      kind: "dateTime",
      dateTime: "2024-03-04T09:30:00",
      tzid: "W. Europe Standard Time",
      utc: false,
    });
    expect(series.recurrence).toEqual([
      "RRULE:FREQ=WEEKLY;COUNT=4",
      "EXDATE;TZID=W. Europe Standard Time:20240311T090000",
    ]);
    expect(series.sequence).toBe(2);
    expect(series.transparency).toBe("OPAQUE");
    expect(series.busyStatus).toBe("BUSY");
    expect(series.alarms).toEqual([{ action: "DISPLAY", minutesBefore: 15 }]);
  });

  it("reads the organizer and attendees", () => {
    const series = eventAt(entries, 0);

    expect(series.organizer).toEqual({ address: "jane@example.com", displayName: "Jane Doe" });
    expect(series.attendees).toEqual([
      {
        address: "ann@example.com",
        displayName: "Doe, Ann",
        responseStatus: "accepted",
        isResource: false,
        role: "REQ-PARTICIPANT",
      },
      {
        address: "room-4@example.com",
        displayName: "Room 4",
        responseStatus: "needsAction",
        isResource: true,
        role: null,
      },
      {
        address: "bob@example.com",
        displayName: null,
        responseStatus: "tentative",
        isResource: false,
        role: "OPT-PARTICIPANT",
      },
    ]);
  });

  it("reads overridden instances with a duration", () => {
    const override = eventAt(entries, 1);

    expect(override.recurrenceId).toEqual({
      kind: "dateTime",
      dateTime: "2024-03-18T09:00:00",
      tzid: "W. Europe Standard Time",
      utc: false,
    });
    expect(override.end).toBeNull();
    expect(override.durationSeconds).toBe(2_700);
    expect(override.description).toBe("Moved to the afternoon");
  });

  it("synthesizes a stable uid when none is given", () => {
    const holiday = eventAt(entries, 3);

    expect(holiday.uidSynthesized).toBe(true);
    expect(holiday.uid).toMatch(/^[0-9a-f]{64}@imported$/);
    expect(eventAt(parseIcsEntries(calendar).entries, 3).uid).toBe(holiday.uid);
    expect(holiday.start).toEqual({ kind: "date", date: "2024-04-01" });
  });

  it("falls back to the first VTIMEZONE", () => {
    const parsed = parseIcsEntries(calendar.replace("X-WR-TIMEZONE:Eastern Standard Time\r\n", ""));
    expect(parsed.calendarTimeZone).toBe("W. Europe Standard Time");
  });

  it("reads UTC times", () => {
    const parsed = parseIcsEntries(
      [
        "BEGIN:VCALENDAR",
        "BEGIN:VEVENT",
        "UID:utc@example.com",
        "DTSTART:20240304T090000Z",
        "END:VEVENT",
        "END:VCALENDAR",
      ].join("\n"),
    );

    expect(eventAt(parsed.entries, 0).start).toEqual({
      kind: "dateTime",
      dateTime: "2024-03-04T09:00:00",
      tzid: null,
      utc: true,
    });
    expect(parsed.calendarTimeZone).toBeNull();
  });
});

describe("parseEventTime", () => {
  function startOf(value: string): SourceEntry {
    const parsed = parseIcsEntries(
      ["BEGIN:VCALENDAR", "BEGIN:VEVENT", "UID:t@example.com", `DTSTART:${value}`, "END:VEVENT", "END:VCALENDAR"].join(
        "\r\n",
      ),
    );
    return parsed.entries[0];
  }

  it("clamps a leap second to the last second of the minute", () => {
    const entry = startOf("20241231T235960Z");

    expect(entry.type === "event" ? entry.event.start : null).toEqual({
      kind: "dateTime",
      dateTime: "2024-12-31T23:59:59",
      tzid: null,
      utc: true,
    });
  });

  it("rejects seconds past a leap second", () => {
    expect(startOf("20240101T100099Z")).toEqual({
      type: "anomaly",
      anomaly: { index: 0, uid: "t@example.com", reason: "unparseable DTSTART '20240101T100099Z'" },
    });
  });

  it("keeps surrounding whitespace of a UID", () => {
    const parsed = parseIcsEntries(
      ["BEGIN:VEVENT", "UID: a@example.com", "DTSTART:20240304T090000Z", "END:VEVENT"].join("\r\n"),
    );

    expect(eventAt(parsed.entries, 0).uid).toBe(" a@example.com");
  });
});

describe("parseDuration", () => {
  it("reads weeks, days and times with a sign", () => {
    expect(parseDuration("P1W")).toBe(604_800);
    expect(parseDuration("P1DT2H")).toBe(93_600);
    expect(parseDuration("-PT1H30M")).toBe(-5_400);
    expect(parseDuration("PT0S")).toBe(0);
  });

  it("rejects empty and malformed durations", () => {
    expect(parseDuration("P")).toBeNull();
    expect(parseDuration("PT")).toBeNull();
    expect(parseDuration("1H")).toBeNull();
  });
});

describe("content lines", () => {
  it("keeps separators inside quoted parameters", () => {
    expect(parseContentLine('ATTENDEE;CN="Doe; Ann: PhD";ROLE=CHAIR:mailto:ann@example.com')).toEqual({
      name: "ATTENDEE",
      params: { CN: "Doe; Ann: PhD", ROLE: "CHAIR" },
      value: "mailto:ann@example.com",
    });
  });

  it("unescapes text values once", () => {
    expect(unescapeText("a\\\\nb\\;c")).toBe("a\\nb;c");
  });
});

describe("findIcsFiles", () => {
  const created: string[] = [];

  afterEach(() => {
    for (const dir of created.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("lists .ics files of a directory in name order", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "ics-import-"));
    created.push(dir);
    for (const name of ["b.ics", "notes.txt", "a.ics", "C.ICS"]) {
      fs.writeFileSync(path.join(dir, name), "BEGIN:VCALENDAR\r\nEND:VCALENDAR\r\n");
    }

    expect(await findIcsFiles(dir)).toEqual([
      path.join(dir, "a.ics"),
      path.join(dir, "b.ics"),
      path.join(dir, "C.ICS"),
    ]);
    expect(await findIcsFiles(path.join(dir, "b.ics"))).toEqual([path.join(dir, "b.ics")]);
  });
});
