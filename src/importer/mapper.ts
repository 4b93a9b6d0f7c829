import type { GoogleEvent, GoogleImportEventInput } from "../clients/google-calendar.js";
import { escapeUid } from "./stable-id.js";
import type { NormalizedEvent } from "./types.js";

const APP_MARKER = "ics-calendar-import";
const IMPORT_KEY_PROPERTY = "import_key";

export function toGoogleImportPayload(event: NormalizedEvent): GoogleImportEventInput {
  return {
    iCalUID: event.iCalUid,
    summary: event.summary,
    description: event.description,
    location: event.location,
    start: event.start,
    end: event.end,
    originalStartTime: event.originalStartTime,
    organizer: event.organizer,
    attendees: event.attendees.length > 0 ? event.attendees : undefined,
    recurrence: event.recurrence.length > 0 ? event.recurrence : undefined,
    status: event.status,
    transparency: event.transparency,
    visibility: event.visibility,
    sequence: event.sequence,
    reminders:
      event.reminders.length > 0
        ? { useDefault: false, overrides: event.reminders }
        : { useDefault: true },
    extendedProperties: {
      private: {
        app: APP_MARKER,
        [IMPORT_KEY_PROPERTY]: event.stableId,
        source_uid: event.iCalUid,
      },
    },
  };
}

/**
 * The key an event already on the calendar is known by: our own marker when we
 * imported it, otherwise the stable id of a series with its iCalUID.
 */
export function importKeyOf(event: GoogleEvent): string | undefined {
  const marked = event.extendedProperties?.private?.[IMPORT_KEY_PROPERTY];
  if (marked) {
    return marked;
  }
  return event.iCalUID === undefined ? undefined : escapeUid(event.iCalUID);
}
