import type { RawEvent, RawEventTime } from "./types.js";

const INSTANCE_SEPARATOR = "::";

function recurrenceToken(time: RawEventTime): string {
  if (time.kind === "date") {
    return time.date.replace(/-/g, "");
  }
  const compact = time.dateTime.replace(/[-:]/g, "");
  return time.utc ? `${compact}Z` : compact;
}

/** Percent-escapes `%` and `:` so an escaped UID never contains the instance separator. */
export function escapeUid(uid: string): string {
  return uid.replace(/%/g, "%25").replace(/:/g, "%3A");
}

/**
 * The idempotency key of a source event. A series (or a single event) is keyed
 * by its escaped UID; an overridden instance adds its RECURRENCE-ID so that it
 * does not collide with the series it belongs to. The UID is used verbatim, so
 * two events share a key only when they share a UID.
 */
export function stableIdFor(event: Pick<RawEvent, "uid" | "recurrenceId">): string {
  const uid = escapeUid(event.uid);
  if (!event.recurrenceId) {
    return uid;
  }
  return `${uid}${INSTANCE_SEPARATOR}${recurrenceToken(event.recurrenceId)}`;
}
