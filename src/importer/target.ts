import type { NormalizedEvent } from "./types.js";

export interface ImportedEvent {
  id: string;
}

/** Where normalized events are committed. Implementations must not notify attendees. */
export interface ImportTarget {
  readonly name: string;
  importEvent(calendarId: string, event: NormalizedEvent): Promise<ImportedEvent>;
  /** Stable id → remote event id for everything already on the calendar. */
  listExistingKeys(calendarId: string): Promise<Map<string, string>>;
  getDefaultTimeZone(calendarId: string): Promise<string | undefined>;
}
