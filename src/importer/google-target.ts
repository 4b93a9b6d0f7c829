import type { GoogleCalendarClient } from "../clients/google-calendar.js";
import { importKeyOf, toGoogleImportPayload } from "./mapper.js";
import type { ImportTarget, ImportedEvent } from "./target.js";
import type { NormalizedEvent } from "./types.js";

export class GoogleImportTarget implements ImportTarget {
  readonly name = "google";

  constructor(private readonly googleClient: GoogleCalendarClient) {}

  async importEvent(calendarId: string, event: NormalizedEvent): Promise<ImportedEvent> {
    const imported = await this.googleClient.importEvent(calendarId, toGoogleImportPayload(event));
    return { id: imported.id };
  }

  async listExistingKeys(calendarId: string): Promise<Map<string, string>> {
    const events = await this.googleClient.listEventKeys(calendarId);
    const keys = new Map<string, string>();
    for (const event of events) {
      const key = importKeyOf(event);
      if (key && !keys.has(key)) {
        keys.set(key, event.id);
      }
    }
    return keys;
  }

  async getDefaultTimeZone(calendarId: string): Promise<string | undefined> {
    const calendar = await this.googleClient.getCalendar(calendarId);
    return calendar.timeZone;
  }
}
