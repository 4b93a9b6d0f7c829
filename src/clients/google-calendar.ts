import type pino from "pino";
import { requestJson } from "../http.js";
import { type RetryPolicy, withRetry } from "../retry.js";

const API_BASE = "https://www.googleapis.com/calendar/v3";

export interface GoogleEventDateTime {
  date?: string;
  dateTime?: string;
  timeZone?: string;
}

export interface GoogleAttendee {
  email: string;
  displayName?: string;
  responseStatus?: "accepted" | "declined" | "tentative" | "needsAction";
  optional?: boolean;
  resource?: boolean;
}

export interface GoogleImportEventInput {
  iCalUID: string;
  summary: string;
  description?: string;
  location?: string;
  start: GoogleEventDateTime;
  end: GoogleEventDateTime;
  originalStartTime?: GoogleEventDateTime;
  organizer?: { email: string; displayName?: string };
  attendees?: GoogleAttendee[];
  recurrence?: string[];
  status?: "confirmed" | "tentative" | "cancelled";
  transparency?: "opaque" | "transparent";
  visibility?: "default" | "private" | "confidential";
  sequence?: number;
  reminders?: {
    useDefault: boolean;
    overrides?: Array<{ method: "popup" | "email"; minutes: number }>;
  };
  extendedProperties: {
    private: Record<string, string>;
  };
}

export interface GoogleEvent {
  id: string;
  iCalUID?: string;
  etag?: string;
  extendedProperties?: {
    private?: Record<string, string>;
  };
}

export interface GoogleCalendar {
  id: string;
  summary?: string;
  timeZone?: string;
}

export interface GoogleCalendarListEntry extends GoogleCalendar {
  primary?: boolean;
  accessRole?: string;
}

interface GoogleEventListPage {
  items?: GoogleEvent[];
  nextPageToken?: string;
}

interface GoogleCalendarListPage {
  items?: GoogleCalendarListEntry[];
  nextPageToken?: string;
}

export class GoogleCalendarClient {
  constructor(
    private readonly getAccessToken: () => Promise<string>,
    private readonly logger: pino.Logger,
    private readonly readRetryPolicy: RetryPolicy,
  ) {}

  /**
   * `events.import` never sends invitations or updates to attendees. Not retried
   * here: the caller owns the retry policy for writes.
   */
  async importEvent(calendarId: string, event: GoogleImportEventInput): Promise<GoogleEvent> {
    const url = `${API_BASE}/calendars/${encodeURIComponent(calendarId)}/events/import`;
    return this.request<GoogleEvent>(url, "POST", event);
  }

  async getCalendar(calendarId: string): Promise<GoogleCalendar> {
    const url = `${API_BASE}/calendars/${encodeURIComponent(calendarId)}`;
    return withRetry(this.logger, "google_get_calendar", this.readRetryPolicy, () =>
      this.request<GoogleCalendar>(url, "GET"),
    );
  }

  async listCalendars(): Promise<GoogleCalendarListEntry[]> {
    const results: GoogleCalendarListEntry[] = [];
    let pageToken: string | undefined;

    do {
      const url = new URL(`${API_BASE}/users/me/calendarList`);
      url.searchParams.set("fields", "items(id,summary,primary,timeZone,accessRole),nextPageToken");
      if (pageToken) {
        url.searchParams.set("pageToken", pageToken);
      }

      const page = await withRetry(this.logger, "google_list_calendars", this.readRetryPolicy, () =>
        this.request<GoogleCalendarListPage>(url.toString(), "GET"),
      );
      results.push(...(page.items ?? []));
      pageToken = page.nextPageToken;
    } while (pageToken);

    return results;
  }

  async listEventKeys(calendarId: string): Promise<GoogleEvent[]> {
    const encodedCalendarId = encodeURIComponent(calendarId);
    const results: GoogleEvent[] = [];
    let pageToken: string | undefined;

    do {
      const url = new URL(`${API_BASE}/calendars/${encodedCalendarId}/events`);
      url.searchParams.set("maxResults", "2500");
      url.searchParams.set("showDeleted", "false");
      url.searchParams.set("singleEvents", "false");
      url.searchParams.set("fields", "items(id,iCalUID,extendedProperties),nextPageToken");
      if (pageToken) {
        url.searchParams.set("pageToken", pageToken);
      }

      const page = await withRetry(this.logger, "google_list_event_keys", this.readRetryPolicy, () =>
        this.request<GoogleEventListPage>(url.toString(), "GET"),
      );
      results.push(...(page.items ?? []));
      pageToken = page.nextPageToken;
      this.logger.debug({ calendarId, fetched: results.length }, "Fetched existing event page");
    } while (pageToken);

    return results;
  }

  private async request<T>(url: string, method: "GET" | "POST", body?: unknown): Promise<T> {
    const token = await this.getAccessToken();
    return requestJson<T>(url, {
      method,
      headers: {
        Authorization: `Bearer ${token}`,
        ...(body ? { "Content-Type": "application/json" } : {}),
      },
      ...(body ? { body: JSON.stringify(body) } : {}),
    });
  }
}
