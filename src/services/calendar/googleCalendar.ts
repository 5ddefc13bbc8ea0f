import fs from "fs/promises";
import { google, type calendar_v3 } from "googleapis";
import type { CalendarConfig } from "../../config.js";
import { SyncError, errorMessage, toSyncError } from "../../errors.js";
import { isRecord, pick, readString } from "../fixtures/guards.js";
import { parseUtcTimestamp } from "../fixtures/timestamps.js";
import type {
  CalendarEventInput,
  CalendarEventRecord,
  CalendarProvider,
  ListEventsQuery,
} from "./provider.js";

const SCOPES = ["https://www.googleapis.com/auth/calendar"];

export function toGoogleEvent(event: CalendarEventInput): calendar_v3.Schema$Event {
  return {
    summary: event.summary,
    description: event.description,
    location: event.location,
    start: { dateTime: event.start, timeZone: "UTC" },
    end: { dateTime: event.end, timeZone: "UTC" },
    reminders: {
      useDefault: false,
      overrides: event.reminderMinutes.map((minutes) => ({ method: "popup", minutes })),
    },
    extendedProperties: { private: event.properties },
  };
}

export function fromGoogleEvent(event: calendar_v3.Schema$Event): CalendarEventRecord {
  const id = readString(event.id);
  if (!id) {
    throw new SyncError("Google Calendar returned an event without an id", "provider_unavailable");
  }

  const properties: Record<string, string> = {};
  for (const [key, value] of Object.entries(event.extendedProperties?.private ?? {})) {
    if (typeof value === "string") properties[key] = value;
  }

  return {
    id,
    summary: event.summary ?? undefined,
    location: event.location ?? undefined,
    start: parseUtcTimestamp(event.start?.dateTime),
    end: parseUtcTimestamp(event.end?.dateTime),
    properties,
  };
}

export class GoogleCalendarProvider implements CalendarProvider {
  constructor(
    private readonly client: calendar_v3.Calendar,
    private readonly calendarId: string,
    private readonly timeoutMs: number
  ) {}

  async listEvents(query: ListEventsQuery): Promise<CalendarEventRecord[]> {
    const records: CalendarEventRecord[] = [];
    let pageToken: string | undefined;

    try {
      do {
        const res = await this.client.events.list(
          {
            calendarId: this.calendarId,
            privateExtendedProperty: Object.entries(query.properties).map(([k, v]) => `${k}=${v}`),
            singleEvents: true,
            timeMin: query.timeMin,
            timeMax: query.timeMax,
            maxResults: 250,
            pageToken,
          },
          { timeout: this.timeoutMs }
        );
        for (const item of res.data.items ?? []) {
          records.push(fromGoogleEvent(item));
        }
        pageToken = res.data.nextPageToken ?? undefined;
      } while (pageToken);
    } catch (error) {
      throw toSyncError("events.list", error);
    }

    return records;
  }

  async insertEvent(event: CalendarEventInput): Promise<CalendarEventRecord> {
    try {
      const res = await this.client.events.insert(
        { calendarId: this.calendarId, requestBody: toGoogleEvent(event) },
        { timeout: this.timeoutMs }
      );
      return fromGoogleEvent(res.data);
    } catch (error) {
      throw toSyncError("events.insert", error);
    }
  }

  async patchEvent(id: string, event: CalendarEventInput): Promise<CalendarEventRecord> {
    try {
      const res = await this.client.events.patch(
        { calendarId: this.calendarId, eventId: id, requestBody: toGoogleEvent(event) },
        { timeout: this.timeoutMs }
      );
      return fromGoogleEvent(res.data);
    } catch (error) {
      throw toSyncError("events.patch", error);
    }
  }
}

async function readJsonFile(filePath: string, label: string): Promise<unknown> {
  try {
    const raw: unknown = JSON.parse(await fs.readFile(filePath, "utf8"));
    return raw;
  } catch (error) {
    throw new SyncError(`Could not read ${label} at ${filePath}: ${errorMessage(error)}`, "auth_failure", {
      cause: error,
    });
  }
}

// OAuth client from an installed-app credentials file plus a saved token
async function createOAuthClient(credentialsPath: string, tokenPath: string) {
  const credentials = await readJsonFile(credentialsPath, "OAuth credentials");
  const installed = isRecord(credentials) ? (credentials.installed ?? credentials.web) : undefined;
  const clientId = readString(pick(installed, "client_id"));
  const clientSecret = readString(pick(installed, "client_secret"));
  const redirectUri = readString(pick(installed, "redirect_uris", 0));
  if (!clientId || !clientSecret) {
    throw new SyncError(`OAuth credentials at ${credentialsPath} have no client id/secret`, "auth_failure");
  }

  const token = await readJsonFile(tokenPath, "OAuth token");
  if (!isRecord(token)) {
    throw new SyncError(`OAuth token at ${tokenPath} is not an object`, "auth_failure");
  }

  const client = new google.auth.OAuth2(clientId, clientSecret, redirectUri);
  client.setCredentials({
    access_token: readString(token.access_token) ?? readString(token.token),
    refresh_token: readString(token.refresh_token),
    token_type: readString(token.token_type),
    expiry_date: typeof token.expiry_date === "number" ? token.expiry_date : undefined,
  });
  return client;
}

// Service account key file, then OAuth credentials + token, then
// application default credentials
export async function createCalendarProvider(
  config: CalendarConfig,
  timeoutMs: number
): Promise<CalendarProvider> {
  let client: calendar_v3.Calendar;

  if (config.serviceAccountPath) {
    console.log("[Calendar] Using service account credentials");
    const auth = new google.auth.JWT({ keyFile: config.serviceAccountPath, scopes: SCOPES });
    client = google.calendar({ version: "v3", auth });
  } else if (config.credentialsPath) {
    console.log("[Calendar] Using OAuth credentials and saved token");
    const auth = await createOAuthClient(config.credentialsPath, config.tokenPath);
    client = google.calendar({ version: "v3", auth });
  } else {
    console.log("[Calendar] Using application default credentials");
    const auth = new google.auth.GoogleAuth({ scopes: SCOPES });
    client = google.calendar({ version: "v3", auth });
  }

  return new GoogleCalendarProvider(client, config.calendarId, timeoutMs);
}
