// Boundary to the external calendar. Times are UTC ISO strings.
export interface CalendarEventInput {
  summary: string;
  description: string;
  location?: string;
  start: string;
  end: string;
  reminderMinutes: number[];
  properties: Record<string, string>; // private extended properties
}

export interface CalendarEventRecord {
  id: string;
  summary?: string;
  location?: string;
  start?: string;
  end?: string;
  properties: Record<string, string>;
}

export interface ListEventsQuery {
  properties: Record<string, string>; // every pair must match
  timeMin: string;
  timeMax: string;
}

export interface CalendarProvider {
  listEvents(query: ListEventsQuery): Promise<CalendarEventRecord[]>;
  insertEvent(event: CalendarEventInput): Promise<CalendarEventRecord>;
  patchEvent(id: string, event: CalendarEventInput): Promise<CalendarEventRecord>;
}
