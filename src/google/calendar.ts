import type { calendar_v3 } from "googleapis";
import { UpstreamError, ValidationError } from "../errors.js";
import { callGoogle, opt } from "./request.js";
import type {
  CalendarEvent,
  CalendarGateway,
  CalendarInfo,
  EventInput,
  EventTime,
} from "./types.js";

const DATE = /^\d{4}-\d{2}-\d{2}$/;
const DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/i;

/** `YYYY-MM-DD` is an all-day time; anything else must be an RFC 3339 date-time. */
export function parseEventTime(value: string): EventTime {
  const text = value.trim();
  if (DATE.test(text) && !Number.isNaN(Date.parse(text))) {
    return { date: text };
  }
  if (DATE_TIME.test(text) && !Number.isNaN(Date.parse(text))) {
    return { dateTime: text };
  }
  throw new ValidationError(
    `Invalid time '${value}': use RFC 3339 (2025-01-31T09:00:00Z) or YYYY-MM-DD`
  );
}

/** Bound for event list windows; a bare date means midnight UTC. */
export function parseTimeBound(value: string): string {
  const time = parseEventTime(value);
  return "date" in time ? `${time.date}T00:00:00Z` : time.dateTime;
}

function nextDay(date: string): string {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + 1);
  return d.toISOString().slice(0, 10);
}

/** All-day ends are exclusive, so a one-day event ending on its start date is moved a day on. */
export function normalizeAllDayEnd(start: EventTime, end: EventTime): EventTime {
  if ("date" in start && "date" in end && end.date <= start.date) {
    return { date: nextDay(start.date) };
  }
  return end;
}

function timeText(time: calendar_v3.Schema$EventDateTime | null | undefined): string | undefined {
  return opt(time?.dateTime) ?? opt(time?.date);
}

export function toEvent(event: calendar_v3.Schema$Event): CalendarEvent {
  if (!event.id) throw new UpstreamError("Calendar did not return an event ID");
  return {
    id: event.id,
    summary: opt(event.summary),
    start: timeText(event.start),
    end: timeText(event.end),
    description: opt(event.description),
    location: opt(event.location),
    attendees: (event.attendees ?? []).flatMap((a) => (a.email ? [a.email] : [])),
    htmlLink: opt(event.htmlLink),
    status: opt(event.status),
  };
}

function toRequestBody(input: Partial<EventInput>): calendar_v3.Schema$Event {
  const body: calendar_v3.Schema$Event = {};
  if (input.summary !== undefined) body.summary = input.summary;
  if (input.start !== undefined) body.start = input.start;
  if (input.end !== undefined) body.end = input.end;
  if (input.description !== undefined) body.description = input.description;
  if (input.location !== undefined) body.location = input.location;
  if (input.attendees !== undefined) body.attendees = input.attendees.map((email) => ({ email }));
  return body;
}

export class CalendarApi implements CalendarGateway {
  constructor(private readonly calendar: calendar_v3.Calendar) {}

  async listEvents(options: {
    calendarId: string;
    timeMin?: string;
    timeMax?: string;
    limit: number;
  }): Promise<CalendarEvent[]> {
    const res = await callGoogle("Calendar list", () =>
      this.calendar.events.list({
        calendarId: options.calendarId,
        timeMin: options.timeMin ?? new Date().toISOString(),
        timeMax: options.timeMax,
        maxResults: options.limit,
        singleEvents: true,
        orderBy: "startTime",
      })
    );
    return (res.data.items ?? []).map(toEvent);
  }

  async createEvent(calendarId: string, event: EventInput): Promise<CalendarEvent> {
    const res = await callGoogle("Calendar create", () =>
      this.calendar.events.insert({ calendarId, requestBody: toRequestBody(event) })
    );
    return toEvent(res.data);
  }

  async updateEvent(
    calendarId: string,
    eventId: string,
    patch: Partial<EventInput>
  ): Promise<CalendarEvent> {
    const res = await callGoogle("Calendar update", () =>
      this.calendar.events.patch({ calendarId, eventId, requestBody: toRequestBody(patch) })
    );
    return toEvent(res.data);
  }

  async deleteEvent(calendarId: string, eventId: string): Promise<void> {
    await callGoogle("Calendar delete", () => this.calendar.events.delete({ calendarId, eventId }));
  }

  async listCalendars(): Promise<CalendarInfo[]> {
    const res = await callGoogle("Calendar list calendars", () =>
      this.calendar.calendarList.list()
    );
    return (res.data.items ?? []).flatMap((c) =>
      c.id
        ? [
            {
              id: c.id,
              summary: opt(c.summary),
              primary: c.primary === true,
              accessRole: opt(c.accessRole),
              timeZone: opt(c.timeZone),
            },
          ]
        : []
    );
  }
}
