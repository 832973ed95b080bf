import { DateTime } from "luxon";
import { z } from "zod";
import type { BusyCalendar, BusyQuery, TimeInterval } from "@showing-desk/domain";
import { requestJson } from "@showing-desk/shared";

const FREE_BUSY_URL = "https://www.googleapis.com/calendar/v3/freeBusy";
const TIMEOUT_MS = 15_000;

const freeBusyResponseSchema = z.object({
  calendars: z.record(
    z.string(),
    z.object({
      busy: z.array(z.object({ start: z.string().datetime({ offset: true }), end: z.string().datetime({ offset: true }) })).default([]),
      errors: z.array(z.object({ domain: z.string().optional(), reason: z.string() })).optional()
    })
  )
});

function rfc3339(date: Date, timezone: string): string {
  return DateTime.fromJSDate(date, { zone: timezone }).toISO({ suppressMilliseconds: true }) ?? date.toISOString();
}

export class GoogleCalendarClient implements BusyCalendar {
  async getBusyIntervals(query: BusyQuery, signal?: AbortSignal): Promise<TimeInterval[]> {
    const raw = await requestJson(
      FREE_BUSY_URL,
      {
        method: "POST",
        headers: {
          Authorization: `Bearer ${query.accessToken}`,
          "Content-Type": "application/json"
        },
        body: JSON.stringify({
          timeMin: rfc3339(query.timeMin, query.timezone),
          timeMax: rfc3339(query.timeMax, query.timezone),
          timeZone: query.timezone,
          items: [{ id: query.calendarId }]
        })
      },
      { service: "Google Calendar", timeoutMs: TIMEOUT_MS, signal }
    );

    const calendar = freeBusyResponseSchema.parse(raw).calendars[query.calendarId];
    if (!calendar) throw new Error(`calendar not found in response for ${query.calendarId}`);

    const firstError = calendar.errors?.[0];
    if (firstError) throw new Error(`calendar error: ${firstError.reason}`);

    return calendar.busy.map((b) => ({ start: new Date(b.start), end: new Date(b.end) }));
  }
}
