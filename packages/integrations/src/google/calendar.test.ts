import { afterEach, describe, expect, it, vi } from "vitest";
import { GoogleCalendarClient } from "./calendar";

const client = new GoogleCalendarClient();
const query = {
  accessToken: "test-token",
  calendarId: "elizabeth@leasing.example.com",
  timeMin: new Date("2026-02-02T16:00:00.000Z"),
  timeMax: new Date("2026-02-09T16:00:00.000Z"),
  timezone: "America/Los_Angeles"
};

function stubFetch(status: number, body: unknown) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(JSON.stringify(body), { status }));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("GoogleCalendarClient", () => {
  it("requests free/busy for the agent in the showing timezone", async () => {
    const fetchMock = stubFetch(200, {
      calendars: {
        "elizabeth@leasing.example.com": {
          busy: [{ start: "2026-02-02T17:00:00Z", end: "2026-02-02T17:30:00+00:00" }]
        }
      }
    });

    const busy = await client.getBusyIntervals(query);

    expect(busy).toEqual([{ start: new Date("2026-02-02T17:00:00.000Z"), end: new Date("2026-02-02T17:30:00.000Z") }]);
    const [url, init] = fetchMock.mock.calls[0]!;
    expect(url).toBe("https://www.googleapis.com/calendar/v3/freeBusy");
    expect(init?.headers).toEqual({ Authorization: "Bearer test-token", "Content-Type": "application/json" });
    expect(JSON.parse(String(init?.body))).toEqual({
      timeMin: "2026-02-02T08:00:00-08:00",
      timeMax: "2026-02-09T08:00:00-08:00",
      timeZone: "America/Los_Angeles",
      items: [{ id: "elizabeth@leasing.example.com" }]
    });
  });

  it("reports per-calendar errors", async () => {
    stubFetch(200, {
      calendars: { "elizabeth@leasing.example.com": { busy: [], errors: [{ domain: "global", reason: "notFound" }] } }
    });
    await expect(client.getBusyIntervals(query)).rejects.toThrow("calendar error: notFound");
  });

  it("fails when the calendar is missing from the response", async () => {
    stubFetch(200, { calendars: {} });
    await expect(client.getBusyIntervals(query)).rejects.toThrow(
      "calendar not found in response for elizabeth@leasing.example.com"
    );
  });

  it("fails on an auth error", async () => {
    stubFetch(401, { error: { code: 401 } });
    await expect(client.getBusyIntervals(query)).rejects.toThrow(/Google Calendar API error: 401/);
  });
});
