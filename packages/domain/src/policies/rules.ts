import type { DateTime } from "luxon";

export const SHOWING_TIMEZONE = "America/Los_Angeles";
export const SLOT_MINUTES = 30;
export const LEAD_TIME_MINUTES = 120;
export const WINDOW_DAYS = 7;
export const MAX_RETURNED_SLOTS = 30;

const DAY_START = { hour: 9, minute: 0 };
const DAY_END = { hour: 17, minute: 0 };
const FRIDAY_END = { hour: 15, minute: 30 };

export function minimumStart(now: Date, leadTimeMinutes = LEAD_TIME_MINUTES): Date {
  return new Date(now.getTime() + leadTimeMinutes * 60_000);
}

export function isWeekend(day: DateTime): boolean {
  return day.weekday === 6 || day.weekday === 7;
}

export function showingHours(day: DateTime): { start: DateTime; end: DateTime } {
  const end = day.weekday === 5 ? FRIDAY_END : DAY_END;
  return {
    start: day.set({ ...DAY_START, second: 0, millisecond: 0 }),
    end: day.set({ ...end, second: 0, millisecond: 0 })
  };
}

/** Rounds up to the next slot boundary on the local clock; boundaries are kept. */
export function roundUpToSlot(time: DateTime, slotMinutes = SLOT_MINUTES): DateTime {
  const floored = time.set({ minute: time.minute - (time.minute % slotMinutes), second: 0, millisecond: 0 });
  return floored.toMillis() === time.toMillis() ? time : floored.plus({ minutes: slotMinutes });
}
