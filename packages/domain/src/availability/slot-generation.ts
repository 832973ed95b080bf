import { DateTime, Info } from "luxon";
import type { Logger } from "@showing-desk/shared";
import {
  isWeekend,
  LEAD_TIME_MINUTES,
  minimumStart,
  roundUpToSlot,
  SHOWING_TIMEZONE,
  showingHours,
  SLOT_MINUTES,
  WINDOW_DAYS
} from "../policies/rules";
import { overlapsAny } from "./interval";
import type { SlotGenerationResult, TimeInterval, TimeSlot } from "./types";

export type SlotGenerationOptions = {
  timezone?: string;
  logger?: Logger;
};

export function resolveTimezone(timezone: string, logger?: Logger): string {
  if (Info.isValidIANAZone(timezone)) return timezone;
  logger?.warn("timezone_load_failed", { timezone, fallback: "UTC" });
  return "UTC";
}

function toSlot(start: DateTime, end: DateTime): TimeSlot {
  return {
    date: start.toFormat("EEEE, MMMM d, yyyy"),
    time: start.toFormat("h:mm a"),
    start: start.toJSDate(),
    end: end.toJSDate()
  };
}

/**
 * Free 30-minute showing slots over the seven calendar days starting on the
 * reference day. `totalSlots` counts every candidate, busy or not.
 */
export function generateShowingSlots(
  busy: readonly TimeInterval[],
  referenceTime: Date,
  options: SlotGenerationOptions = {}
): SlotGenerationResult {
  const zone = resolveTimezone(options.timezone ?? SHOWING_TIMEZONE, options.logger);
  const minStart = DateTime.fromJSDate(minimumStart(referenceTime, LEAD_TIME_MINUTES), { zone });
  const searchStart = DateTime.fromJSDate(referenceTime, { zone }).setLocale("en-US");

  const freeSlots: TimeSlot[] = [];
  let daysChecked = 0;
  let totalSlots = 0;

  for (let d = 0; d < WINDOW_DAYS; d++) {
    const day = searchStart.plus({ days: d });
    if (isWeekend(day)) continue;
    daysChecked++;

    const hours = showingHours(day);
    let workStart = hours.start;
    const workEnd = hours.end;

    if (workStart < minStart) {
      workStart = roundUpToSlot(minStart.setLocale("en-US"));
      if (workStart > workEnd) continue;
    }

    let cursor = workStart;
    while (cursor.plus({ minutes: SLOT_MINUTES }) <= workEnd) {
      const slotEnd = cursor.plus({ minutes: SLOT_MINUTES });
      if (!overlapsAny({ start: cursor.toJSDate(), end: slotEnd.toJSDate() }, busy)) {
        freeSlots.push(toSlot(cursor, slotEnd));
      }
      totalSlots++;
      cursor = slotEnd;
    }
  }

  return { freeSlots, daysChecked, totalSlots };
}
