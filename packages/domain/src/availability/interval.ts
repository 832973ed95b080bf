import type { TimeInterval } from "./types";

// Half-open: [09:00, 09:30) and [09:30, 10:00) touch but do not overlap.
export function overlaps(a: TimeInterval, b: TimeInterval): boolean {
  return a.start.getTime() < b.end.getTime() && a.end.getTime() > b.start.getTime();
}

export function overlapsAny(slot: TimeInterval, busy: readonly TimeInterval[]): boolean {
  return busy.some((b) => overlaps(slot, b));
}
