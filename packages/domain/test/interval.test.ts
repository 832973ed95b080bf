import { describe, expect, it } from "vitest";
import { overlaps, overlapsAny } from "../src/availability/interval";

const at = (hhmm: string) => new Date(`2026-02-02T${hhmm}:00.000Z`);

describe("overlaps", () => {
  it("treats intervals as half-open", () => {
    const slot = { start: at("09:30"), end: at("10:00") };
    expect(overlaps(slot, { start: at("09:00"), end: at("09:30") })).toBe(false);
    expect(overlaps(slot, { start: at("10:00"), end: at("10:30") })).toBe(false);
    expect(overlaps(slot, { start: at("09:59"), end: at("10:30") })).toBe(true);
    expect(overlaps(slot, { start: at("09:00"), end: at("11:00") })).toBe(true);
  });

  it("checks a list of busy intervals", () => {
    const slot = { start: at("09:30"), end: at("10:00") };
    expect(overlapsAny(slot, [])).toBe(false);
    expect(overlapsAny(slot, [{ start: at("08:00"), end: at("08:30") }, { start: at("09:45"), end: at("09:50") }])).toBe(true);
  });
});
