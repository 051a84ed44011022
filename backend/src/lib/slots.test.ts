import { describe, expect, it } from "vitest";
import { ScheduleError } from "./errors.js";
import { errorOf } from "./testing.js";
import {
  clampToCareWindow,
  DEFAULT_CARE_WINDOW,
  durationHours,
  durationMinutes,
  formatSlot,
  formatSlotRange,
  isValidRange,
  isValidSlot,
  isWithinCareWindow,
  roundedSlot,
  slotFromTime,
  SLOTS,
  timeFromSlot,
  validateCareWindow
} from "./slots.js";

describe("slot clock", () => {
  it("round-trips every slot of the day", () => {
    for (let slot = 0; slot <= 96; slot++) {
      const { hour, minute } = timeFromSlot(slot);
      expect(slotFromTime(hour, minute)).toBe(slot);
    }
  });

  it("names the common slots", () => {
    expect(slotFromTime(8, 0)).toBe(SLOTS.EIGHT_AM);
    expect(slotFromTime(12, 0)).toBe(SLOTS.NOON);
    expect(slotFromTime(19, 30)).toBe(SLOTS.SEVEN_THIRTY_PM);
  });

  it("clamps out-of-range slots when converting back to a time", () => {
    expect(timeFromSlot(100)).toEqual({ hour: 24, minute: 0 });
    expect(timeFromSlot(-3)).toEqual({ hour: 0, minute: 0 });
  });

  it("rounds to the nearest quarter hour", () => {
    expect(roundedSlot(8, 7)).toBe(32);
    expect(roundedSlot(8, 10)).toBe(33);
    expect(roundedSlot(8, 53)).toBe(36);
  });

  it("validates slots and ranges", () => {
    expect(isValidSlot(96)).toBe(true);
    expect(isValidSlot(97)).toBe(false);
    expect(isValidSlot(1.5)).toBe(false);
    expect(isValidRange(10, 10)).toBe(false);
    expect(isValidRange(0, 96)).toBe(true);
  });

  it("measures durations", () => {
    expect(durationMinutes(28, 78)).toBe(750);
    expect(durationHours(28, 78)).toBe(12.5);
  });

  it("refuses to measure an invalid range", () => {
    expect(() => durationMinutes(40, 40)).toThrow(ScheduleError);
    const err = errorOf(() => durationHours(50, 40));
    expect(err).toBeInstanceOf(ScheduleError);
    expect(err).toMatchObject({ code: "InvalidRange" });
  });

  it("formats slots as clock times", () => {
    expect(formatSlot(0)).toBe("12:00 AM");
    expect(formatSlot(32)).toBe("8:00 AM");
    expect(formatSlot(48)).toBe("12:00 PM");
    expect(formatSlot(78)).toBe("7:30 PM");
    expect(formatSlot(96)).toBe("12:00 AM");
    expect(formatSlotRange(32, 48)).toBe("8:00 AM - 12:00 PM");
  });
});

describe("care window", () => {
  it("defaults to 7:00 AM - 7:30 PM", () => {
    expect(DEFAULT_CARE_WINDOW).toEqual({ start: 28, end: 78 });
  });

  it("checks containment", () => {
    expect(isWithinCareWindow(28, 78)).toBe(true);
    expect(isWithinCareWindow(24, 40)).toBe(false);
    expect(isWithinCareWindow(24, 40, { start: 20, end: 60 })).toBe(true);
  });

  it("clamps to the window or reports an empty intersection", () => {
    expect(clampToCareWindow(24, 88)).toEqual({ start: 28, end: 78 });
    expect(clampToCareWindow(0, 20)).toBeNull();
    expect(clampToCareWindow(78, 90)).toBeNull();
  });

  it("rejects an inverted window", () => {
    expect(() => validateCareWindow({ start: 60, end: 30 })).toThrow("Invalid care window 60-30");
  });
});
