import { ScheduleError } from "./errors.js";
import type { CareWindow, Slot } from "../types.js";

export const SLOTS_PER_DAY = 96;
export const MINUTES_PER_SLOT = 15;

export const SLOTS = {
  MIDNIGHT: 0,
  SIX_AM: 24,
  SEVEN_AM: 28,
  EIGHT_AM: 32,
  NINE_AM: 36,
  NOON: 48,
  THREE_PM: 60,
  FIVE_PM: 68,
  SIX_PM: 72,
  SEVEN_THIRTY_PM: 78,
  EIGHT_PM: 80,
  NINE_PM: 84,
  END_OF_DAY: 96
} as const;

export const DEFAULT_CARE_WINDOW: CareWindow = { start: SLOTS.SEVEN_AM, end: SLOTS.SEVEN_THIRTY_PM };

/** Callers bound-check hour and minute; this only does the arithmetic. */
export function slotFromTime(hour: number, minute: number): Slot {
  return Math.floor((hour * 60 + minute) / MINUTES_PER_SLOT);
}

/** Out-of-range slots are clamped to [0, 96], not rejected. */
export function timeFromSlot(slot: Slot): { hour: number; minute: number } {
  const clamped = Math.max(0, Math.min(SLOTS_PER_DAY, slot));
  const totalMinutes = clamped * MINUTES_PER_SLOT;
  return { hour: Math.floor(totalMinutes / 60), minute: totalMinutes % 60 };
}

export function roundedSlot(hour: number, minute: number): Slot {
  const roundedMinute = Math.floor((minute + 7) / 15) * 15;
  const adjustedHour = hour + Math.floor(roundedMinute / 60);
  return slotFromTime(adjustedHour, roundedMinute % 60);
}

export function isValidSlot(slot: Slot): boolean {
  return Number.isInteger(slot) && slot >= 0 && slot <= SLOTS_PER_DAY;
}

export function isValidRange(start: Slot, end: Slot): boolean {
  return isValidSlot(start) && isValidSlot(end) && start < end;
}

export function assertValidRange(start: Slot, end: Slot): void {
  if (!isValidRange(start, end)) {
    throw new ScheduleError("InvalidRange", `Invalid slot range ${start}-${end}`);
  }
}

/** Throws InvalidRange rather than returning a zero or negative duration. */
export function durationMinutes(start: Slot, end: Slot): number {
  assertValidRange(start, end);
  return (end - start) * MINUTES_PER_SLOT;
}

export function durationHours(start: Slot, end: Slot): number {
  return durationMinutes(start, end) / 60;
}

export function formatSlot(slot: Slot): string {
  const { hour, minute } = timeFromSlot(slot);
  const h = hour % 24;
  const displayHour = h === 0 ? 12 : h > 12 ? h - 12 : h;
  const period = h < 12 ? "AM" : "PM";
  return `${displayHour}:${String(minute).padStart(2, "0")} ${period}`;
}

export function formatSlotRange(start: Slot, end: Slot): string {
  return `${formatSlot(start)} - ${formatSlot(end)}`;
}

// Care window

export function validateCareWindow(window: CareWindow): CareWindow {
  if (!isValidRange(window.start, window.end)) {
    throw new ScheduleError("InvalidRange", `Invalid care window ${window.start}-${window.end}`);
  }
  return { start: window.start, end: window.end };
}

export function isWithinCareWindow(start: Slot, end: Slot, window: CareWindow = DEFAULT_CARE_WINDOW): boolean {
  return start >= window.start && end <= window.end;
}

/** Intersection of the range with the window, or null when they do not overlap. */
export function clampToCareWindow(
  start: Slot,
  end: Slot,
  window: CareWindow = DEFAULT_CARE_WINDOW
): { start: Slot; end: Slot } | null {
  const clampedStart = Math.max(start, window.start);
  const clampedEnd = Math.min(end, window.end);
  if (clampedStart >= clampedEnd) return null;
  return { start: clampedStart, end: clampedEnd };
}

export function careWindowHours(window: CareWindow): number {
  return durationHours(window.start, window.end);
}
