import { addDays, differenceInCalendarDays, eachDayOfInterval, format, formatISO, getDay, isValid, parseISO } from "date-fns";
import type { DateRange, IsoDate, Weekday } from "../types.js";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && isValid(parseISO(value));
}

export function toIsoDate(date: Date): IsoDate {
  return formatISO(date, { representation: "date" });
}

export function shiftDate(date: IsoDate, days: number): IsoDate {
  return toIsoDate(addDays(parseISO(date), days));
}

export const WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6];

export function isWeekday(value: number): value is Weekday {
  return WEEKDAYS.some((d) => d === value);
}

export function weekdayOf(date: IsoDate): Weekday {
  return WEEKDAYS[getDay(parseISO(date))];
}

export function datesIn(range: DateRange): IsoDate[] {
  if (range.from > range.to) return [];
  return eachDayOfInterval({ start: parseISO(range.from), end: parseISO(range.to) }).map(toIsoDate);
}

/** Number of calendar days covered by an inclusive range. */
export function daysIn(range: DateRange): number {
  return Math.max(0, differenceInCalendarDays(parseISO(range.to), parseISO(range.from)) + 1);
}

export function formatDay(date: IsoDate): string {
  return format(parseISO(date), "EEE, MMM d");
}
