import { ScheduleError } from "./errors.js";
import { datesIn, isIsoDate, isWeekday, shiftDate, weekdayOf } from "./dates.js";
import { createBlock, proposeAdd, proposeReassign, proposeRemove, proposeRetime, type ProposalMeta } from "./proposals.js";
import { sameBlock } from "./store.js";
import { isValidRange } from "./slots.js";
import type { ChangeProposal, DateRange, IsoDate, RecurrencePattern, TimeBlock, Weekday } from "../types.js";

export const occurrenceId = (patternId: string, date: IsoDate) => `${patternId}@${date}`;

function assertValidPattern(pattern: RecurrencePattern): void {
  const invalid = (why: string) => new ScheduleError("InvalidPattern", `Pattern ${pattern.id}: ${why}`);
  if (!pattern.id) throw invalid("missing id");
  if (!isValidRange(pattern.startSlot, pattern.endSlot)) {
    throw invalid(`invalid slot range ${pattern.startSlot}-${pattern.endSlot}`);
  }
  if (!pattern.weekdays.every(d => isWeekday(d))) throw invalid("weekdays must be 0 (Sunday) to 6 (Saturday)");
  if (!isIsoDate(pattern.startDate)) throw invalid(`invalid start date "${pattern.startDate}"`);
  if (pattern.endDate !== undefined) {
    if (!isIsoDate(pattern.endDate)) throw invalid(`invalid end date "${pattern.endDate}"`);
    if (pattern.endDate < pattern.startDate) throw invalid("end date is before start date");
  }
}

/**
 * Materialises the pattern's occurrences inside `within`. Ids are derived
 * from pattern id and date, so expanding twice yields equal blocks.
 */
export function expand(pattern: RecurrencePattern, within: DateRange): TimeBlock[] {
  assertValidPattern(pattern);
  const from = pattern.startDate > within.from ? pattern.startDate : within.from;
  const to = pattern.endDate !== undefined && pattern.endDate < within.to ? pattern.endDate : within.to;
  const weekdays = new Set<Weekday>(pattern.weekdays);
  if (weekdays.size === 0) return [];

  return datesIn({ from, to })
    .filter(date => weekdays.has(weekdayOf(date)))
    .map(date =>
      createBlock({
        id: occurrenceId(pattern.id, date),
        date,
        startSlot: pattern.startSlot,
        endSlot: pattern.endSlot,
        provider: pattern.provider,
        notes: pattern.notes,
        seriesId: pattern.id
      })
    );
}

/**
 * Proposals that bring the series' blocks inside `within` in line with the
 * pattern. Occurrences that already match produce nothing; occurrences the
 * pattern no longer yields are removed.
 */
export function seriesChanges(
  pattern: RecurrencePattern,
  within: DateRange,
  current: readonly TimeBlock[],
  meta: ProposalMeta = {}
): ChangeProposal[] {
  const wanted = expand(pattern, within);
  const wantedIds = new Set(wanted.map(b => b.id));
  const existing = new Map(current.map(b => [b.id, b]));
  const changes: ChangeProposal[] = [];

  for (const block of current) {
    const inWindow = block.date >= within.from && block.date <= within.to;
    if (block.seriesId === pattern.id && inWindow && !wantedIds.has(block.id)) {
      changes.push(proposeRemove(block, meta));
    }
  }

  for (const block of wanted) {
    const found = existing.get(block.id);
    if (!found) {
      changes.push(proposeAdd(block, meta));
      continue;
    }
    if (sameBlock(found, block)) continue;

    const sameSlots = found.date === block.date && found.startSlot === block.startSlot && found.endSlot === block.endSlot;
    const sameNotes = (found.notes ?? "") === (block.notes ?? "") && found.seriesId === block.seriesId;
    if (sameNotes && found.provider === block.provider) {
      changes.push(proposeRetime(found, block, meta));
    } else if (sameNotes && sameSlots) {
      changes.push(proposeReassign(found, block.provider, meta));
    } else {
      changes.push(proposeRemove(found, meta), proposeAdd(block, meta));
    }
  }
  return changes;
}

/** First date on or after `from` that falls on `weekday`. */
export function nextWeekday(from: IsoDate, weekday: Weekday): IsoDate {
  const offset = (weekday - weekdayOf(from) + 7) % 7;
  return shiftDate(from, offset);
}
