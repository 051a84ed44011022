import { randomUUID } from "node:crypto";
import { AssistantError } from "./errors.js";
import { shiftDate, weekdayOf, WEEKDAYS } from "./dates.js";
import { createLogger } from "./log.js";
import { createBlock, proposeAdd, proposeReassign, proposeRemove, proposeRetime, proposeSwap, type ProposalMeta } from "./proposals.js";
import type { ProviderNames } from "./providers.js";
import { expand } from "./recurrence.js";
import { sortedByStart } from "./store.js";
import { TOOL_NAMES, toolCallSchema, type ToolCall } from "./tool-schema.js";
import type { ChangeProposal, IsoDate, TimeBlock, Weekday } from "../types.js";

const log = createLogger("AIService");

/** A tool invocation as returned by the model, before validation. */
export type RawToolCall = { name: string; input: unknown };

export type TranslateContext = {
  blocks: readonly TimeBlock[];
  today: IsoDate;
  names?: ProviderNames;
};

const DAY_INDEX: Record<string, Weekday> = {
  sunday: 0,
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6
};

export function parseToolCall(raw: RawToolCall): ToolCall {
  if (!TOOL_NAMES.some(n => n === raw.name)) {
    throw new AssistantError("UnknownTool", `Unknown action: ${raw.name}`);
  }
  const parsed = toolCallSchema.safeParse(raw);
  if (!parsed.success) {
    const keys = raw.input && typeof raw.input === "object" ? Object.keys(raw.input).join(", ") : "none";
    throw new AssistantError("InvalidToolInput", `Received invalid data for ${raw.name} (keys: ${keys}). Please try again.`);
  }
  return parsed.data;
}

function findBlock(blocks: readonly TimeBlock[], match: (b: TimeBlock) => boolean, what: string): TimeBlock {
  const found = sortedByStart(blocks.filter(match))[0];
  if (!found) throw new AssistantError("BlockNotFound", `Couldn't find ${what}.`);
  return found;
}

function hasDuration(start: number, end: number, where: string): boolean {
  if (end > start) return true;
  log.warn(`Discarding 0-duration block ${start}-${end} from ${where}`);
  return false;
}

/** Turns one validated tool call into proposals, resolved against the snapshot in `ctx`. */
export function translateToolCall(call: ToolCall, ctx: TranslateContext): ChangeProposal[] {
  const meta: ProposalMeta = { rationale: call.input.explanation || undefined, wasAISuggested: true, names: ctx.names };
  const { blocks } = ctx;

  switch (call.name) {
    case "change_time": {
      const { date, provider, new_start_slot, new_end_slot } = call.input;
      const original = findBlock(blocks, b => b.date === date && b.provider === provider, `a ${provider} block on ${date}`);
      if (original.startSlot === new_start_slot && original.endSlot === new_end_slot) return [];
      return [proposeRetime(original, { startSlot: new_start_slot, endSlot: new_end_slot }, meta)];
    }
    case "swap_days": {
      const { date1, date2 } = call.input;
      const first = findBlock(blocks, b => b.date === date1, `a block on ${date1}`);
      const second = findBlock(blocks, b => b.date === date2, `a block on ${date2}`);
      return [proposeSwap(first, second, meta)];
    }
    case "add_block": {
      const { date, provider, start_slot, end_slot, notes, recurring, recurring_end_date } = call.input;
      if (!hasDuration(start_slot, end_slot, "add_block")) return [];
      if (!recurring) {
        return [proposeAdd(createBlock({ date, startSlot: start_slot, endSlot: end_slot, provider, notes }), meta)];
      }
      const endDate = recurring_end_date ?? shiftDate(date, 52 * 7 - 1);
      const pattern = {
        id: `series-${randomUUID()}`,
        weekdays: recurring === "daily" ? WEEKDAYS : [weekdayOf(date)],
        startSlot: start_slot,
        endSlot: end_slot,
        provider,
        startDate: date,
        endDate,
        notes
      };
      return expand(pattern, { from: date, to: endDate }).map(b => proposeAdd(b, meta));
    }
    case "remove_block": {
      const { date, provider, start_slot } = call.input;
      const original = findBlock(
        blocks,
        b => b.date === date && b.provider === provider && b.startSlot === start_slot,
        `a ${provider} block starting at slot ${start_slot} on ${date}`
      );
      return [proposeRemove(original, meta)];
    }
    case "reassign_block": {
      const { date, provider, start_slot, new_provider } = call.input;
      const original = findBlock(
        blocks,
        b => b.date === date && b.provider === provider && b.startSlot === start_slot,
        `a ${provider} block starting at slot ${start_slot} on ${date}`
      );
      if (new_provider === provider) return [];
      return [proposeReassign(original, new_provider, meta)];
    }
    case "set_day_schedule": {
      const { date } = call.input;
      return call.input.blocks
        .filter(b => hasDuration(b.start_slot, b.end_slot, "set_day_schedule"))
        .map(b => proposeAdd(createBlock({ date, startSlot: b.start_slot, endSlot: b.end_slot, provider: b.provider, notes: b.notes }), meta));
    }
    case "clear_day": {
      const { date, provider, clear_recurring } = call.input;
      const weekday = weekdayOf(date);
      const matches = (b: TimeBlock) =>
        b.date === date || (clear_recurring === true && b.seriesId !== undefined && weekdayOf(b.date) === weekday);
      return sortedByStart(blocks.filter(b => matches(b) && (!provider || b.provider === provider))).map(b => proposeRemove(b, meta));
    }
    case "set_weekly_schedule": {
      const { today } = ctx;
      const until = shiftDate(today, call.input.duration_weeks * 7 - 1);
      const clearing = blocks
        .filter(b => b.date >= today)
        .map(b => proposeRemove(b, { ...meta, rationale: "Clearing existing schedule to replace with new weekly schedule" }));
      const series = `weekly-${randomUUID()}`;
      const adding = call.input.blocks
        .filter(b => hasDuration(b.start_slot, b.end_slot, "set_weekly_schedule"))
        .flatMap((b, i) =>
          expand(
            {
              id: `${series}-${i}`,
              weekdays: [DAY_INDEX[b.day_of_week]],
              startSlot: b.start_slot,
              endSlot: b.end_slot,
              provider: b.provider,
              startDate: today,
              endDate: until,
              notes: b.notes
            },
            { from: today, to: until }
          )
        )
        .map(b => proposeAdd(b, meta));
      return [...clearing, ...adding];
    }
  }
}

/**
 * Validates and translates every tool call of one model reply. Each call
 * sees the same pre-reply snapshot, as the model did.
 */
export function translateToolCalls(calls: readonly RawToolCall[], ctx: TranslateContext): ChangeProposal[] {
  return calls.flatMap(raw => {
    log.info(`Parsing tool: ${raw.name}`);
    return translateToolCall(parseToolCall(raw), ctx);
  });
}
