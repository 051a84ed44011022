import { describe, expect, it } from "vitest";
import { AssistantError } from "./errors.js";
import { block, errorOf } from "./testing.js";
import { parseToolCall, translateToolCalls, type TranslateContext } from "./tool-calls.js";
import type { ChangeProposal } from "../types.js";

const mon = block("mon", "2025-03-03", 32, 48, "parent_a");
const monAfternoon = block("mon-pm", "2025-03-03", 60, 72, "parent_b");
const tue = block("tue", "2025-03-04", 32, 48, "parent_b");
const past = block("past", "2025-02-28", 32, 48, "parent_a");

const ctx: TranslateContext = { blocks: [past, mon, monAfternoon, tue], today: "2025-03-03" };

const kinds = (changes: ChangeProposal[]) => changes.map(c => c.change.kind);

describe("parseToolCall", () => {
  it("coerces numeric strings and defaults the explanation", () => {
    const call = parseToolCall({
      name: "change_time",
      input: { date: "2025-03-03", provider: "parent_a", new_start_slot: "36", new_end_slot: 52 }
    });
    expect(call).toEqual({
      name: "change_time",
      input: { date: "2025-03-03", provider: "parent_a", new_start_slot: 36, new_end_slot: 52, explanation: "" }
    });
  });

  it("rejects unknown tools", () => {
    const err = errorOf(() => parseToolCall({ name: "do_magic", input: {} }));
    expect(err).toBeInstanceOf(AssistantError);
    expect(err).toMatchObject({ code: "UnknownTool", message: "Unknown action: do_magic" });
  });

  it("rejects malformed arguments", () => {
    expect(errorOf(() => parseToolCall({ name: "remove_block", input: { date: "tomorrow" } }))).toMatchObject({
      code: "InvalidToolInput",
      message: "Received invalid data for remove_block (keys: date). Please try again."
    });
  });
});

describe("translateToolCalls", () => {
  it("turns change_time into a retime of the first matching block", () => {
    const [proposal] = translateToolCalls(
      [{ name: "change_time", input: { date: "2025-03-03", provider: "parent_a", new_start_slot: 36, new_end_slot: 52, explanation: "later start" } }],
      ctx
    );
    expect(proposal.change).toEqual({ kind: "retime", original: mon, proposed: { ...mon, startSlot: 36, endSlot: 52 } });
    expect(proposal.rationale).toBe("later start");
    expect(proposal.wasAISuggested).toBe(true);
  });

  it("drops a change_time that changes nothing", () => {
    const changes = translateToolCalls(
      [{ name: "change_time", input: { date: "2025-03-03", provider: "parent_a", new_start_slot: 32, new_end_slot: 48 } }],
      ctx
    );
    expect(changes).toEqual([]);
  });

  it("swaps the earliest block of each day", () => {
    const [proposal] = translateToolCalls([{ name: "swap_days", input: { date1: "2025-03-03", date2: "2025-03-04" } }], ctx);
    expect(proposal.change.kind === "swap" && [proposal.change.first.original.id, proposal.change.second.original.id]).toEqual([
      "mon",
      "tue"
    ]);
  });

  it("removes and reassigns by exact start slot", () => {
    const changes = translateToolCalls(
      [
        { name: "remove_block", input: { date: "2025-03-03", provider: "parent_b", start_slot: 60 } },
        { name: "reassign_block", input: { date: "2025-03-04", provider: "parent_b", start_slot: 32, new_provider: "nanny" } }
      ],
      ctx
    );
    expect(kinds(changes)).toEqual(["remove", "reassign"]);
    expect(changes[1].change).toEqual({ kind: "reassign", original: tue, proposed: { ...tue, provider: "nanny" } });
  });

  it("reports a block it cannot find", () => {
    const err = errorOf(() =>
      translateToolCalls([{ name: "remove_block", input: { date: "2025-03-05", provider: "parent_a", start_slot: 32 } }], ctx)
    );
    expect(err).toMatchObject({ code: "BlockNotFound", message: "Couldn't find a parent_a block starting at slot 32 on 2025-03-05." });
  });

  it("expands a weekly recurring add into one block per week", () => {
    const changes = translateToolCalls(
      [
        {
          name: "add_block",
          input: {
            date: "2025-03-05",
            provider: "nanny",
            start_slot: 60,
            end_slot: 72,
            recurring: "weekly",
            recurring_end_date: "2025-03-19"
          }
        }
      ],
      ctx
    );
    const added = changes.flatMap(c => (c.change.kind === "add" ? [c.change.proposed] : []));
    expect(added.map(b => b.date)).toEqual(["2025-03-05", "2025-03-12", "2025-03-19"]);
    expect(new Set(added.map(b => b.seriesId)).size).toBe(1);
    expect(added[0].seriesId).toMatch(/^series-/);
  });

  it("discards zero-length blocks", () => {
    const changes = translateToolCalls(
      [{ name: "add_block", input: { date: "2025-03-05", provider: "nanny", start_slot: 60, end_slot: 60 } }],
      ctx
    );
    expect(changes).toEqual([]);
  });

  it("clears a day, optionally for one provider", () => {
    expect(kinds(translateToolCalls([{ name: "clear_day", input: { date: "2025-03-03" } }], ctx))).toEqual(["remove", "remove"]);
    const [only] = translateToolCalls([{ name: "clear_day", input: { date: "2025-03-03", provider: "parent_b" } }], ctx);
    expect(only.change.kind === "remove" && only.change.original.id).toBe("mon-pm");
  });

  it("clears recurring blocks on the same weekday when asked", () => {
    const pickup = { ...block("pickup@2025-03-10", "2025-03-10", 60, 72, "nanny"), seriesId: "pickup" };
    const tuesdayPickup = { ...block("pickup@2025-03-11", "2025-03-11", 60, 72, "nanny"), seriesId: "pickup" };
    const oneOff = block("one-off", "2025-03-17", 32, 48, "parent_b");
    const withSeries: TranslateContext = { ...ctx, blocks: [mon, monAfternoon, pickup, tuesdayPickup, oneOff] };
    const removed = (input: Record<string, unknown>) =>
      translateToolCalls([{ name: "clear_day", input }], withSeries).map(c => (c.change.kind === "remove" ? c.change.original.id : c.change.kind));

    expect(removed({ date: "2025-03-03", clear_recurring: true })).toEqual(["mon", "mon-pm", "pickup@2025-03-10"]);
    expect(removed({ date: "2025-03-03", clear_recurring: true, provider: "nanny" })).toEqual(["pickup@2025-03-10"]);
    expect(removed({ date: "2025-03-03" })).toEqual(["mon", "mon-pm"]);
  });

  it("fills a day from a list of blocks", () => {
    const changes = translateToolCalls(
      [
        {
          name: "set_day_schedule",
          input: {
            date: "2025-03-06",
            blocks: [
              { provider: "parent_a", start_slot: 28, end_slot: 48 },
              { provider: "parent_b", start_slot: 48, end_slot: 78, notes: "pickup" }
            ]
          }
        }
      ],
      ctx
    );
    expect(changes.map(c => c.description)).toEqual([
      "Add Caregiver 1 on Thu, Mar 6 from 7:00 AM - 12:00 PM",
      "Add Caregiver 2 on Thu, Mar 6 from 12:00 PM - 7:30 PM"
    ]);
  });

  it("replaces the schedule from today with a weekly template", () => {
    const changes = translateToolCalls(
      [
        {
          name: "set_weekly_schedule",
          input: {
            duration_weeks: 1,
            blocks: [
              { day_of_week: "monday", provider: "parent_a", start_slot: 32, end_slot: 48 },
              { day_of_week: "friday", provider: "parent_b", start_slot: 60, end_slot: 72 }
            ]
          }
        }
      ],
      ctx
    );
    const removed = changes.flatMap(c => (c.change.kind === "remove" ? [c.change.original.id] : []));
    const added = changes.flatMap(c => (c.change.kind === "add" ? [c.change.proposed] : []));
    expect(removed).toEqual(["mon", "mon-pm", "tue"]);
    expect(added.map(b => [b.date, b.provider])).toEqual([
      ["2025-03-03", "parent_a"],
      ["2025-03-07", "parent_b"]
    ]);
    expect(changes[0].rationale).toBe("Clearing existing schedule to replace with new weekly schedule");
  });
});
