import { z } from "zod";
import { isoDateSchema, providerSchema } from "./schemas.js";

// Models sometimes send integers as strings or floats; coerce before checking.
const slot = z.coerce.number().int();
const explanation = z.string().default("");

const dayBlock = z.object({
  provider: providerSchema,
  start_slot: slot,
  end_slot: slot,
  notes: z.string().optional()
});

export const toolCallSchema = z.discriminatedUnion("name", [
  z.object({
    name: z.literal("change_time"),
    input: z.object({ date: isoDateSchema, provider: providerSchema, new_start_slot: slot, new_end_slot: slot, explanation })
  }),
  z.object({
    name: z.literal("swap_days"),
    input: z.object({ date1: isoDateSchema, date2: isoDateSchema, explanation })
  }),
  z.object({
    name: z.literal("add_block"),
    input: dayBlock.extend({
      date: isoDateSchema,
      recurring: z.enum(["daily", "weekly"]).optional(),
      recurring_end_date: isoDateSchema.optional(),
      explanation
    })
  }),
  z.object({
    name: z.literal("remove_block"),
    input: z.object({ date: isoDateSchema, provider: providerSchema, start_slot: slot, explanation })
  }),
  z.object({
    name: z.literal("reassign_block"),
    input: z.object({ date: isoDateSchema, provider: providerSchema, start_slot: slot, new_provider: providerSchema, explanation })
  }),
  z.object({
    name: z.literal("set_day_schedule"),
    input: z.object({ date: isoDateSchema, blocks: z.array(dayBlock), explanation })
  }),
  z.object({
    name: z.literal("clear_day"),
    input: z.object({ date: isoDateSchema, provider: providerSchema.optional(), clear_recurring: z.boolean().optional(), explanation })
  }),
  z.object({
    name: z.literal("set_weekly_schedule"),
    input: z.object({
      blocks: z.array(
        dayBlock.extend({
          day_of_week: z.enum(["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"])
        })
      ),
      duration_weeks: z.coerce.number().int().min(1).max(104),
      explanation
    })
  })
]);

export type ToolCall = z.infer<typeof toolCallSchema>;
export type ToolName = ToolCall["name"];

export const TOOL_NAMES: readonly ToolName[] = [
  "change_time",
  "swap_days",
  "add_block",
  "remove_block",
  "reassign_block",
  "set_day_schedule",
  "clear_day",
  "set_weekly_schedule"
];

const str = (description: string) => ({ type: "string", description });
const int = (description: string) => ({ type: "integer", description });
const provider = str("Provider: parent_a, parent_b, or nanny");
const date = str("Date in YYYY-MM-DD format");
const why = str("Brief explanation of the change");

const blockItem = {
  type: "object",
  properties: {
    provider,
    start_slot: int("Start time slot (0-95). Formula: hour*4 + minute/15"),
    end_slot: int("End time slot (1-96)"),
    notes: str("Optional notes")
  },
  required: ["provider", "start_slot", "end_slot"]
};

/** JSON-schema definitions handed to the model; mirrors toolCallSchema. */
export const TOOL_DEFINITIONS: { name: ToolName; description: string; parameters: Record<string, unknown> }[] = [
  {
    name: "change_time",
    description: "Change the start or end time of an existing schedule block",
    parameters: {
      type: "object",
      properties: { date, provider, new_start_slot: int("New start slot (0-95)"), new_end_slot: int("New end slot (1-96)"), explanation: why },
      required: ["date", "provider", "new_start_slot", "new_end_slot", "explanation"]
    }
  },
  {
    name: "swap_days",
    description: "Swap the care providers of the first block on two days",
    parameters: {
      type: "object",
      properties: { date1: date, date2: date, explanation: why },
      required: ["date1", "date2", "explanation"]
    }
  },
  {
    name: "add_block",
    description: "Add a new schedule block for a single time range on one day, optionally repeating daily or weekly",
    parameters: {
      type: "object",
      properties: {
        date,
        ...blockItem.properties,
        recurring: str("Optional recurrence: daily or weekly"),
        recurring_end_date: str("Optional last date of the recurrence in YYYY-MM-DD format"),
        explanation: why
      },
      required: ["date", "provider", "start_slot", "end_slot", "explanation"]
    }
  },
  {
    name: "remove_block",
    description: "Remove a schedule block",
    parameters: {
      type: "object",
      properties: { date, provider, start_slot: int("Start slot of the block to remove"), explanation: why },
      required: ["date", "provider", "start_slot", "explanation"]
    }
  },
  {
    name: "reassign_block",
    description: "Give an existing block to a different provider without changing its time",
    parameters: {
      type: "object",
      properties: { date, provider, start_slot: int("Start slot of the block"), new_provider: provider, explanation: why },
      required: ["date", "provider", "start_slot", "new_provider", "explanation"]
    }
  },
  {
    name: "set_day_schedule",
    description: "Create blocks for a single day. Use after clear_day to rebuild a day's schedule.",
    parameters: {
      type: "object",
      properties: { date, blocks: { type: "array", items: blockItem }, explanation: why },
      required: ["date", "blocks", "explanation"]
    }
  },
  {
    name: "clear_day",
    description:
      "Remove all blocks on a day, optionally only those of one provider. Set clear_recurring to also remove recurring blocks on the same day of the week.",
    parameters: {
      type: "object",
      properties: {
        date,
        provider: str("Optional: parent_a, parent_b, or nanny. Omit to clear all providers."),
        clear_recurring: { type: "boolean", description: "Optional: also remove recurring blocks whose day of the week matches this date" },
        explanation: why
      },
      required: ["date", "explanation"]
    }
  },
  {
    name: "set_weekly_schedule",
    description:
      "Replace every block from today onward with a weekly recurring schedule. Provide ALL blocks for the week, each with its day_of_week.",
    parameters: {
      type: "object",
      properties: {
        blocks: {
          type: "array",
          items: {
            ...blockItem,
            properties: { day_of_week: str("Day: monday ... sunday"), ...blockItem.properties },
            required: ["day_of_week", ...blockItem.required]
          }
        },
        duration_weeks: int("How many weeks the schedule repeats. Use 52 for one year."),
        explanation: why
      },
      required: ["blocks", "duration_weeks", "explanation"]
    }
  }
];
