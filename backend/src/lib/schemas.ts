import { z } from "zod";
import { isIsoDate, isWeekday } from "./dates.js";
import { CARE_PROVIDERS } from "./providers.js";
import type { Weekday } from "../types.js";

export const providerSchema = z.enum(CARE_PROVIDERS);

export const isoDateSchema = z.string().refine(isIsoDate, "expected a yyyy-MM-dd date");

// Range checks are left to the engine so they surface as InvalidRange / InvalidProposal.
const slotSchema = z.number().int();

export const timeBlockSchema = z.object({
  id: z.string().min(1),
  date: isoDateSchema,
  startSlot: slotSchema,
  endSlot: slotSchema,
  provider: providerSchema,
  notes: z.string().optional(),
  seriesId: z.string().optional()
});

const blockChangeSchema = z.object({ original: timeBlockSchema, proposed: timeBlockSchema });

export const changeKindSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("retime"), original: timeBlockSchema, proposed: timeBlockSchema }),
  z.object({ kind: z.literal("swap"), first: blockChangeSchema, second: blockChangeSchema }),
  z.object({ kind: z.literal("add"), proposed: timeBlockSchema }),
  z.object({ kind: z.literal("remove"), original: timeBlockSchema }),
  z.object({ kind: z.literal("reassign"), original: timeBlockSchema, proposed: timeBlockSchema })
]);

export const actorSchema = z.object({
  name: z.string().min(1),
  provider: providerSchema.optional()
});

export const manualBatchSchema = z.object({
  summary: z.string().optional(),
  instruction: z.string().optional(),
  changes: z.array(z.object({ change: changeKindSchema, rationale: z.string().optional() })).min(1)
});

const weekdaySchema = z.custom<Weekday>(v => typeof v === "number" && isWeekday(v), "weekday must be 0 (Sunday) to 6 (Saturday)");

export const recurrencePatternSchema = z.object({
  id: z.string().min(1),
  weekdays: z.array(weekdaySchema),
  startSlot: slotSchema,
  endSlot: slotSchema,
  provider: providerSchema,
  startDate: isoDateSchema,
  endDate: isoDateSchema.optional(),
  notes: z.string().optional()
});

export const dateRangeSchema = z.object({ from: isoDateSchema, to: isoDateSchema });

export const careWindowSchema = z.object({ start: slotSchema, end: slotSchema });

export const providerNamesSchema = z.record(providerSchema, z.string());

export const settingsSchema = z.object({
  careWindow: careWindowSchema,
  providerNames: providerNamesSchema.default({})
});

export const journalEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  actor: actorSchema,
  batchId: z.string(),
  title: z.string(),
  narration: z.string().optional(),
  aiSummary: z.string().optional(),
  changesApplied: z.number().int(),
  datesImpacted: z.array(isoDateSchema),
  careTimeDelta: z.record(providerSchema, z.number()),
  breakdown: z.array(z.string())
});
