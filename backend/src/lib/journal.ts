import { randomUUID } from "node:crypto";
import { batchDates, changeBreakdown, changeCount, summarize } from "./batch.js";
import { displayName, type ProviderNames } from "./providers.js";
import type { Actor, CareTimeDelta, ChangeBatch, ScheduleChangeEntry } from "../types.js";

export function createJournalEntry(input: {
  batch: ChangeBatch;
  actor: Actor;
  careTimeDelta: CareTimeDelta;
  names?: ProviderNames;
  now?: Date;
}): ScheduleChangeEntry {
  const { batch, actor, names = {} } = input;
  const who = actor.provider ? displayName(actor.provider, names) : actor.name;
  return Object.freeze({
    id: randomUUID(),
    timestamp: (input.now ?? new Date()).toISOString(),
    actor,
    batchId: batch.id,
    title: `${who} updated the schedule`,
    ...(batch.instruction ? { narration: batch.instruction } : {}),
    ...(batch.source === "ai" ? { aiSummary: summarize(batch) } : {}),
    changesApplied: changeCount(batch),
    datesImpacted: batchDates(batch),
    careTimeDelta: input.careTimeDelta,
    breakdown: changeBreakdown(batch, names)
  });
}
