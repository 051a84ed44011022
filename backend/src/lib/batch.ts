import { randomUUID } from "node:crypto";
import { fail, ok, ScheduleError, type Result } from "./errors.js";
import { formatDay } from "./dates.js";
import { originalBlocks, proposedBlocks, affectedDates, validateProposal } from "./proposals.js";
import { displayName, type ProviderNames } from "./providers.js";
import { clampToCareWindow, formatSlotRange, isWithinCareWindow } from "./slots.js";
import { overlappingPairs, pairKey, sameBlock } from "./store.js";
import type { BatchSource, CareWindow, ChangeBatch, ChangeProposal, IsoDate, TimeBlock } from "../types.js";

export type CareWindowPolicy = "reject" | "clamp";

/** "displace" removes untouched blocks that a block placed by the batch overlaps. */
export type OverlapPolicy = "reject" | "displace";

export type ApplyOptions = {
  careWindow: CareWindow;
  careWindowPolicy: CareWindowPolicy;
  overlapPolicy: OverlapPolicy;
};

export type ApplyOutcome = {
  blocks: TimeBlock[];
  applied: number;
  displaced: TimeBlock[];
};

export function createBatch(input: {
  changes: readonly ChangeProposal[];
  summary?: string;
  instruction?: string;
  source: BatchSource;
  now?: Date;
}): ChangeBatch {
  return Object.freeze({
    id: randomUUID(),
    changes: Object.freeze([...input.changes]),
    summary: input.summary?.trim() ?? "",
    ...(input.instruction ? { instruction: input.instruction } : {}),
    source: input.source,
    createdAt: (input.now ?? new Date()).toISOString()
  });
}

/** Always derived from the batch itself, never taken from a payload. */
export const changeCount = (batch: ChangeBatch) => batch.changes.length;

export function summarize(batch: ChangeBatch): string {
  if (batch.summary) return batch.summary;
  const n = changeCount(batch);
  return `${n} schedule change${n === 1 ? "" : "s"}`;
}

export function batchDates(batch: ChangeBatch): IsoDate[] {
  return [...new Set(batch.changes.flatMap(affectedDates))].sort();
}

function fitToWindow(block: TimeBlock, options: ApplyOptions): TimeBlock | null {
  if (isWithinCareWindow(block.startSlot, block.endSlot, options.careWindow)) return block;
  if (options.careWindowPolicy === "reject") return null;
  const clamped = clampToCareWindow(block.startSlot, block.endSlot, options.careWindow);
  return clamped ? { ...block, startSlot: clamped.start, endSlot: clamped.end } : null;
}

/**
 * Applies every proposal in order against a working copy of `blocks`.
 * Either the whole batch succeeds or the error names the first proposal
 * that could not be applied; `blocks` itself is never modified.
 */
export function applyBatch(batch: ChangeBatch, blocks: readonly TimeBlock[], options: ApplyOptions): Result<ApplyOutcome> {
  const working = new Map(blocks.map(b => [b.id, b]));
  const placedBy = new Map<string, number>();

  for (const [index, proposal] of batch.changes.entries()) {
    const at = { proposalIndex: index, proposalId: proposal.id };
    const { change } = proposal;

    const valid = validateProposal(proposal);
    if (!valid.ok) return fail(new ScheduleError("InvalidProposal", valid.error.message, at));

    for (const original of originalBlocks(change)) {
      const current = working.get(original.id);
      if (!current || !sameBlock(current, original)) {
        return fail(
          new ScheduleError("StaleReference", `Block ${original.id} no longer matches the schedule`, { ...at, blockIds: [original.id] })
        );
      }
    }
    if (change.kind === "add" && working.has(change.proposed.id)) {
      return fail(
        new ScheduleError("InvalidProposal", `Block ${change.proposed.id} already exists`, { ...at, blockIds: [change.proposed.id] })
      );
    }

    const placed: TimeBlock[] = [];
    for (const block of proposedBlocks(change)) {
      const fitted = fitToWindow(block, options);
      if (!fitted) {
        const { start, end } = options.careWindow;
        return fail(
          new ScheduleError(
            "OutOfCareWindow",
            `${formatSlotRange(block.startSlot, block.endSlot)} is outside the care window ${formatSlotRange(start, end)}`,
            { ...at, blockIds: [block.id] }
          )
        );
      }
      placed.push(fitted);
    }

    if (change.kind === "remove") {
      working.delete(change.original.id);
      placedBy.delete(change.original.id);
    }
    for (const block of placed) {
      working.set(block.id, block);
      placedBy.set(block.id, index);
    }
  }

  // Pairs that already overlapped before the batch are left alone, as the store does.
  const existing = new Set(overlappingPairs(blocks).map(pairKey));
  const displaced: TimeBlock[] = [];
  const conflicts = overlappingPairs([...working.values()]).filter(
    p => (placedBy.has(p.first.id) || placedBy.has(p.second.id)) && !existing.has(pairKey(p))
  );
  for (const { first, second } of conflicts) {
    const bothPlaced = placedBy.has(first.id) && placedBy.has(second.id);
    if (options.overlapPolicy === "reject" || bothPlaced) {
      const index = Math.max(placedBy.get(first.id) ?? -1, placedBy.get(second.id) ?? -1);
      return fail(
        new ScheduleError("OverlappingCoverage", `Blocks ${first.id} and ${second.id} overlap on ${first.date}`, {
          proposalIndex: index,
          proposalId: batch.changes[index].id,
          blockIds: [first.id, second.id]
        })
      );
    }
    const victim = placedBy.has(first.id) ? second : first;
    if (working.delete(victim.id)) displaced.push(victim);
  }

  return ok({ blocks: [...working.values()], applied: changeCount(batch), displaced });
}

/** One line per proposal: + add, - remove, ~ retime/reassign, ⇄ swap. */
export function changeBreakdown(batch: ChangeBatch, names: ProviderNames = {}): string[] {
  const who = (b: TimeBlock) => displayName(b.provider, names);
  const range = (b: TimeBlock) => formatSlotRange(b.startSlot, b.endSlot);
  const recurring = (b: TimeBlock) => (b.seriesId ? " (recurring)" : "");

  return batch.changes.map(({ change }) => {
    switch (change.kind) {
      case "add":
        return `+ ${who(change.proposed)}: ${formatDay(change.proposed.date)} ${range(change.proposed)}${recurring(change.proposed)}`;
      case "remove":
        return `- ${who(change.original)}: ${formatDay(change.original.date)} ${range(change.original)}${recurring(change.original)}`;
      case "retime":
        return `~ ${who(change.original)}: ${range(change.original)} → ${range(change.proposed)} on ${formatDay(change.proposed.date)}`;
      case "swap": {
        const a = change.first.original;
        const b = change.second.original;
        return `⇄ ${formatDay(a.date)} (${who(a)}) ↔ ${formatDay(b.date)} (${who(b)})`;
      }
      case "reassign":
        return `~ ${formatDay(change.original.date)} ${range(change.original)}: ${who(change.original)} → ${who(change.proposed)}`;
    }
  });
}
