import { randomUUID } from "node:crypto";
import { fail, ok, ScheduleError, type Result } from "./errors.js";
import { formatDay, isIsoDate } from "./dates.js";
import { displayName, type ProviderNames } from "./providers.js";
import { formatSlotRange, isValidRange } from "./slots.js";
import type { CareProvider, ChangeKind, ChangeProposal, IsoDate, TimeBlock } from "../types.js";

export type NewBlock = Omit<TimeBlock, "id"> & { id?: string };

export function createBlock(input: NewBlock): TimeBlock {
  const { id, notes, seriesId, ...rest } = input;
  return {
    id: id ?? randomUUID(),
    ...rest,
    ...(notes ? { notes } : {}),
    ...(seriesId ? { seriesId } : {})
  };
}

export type ProposalMeta = {
  rationale?: string;
  wasAISuggested?: boolean;
  names?: ProviderNames;
  now?: Date;
};

export function describeChange(change: ChangeKind, names: ProviderNames = {}): string {
  const who = (p: CareProvider) => displayName(p, names);
  const range = (b: TimeBlock) => formatSlotRange(b.startSlot, b.endSlot);
  switch (change.kind) {
    case "retime": {
      const { original, proposed } = change;
      const moved = original.date === proposed.date ? "" : ` on ${formatDay(proposed.date)}`;
      return `Move ${who(original.provider)}'s block from ${range(original)} to ${range(proposed)}${moved}`;
    }
    case "swap": {
      const a = change.first.original;
      const b = change.second.original;
      return `Swap ${formatDay(a.date)} (${who(a.provider)}) with ${formatDay(b.date)} (${who(b.provider)})`;
    }
    case "add":
      return `Add ${who(change.proposed.provider)} on ${formatDay(change.proposed.date)} from ${range(change.proposed)}`;
    case "remove":
      return `Remove ${who(change.original.provider)}'s block at ${range(change.original)} on ${formatDay(change.original.date)}`;
    case "reassign": {
      const { original, proposed } = change;
      return `Reassign ${formatDay(original.date)} ${range(original)} from ${who(original.provider)} to ${who(proposed.provider)}`;
    }
  }
}

export function createProposal(change: ChangeKind, meta: ProposalMeta = {}): ChangeProposal {
  return Object.freeze({
    id: randomUUID(),
    change,
    description: describeChange(change, meta.names),
    ...(meta.rationale ? { rationale: meta.rationale } : {}),
    wasAISuggested: meta.wasAISuggested ?? false,
    createdAt: (meta.now ?? new Date()).toISOString()
  });
}

export const proposeRetime = (
  original: TimeBlock,
  to: { date?: IsoDate; startSlot: number; endSlot: number },
  meta?: ProposalMeta
) =>
  createProposal(
    { kind: "retime", original, proposed: { ...original, date: to.date ?? original.date, startSlot: to.startSlot, endSlot: to.endSlot } },
    meta
  );

/** Exchanges the providers of two blocks, keeping each block's date and slots. */
export const proposeSwap = (first: TimeBlock, second: TimeBlock, meta?: ProposalMeta) =>
  createProposal(
    {
      kind: "swap",
      first: { original: first, proposed: { ...first, provider: second.provider } },
      second: { original: second, proposed: { ...second, provider: first.provider } }
    },
    meta
  );

export const proposeAdd = (block: TimeBlock, meta?: ProposalMeta) =>
  createProposal({ kind: "add", proposed: block }, meta);

export const proposeRemove = (original: TimeBlock, meta?: ProposalMeta) =>
  createProposal({ kind: "remove", original }, meta);

export const proposeReassign = (original: TimeBlock, provider: CareProvider, meta?: ProposalMeta) =>
  createProposal({ kind: "reassign", original, proposed: { ...original, provider } }, meta);

export function originalBlocks(change: ChangeKind): TimeBlock[] {
  switch (change.kind) {
    case "add":
      return [];
    case "swap":
      return [change.first.original, change.second.original];
    case "retime":
    case "remove":
    case "reassign":
      return [change.original];
  }
}

export function proposedBlocks(change: ChangeKind): TimeBlock[] {
  switch (change.kind) {
    case "remove":
      return [];
    case "swap":
      return [change.first.proposed, change.second.proposed];
    case "retime":
    case "add":
    case "reassign":
      return [change.proposed];
  }
}

export function affectedDates(proposal: ChangeProposal): IsoDate[] {
  const dates = [...originalBlocks(proposal.change), ...proposedBlocks(proposal.change)].map(b => b.date);
  return [...new Set(dates)].sort();
}

function checkBlock(block: TimeBlock): string | null {
  if (!isIsoDate(block.date)) return `block ${block.id} has invalid date "${block.date}"`;
  if (!isValidRange(block.startSlot, block.endSlot)) {
    return `block ${block.id} has invalid slot range ${block.startSlot}-${block.endSlot}`;
  }
  return null;
}

function checkChange(change: ChangeKind): string | null {
  for (const block of [...originalBlocks(change), ...proposedBlocks(change)]) {
    const problem = checkBlock(block);
    if (problem) return problem;
  }
  switch (change.kind) {
    case "retime": {
      const { original, proposed } = change;
      if (proposed.id !== original.id) return "retime must keep the block id";
      if (proposed.provider !== original.provider) return "retime cannot change the provider; use reassign";
      if (proposed.date === original.date && proposed.startSlot === original.startSlot && proposed.endSlot === original.endSlot) {
        return "retime does not change the block's date or slots";
      }
      return null;
    }
    case "reassign": {
      const { original, proposed } = change;
      if (proposed.id !== original.id) return "reassign must keep the block id";
      if (proposed.date !== original.date || proposed.startSlot !== original.startSlot || proposed.endSlot !== original.endSlot) {
        return "reassign cannot change the block's date or slots";
      }
      if (proposed.provider === original.provider) return "reassign does not change the provider";
      return null;
    }
    case "swap": {
      const { first, second } = change;
      if (first.original.id === second.original.id) return "swap must reference two distinct blocks";
      if (first.proposed.id !== first.original.id || second.proposed.id !== second.original.id) {
        return "swap must keep both block ids";
      }
      return null;
    }
    case "add":
    case "remove":
      return null;
  }
}

/** Pure structural check; does not look at the store. */
export function validateProposal(proposal: ChangeProposal): Result<ChangeProposal> {
  const problem = checkChange(proposal.change);
  if (problem) {
    return fail(new ScheduleError("InvalidProposal", `Invalid ${proposal.change.kind}: ${problem}`, { proposalId: proposal.id }));
  }
  return ok(proposal);
}
