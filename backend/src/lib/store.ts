import { InvariantViolation, ScheduleError } from "./errors.js";
import { createLogger, type Logger } from "./log.js";
import { durationHours } from "./slots.js";
import type { CareProvider, DateRange, IsoDate, Slot, TimeBlock } from "../types.js";

export type OverlapPair = { first: TimeBlock; second: TimeBlock };

export function totalHours(blocks: readonly TimeBlock[]): number {
  return blocks.reduce((sum, b) => sum + durationHours(b.startSlot, b.endSlot), 0);
}

/** Ascending by startSlot; Array.prototype.sort is stable, so ties keep insertion order. */
export function sortedByStart(blocks: readonly TimeBlock[]): TimeBlock[] {
  return [...blocks].sort((a, b) => a.startSlot - b.startSlot);
}

export function sameBlock(a: TimeBlock, b: TimeBlock): boolean {
  return (
    a.id === b.id &&
    a.date === b.date &&
    a.startSlot === b.startSlot &&
    a.endSlot === b.endSlot &&
    a.provider === b.provider &&
    (a.notes ?? "") === (b.notes ?? "") &&
    a.seriesId === b.seriesId
  );
}

export function overlappingPairs(blocks: readonly TimeBlock[]): OverlapPair[] {
  const byDate = new Map<IsoDate, TimeBlock[]>();
  for (const b of blocks) {
    const list = byDate.get(b.date) ?? [];
    list.push(b);
    byDate.set(b.date, list);
  }
  const pairs: OverlapPair[] = [];
  for (const list of byDate.values()) {
    const sorted = sortedByStart(list);
    for (let i = 0; i < sorted.length; i++) {
      for (let j = i + 1; j < sorted.length && sorted[j].startSlot < sorted[i].endSlot; j++) {
        pairs.push({ first: sorted[i], second: sorted[j] });
      }
    }
  }
  return pairs;
}

export const pairKey = (p: OverlapPair) => [p.first.id, p.second.id].sort().join("|");

export type Commit<T> = { blocks: readonly TimeBlock[]; result: T };

export type MutationOptions = {
  /** "queue" waits for the writer in flight; "fail" throws StoreBusy instead. */
  onBusy?: "queue" | "fail";
  /** Runs after the invariant check and before the new snapshot becomes visible. */
  persist?: (blocks: readonly TimeBlock[]) => Promise<void>;
};

/**
 * Owns the schedule's TimeBlocks. Readers always see a complete frozen
 * snapshot; writers go through `mutate`, one at a time.
 */
export class TimeBlockStore {
  private snapshot: readonly TimeBlock[];
  private revision = 0;
  private pending = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(initial: readonly TimeBlock[] = [], private readonly log: Logger = createLogger("store")) {
    this.snapshot = Object.freeze([...initial]);
  }

  get blocks(): readonly TimeBlock[] {
    return this.snapshot;
  }

  /** Incremented on every commit. */
  get version(): number {
    return this.revision;
  }

  get isBusy(): boolean {
    return this.pending > 0;
  }

  get(id: string): TimeBlock | undefined {
    return this.snapshot.find(b => b.id === id);
  }

  blocksForDate(date: IsoDate): TimeBlock[] {
    return this.snapshot.filter(b => b.date === date);
  }

  blocksForProvider(provider: CareProvider): TimeBlock[] {
    return this.snapshot.filter(b => b.provider === provider);
  }

  blocksInRange(range: DateRange): TimeBlock[] {
    return this.snapshot.filter(b => b.date >= range.from && b.date <= range.to);
  }

  /** Who has the child at `slot` on `date`, or null when nobody is scheduled. */
  providerAt(date: IsoDate, slot: Slot): CareProvider | null {
    return this.blocksForDate(date).find(b => b.startSlot <= slot && slot < b.endSlot)?.provider ?? null;
  }

  /** True when no block on `date` intersects [start, end). */
  isAvailable(date: IsoDate, start: Slot, end: Slot): boolean {
    return !this.blocksForDate(date).some(b => b.startSlot < end && b.endSlot > start);
  }

  overlaps(date: IsoDate, provider?: CareProvider): OverlapPair[] {
    const blocks = this.blocksForDate(date).filter(b => !provider || b.provider === provider);
    return overlappingPairs(blocks);
  }

  mutate<T>(
    fn: (current: readonly TimeBlock[]) => Commit<T> | Promise<Commit<T>>,
    options: MutationOptions = {}
  ): Promise<T> {
    if (this.pending > 0 && options.onBusy === "fail") {
      return Promise.reject(new ScheduleError("StoreBusy", "Another schedule change is being applied"));
    }
    this.pending++;
    const run = this.tail.then(() => this.runExclusive(fn, options));
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run.finally(() => {
      this.pending--;
    });
  }

  private async runExclusive<T>(
    fn: (current: readonly TimeBlock[]) => Commit<T> | Promise<Commit<T>>,
    options: MutationOptions
  ): Promise<T> {
    const before = this.snapshot;
    const { blocks, result } = await fn(before);
    this.assertNoNewOverlaps(before, blocks);
    if (options.persist) await options.persist(blocks);
    this.snapshot = Object.freeze([...blocks]);
    this.revision++;
    return result;
  }

  // Overlaps already present (e.g. in loaded data) are reported by overlaps(), not rejected here.
  private assertNoNewOverlaps(before: readonly TimeBlock[], after: readonly TimeBlock[]): void {
    const existing = new Set(overlappingPairs(before).map(pairKey));
    const introduced = overlappingPairs(after).filter(p => !existing.has(pairKey(p)));
    if (introduced.length === 0) return;
    const ids = introduced.map(p => `${p.first.id}/${p.second.id}`).join(", ");
    const message = `Commit would introduce overlapping blocks: ${ids}`;
    this.log.error("INVARIANT VIOLATION:", message);
    throw new InvariantViolation(message);
  }
}
