import { daysIn } from "./dates.js";
import { CARE_PROVIDERS, displayName, PRIMARY_PROVIDERS, type ProviderNames } from "./providers.js";
import { careWindowHours, DEFAULT_CARE_WINDOW, durationHours } from "./slots.js";
import type { CareProvider, CareTimeDelta, CareWindow, DateRange, TimeBlock } from "../types.js";

export type HoursByProvider = Record<CareProvider, number>;

/** The difference between the two guardians, expressed in care-window days. */
export type CareBalanceGap = {
  ahead: CareProvider;
  behind: CareProvider;
  differenceHours: number;
  fullDays: number;
  remainingHours: number;
  careWindowHoursPerDay: number;
};

export type CareBalanceReport = {
  hoursByProvider: HoursByProvider;
  /** Hours of providers outside the balanced pair; informational only. */
  otherHours: Partial<HoursByProvider>;
  totalHours: number;
  fraction: Partial<HoursByProvider>;
  balanceDelta: number;
  thresholdHours: number;
  isBalanced: boolean;
  gap: CareBalanceGap | null;
};

export type BalanceOptions = {
  thresholdHours: number;
  careWindow?: CareWindow;
  providers?: readonly [CareProvider, CareProvider];
};

export function hoursByProvider(blocks: readonly TimeBlock[]): HoursByProvider {
  const hours: HoursByProvider = { parent_a: 0, parent_b: 0, nanny: 0 };
  for (const b of blocks) hours[b.provider] += durationHours(b.startSlot, b.endSlot);
  return hours;
}

/** Weekly threshold scaled to the number of days the query covers. */
export function scaledThreshold(perWeek: number, range?: DateRange): number {
  return range ? (perWeek * daysIn(range)) / 7 : perWeek;
}

export function careBalance(blocks: readonly TimeBlock[], options: BalanceOptions): CareBalanceReport {
  const [a, b] = options.providers ?? PRIMARY_PROVIDERS;
  const hours = hoursByProvider(blocks);
  const pairTotal = hours[a] + hours[b];
  const balanceDelta = Math.abs(hours[a] - hours[b]);

  const otherHours: Partial<HoursByProvider> = {};
  for (const p of CARE_PROVIDERS) {
    if (p !== a && p !== b && hours[p] > 0) otherHours[p] = hours[p];
  }

  const fraction: Partial<HoursByProvider> = {};
  fraction[a] = pairTotal > 0 ? hours[a] / pairTotal : 0;
  fraction[b] = pairTotal > 0 ? hours[b] / pairTotal : 0;

  const perDay = careWindowHours(options.careWindow ?? DEFAULT_CARE_WINDOW);
  let gap: CareBalanceGap | null = null;
  if (balanceDelta > 0) {
    const fullDays = Math.floor(balanceDelta / perDay);
    gap = {
      ahead: hours[a] > hours[b] ? a : b,
      behind: hours[a] > hours[b] ? b : a,
      differenceHours: balanceDelta,
      fullDays,
      remainingHours: balanceDelta - fullDays * perDay,
      careWindowHoursPerDay: perDay
    };
  }

  return {
    hoursByProvider: hours,
    otherHours,
    totalHours: Object.values(hours).reduce((sum, h) => sum + h, 0),
    fraction,
    balanceDelta,
    thresholdHours: options.thresholdHours,
    isBalanced: balanceDelta <= options.thresholdHours,
    gap
  };
}

/** Share of the balanced pair's hours, in [0, 1]; 0 for providers outside the pair. */
export function fractionOf(report: CareBalanceReport, provider: CareProvider): number {
  return report.fraction[provider] ?? 0;
}

export function formatGap(gap: CareBalanceGap): string {
  const { fullDays, remainingHours, differenceHours } = gap;
  if (fullDays > 0 && remainingHours >= 0.25) {
    return `${fullDays} day${fullDays === 1 ? "" : "s"}, ${remainingHours.toFixed(1)} hrs`;
  }
  if (fullDays > 0) return `${fullDays} care-day${fullDays === 1 ? "" : "s"}`;
  return `${differenceHours.toFixed(1)} hrs`;
}

export function careTimeDelta(before: HoursByProvider, after: HoursByProvider): CareTimeDelta {
  const delta: CareTimeDelta = {};
  for (const p of CARE_PROVIDERS) {
    const shift = after[p] - before[p];
    if (shift !== 0) delta[p] = shift;
  }
  return delta;
}

export function formatCareTimeDelta(delta: CareTimeDelta, names: ProviderNames = {}): string {
  const parts = CARE_PROVIDERS.flatMap(p => {
    const shift = delta[p];
    if (shift === undefined) return [];
    return [`${shift > 0 ? "+" : ""}${shift}h ${displayName(p, names)}`];
  });
  return parts.length ? parts.join(", ") : "no change in care hours";
}
