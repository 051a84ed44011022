import { describe, expect, it } from "vitest";
import { careBalance, careTimeDelta, formatCareTimeDelta, formatGap, fractionOf, hoursByProvider, scaledThreshold } from "./balance.js";
import { block } from "./testing.js";
import type { CareProvider, TimeBlock } from "../types.js";

/** One 10-hour block (slots 32-72) per day for the given provider. */
function days(provider: CareProvider, count: number, offset = 0): TimeBlock[] {
  return Array.from({ length: count }, (_, i) => {
    const day = String(3 + offset + i).padStart(2, "0");
    return block(`${provider}-${day}`, `2025-03-${day}`, 32, 72, provider);
  });
}

describe("careBalance", () => {
  it("treats an even split as balanced", () => {
    const report = careBalance([...days("parent_a", 4), ...days("parent_b", 4, 4)], { thresholdHours: 4 });
    expect(report.hoursByProvider).toEqual({ parent_a: 40, parent_b: 40, nanny: 0 });
    expect(report.balanceDelta).toBe(0);
    expect(report.isBalanced).toBe(true);
    expect(report.gap).toBeNull();
    expect(fractionOf(report, "parent_a")).toBe(0.5);
  });

  it("flags a lopsided split", () => {
    const report = careBalance([...days("parent_a", 6), ...days("parent_b", 2, 6)], { thresholdHours: 4 });
    expect(report.balanceDelta).toBe(40);
    expect(report.isBalanced).toBe(false);
    expect(fractionOf(report, "parent_a")).toBe(0.75);
    expect(report.gap).toEqual({
      ahead: "parent_a",
      behind: "parent_b",
      differenceHours: 40,
      fullDays: 3,
      remainingHours: 2.5,
      careWindowHoursPerDay: 12.5
    });
  });

  it("keeps nanny hours out of the balance", () => {
    const report = careBalance([...days("parent_a", 1), ...days("nanny", 3, 1)], { thresholdHours: 12 });
    expect(report.balanceDelta).toBe(10);
    expect(report.otherHours).toEqual({ nanny: 30 });
    expect(report.totalHours).toBe(40);
    expect(report.isBalanced).toBe(true);
    expect(fractionOf(report, "nanny")).toBe(0);
  });

  it("reports zero fractions for an empty schedule", () => {
    const report = careBalance([], { thresholdHours: 4 });
    expect(report.fraction).toEqual({ parent_a: 0, parent_b: 0 });
    expect(report.isBalanced).toBe(true);
  });
});

describe("scaledThreshold", () => {
  it("scales a weekly threshold to the queried days", () => {
    expect(scaledThreshold(7, { from: "2025-03-01", to: "2025-03-14" })).toBe(14);
    expect(scaledThreshold(4)).toBe(4);
  });
});

describe("formatGap", () => {
  const gap = { ahead: "parent_a" as const, behind: "parent_b" as const, careWindowHoursPerDay: 12.5 };

  it("uses days and hours", () => {
    expect(formatGap({ ...gap, differenceHours: 40, fullDays: 3, remainingHours: 2.5 })).toBe("3 days, 2.5 hrs");
    expect(formatGap({ ...gap, differenceHours: 25, fullDays: 2, remainingHours: 0 })).toBe("2 care-days");
    expect(formatGap({ ...gap, differenceHours: 12.5, fullDays: 1, remainingHours: 0 })).toBe("1 care-day");
    expect(formatGap({ ...gap, differenceHours: 3, fullDays: 0, remainingHours: 3 })).toBe("3.0 hrs");
  });
});

describe("careTimeDelta", () => {
  it("keeps only providers whose hours moved", () => {
    const before = hoursByProvider([block("a", "2025-03-03", 32, 48, "parent_a"), block("b", "2025-03-04", 32, 48, "parent_b")]);
    const after = hoursByProvider([block("a", "2025-03-03", 32, 48, "parent_b"), block("b", "2025-03-04", 32, 48, "parent_b")]);
    const delta = careTimeDelta(before, after);
    expect(delta).toEqual({ parent_a: -4, parent_b: 4 });
    expect(formatCareTimeDelta(delta, { parent_b: "Alex" })).toBe("-4h Caregiver 1, +4h Alex");
    expect(formatCareTimeDelta({})).toBe("no change in care hours");
  });
});
