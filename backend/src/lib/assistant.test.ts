import { describe, expect, it } from "vitest";
import { buildSystemPrompt } from "./assistant.js";
import { block } from "./testing.js";

describe("buildSystemPrompt", () => {
  const lines = buildSystemPrompt({
    instruction: "swap Monday and Tuesday",
    today: "2025-03-03",
    careWindow: { start: 28, end: 78 },
    names: { parent_a: "Sam" },
    blocks: [
      block("past", "2025-03-01", 32, 48),
      block("mon", "2025-03-03", 32, 48),
      { ...block("pickup@2025-03-04", "2025-03-04", 60, 72, "nanny"), seriesId: "pickup", notes: "pickup" },
      block("far", "2025-04-01", 32, 48)
    ]
  }).split("\n");

  it("states today and the care window", () => {
    expect(lines).toContain("Today is Mon, Mar 3 (2025-03-03).");
    expect(lines).toContain(
      "CARE TIME WINDOW: every block MUST have start_slot >= 28 and end_slot <= 78 (7:00 AM - 7:30 PM). Time outside the window must not be scheduled."
    );
    expect(lines).toContain("Providers: parent_a (Sam), parent_b (Caregiver 2), nanny (Nanny)");
  });

  it("lists the next four weeks of blocks by day", () => {
    const start = lines.indexOf("Current schedule (next 28 days):");
    expect(lines.slice(start + 1, start + 5)).toEqual([
      "Mon, Mar 3 (2025-03-03):",
      "  - Sam [parent_a]: 8:00 AM - 12:00 PM (slots 32-48)",
      "Tue, Mar 4 (2025-03-04):",
      "  - Nanny [nanny]: 3:00 PM - 6:00 PM (slots 60-72) [RECURRING] (pickup)"
    ]);
    expect(lines.some(l => l.includes("2025-04-01") || l.includes("2025-03-01"))).toBe(false);
  });
});
