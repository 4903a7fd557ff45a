import { describe, expect, it } from "vitest";

import { runWithConcurrency } from "../src/core/pool";

describe("runWithConcurrency", () => {
  it("keeps input order, caps in-flight work and isolates failures", async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await runWithConcurrency([1, 2, 3, 4, 5], 2, async (value) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5 * (6 - value)));
      inFlight -= 1;
      if (value === 3) throw new Error("three");
      return value * 10;
    });

    expect(peak).toBe(2);
    expect(results.map((entry) => (entry.ok ? entry.value : `error: ${String(entry.error)}`))).toEqual([
      10,
      20,
      "error: Error: three",
      40,
      50,
    ]);
  });

  it("returns nothing for no items", async () => {
    expect(await runWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});
