import { describe, it, expect } from "vitest";
import { RunStats } from "../run-stats";

describe("RunStats", () => {
  it("starts with nothing completed", () => {
    const stats = new RunStats(4, () => 1000);
    expect(stats.snapshot()).toEqual({
      completed: 0,
      total: 4,
      remaining: 4,
      elapsedMs: 0,
      averageMs: 0,
      etaMs: 0,
    });
  });

  it("projects the remaining time from the average", () => {
    let now = 1000;
    const stats = new RunStats(4, () => now);

    now = 3000;
    stats.recordDocument();
    now = 7000;
    stats.recordDocument();

    expect(stats.snapshot()).toEqual({
      completed: 2,
      total: 4,
      remaining: 2,
      elapsedMs: 6000,
      averageMs: 3000,
      etaMs: 6000,
    });
  });

  it("never reports negative remaining", () => {
    const stats = new RunStats(1, () => 0);
    stats.recordDocument();
    stats.recordDocument();
    expect(stats.snapshot().remaining).toBe(0);
    expect(stats.snapshot().etaMs).toBe(0);
  });
});
