/**
 * Run-level counters: documents done and remaining, elapsed time and a
 * projected finish. Owned by one run, never shared.
 */
export class RunStats {
  private readonly startedAt: number;
  private completed = 0;

  constructor(
    readonly total: number,
    private readonly clock: () => number = Date.now
  ) {
    this.startedAt = clock();
  }

  recordDocument(): void {
    this.completed++;
  }

  snapshot(): {
    completed: number;
    total: number;
    remaining: number;
    elapsedMs: number;
    averageMs: number;
    etaMs: number;
  } {
    const elapsedMs = this.clock() - this.startedAt;
    const remaining = Math.max(0, this.total - this.completed);
    const averageMs = this.completed > 0 ? elapsedMs / this.completed : 0;
    return {
      completed: this.completed,
      total: this.total,
      remaining,
      elapsedMs,
      averageMs,
      etaMs: averageMs * remaining,
    };
  }
}
