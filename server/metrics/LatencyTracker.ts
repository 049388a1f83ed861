export type LatencyStage = 'step' | 'fill';

export interface LatencyStats {
  avgMs: number;
  p95Ms: number;
  minMs: number;
  maxMs: number;
  samples: number;
}

export interface LatencySnapshot {
  updatedAt: number;
  stages: Partial<Record<LatencyStage, LatencyStats>>;
}

function percentile(values: number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const idx = Math.min(sorted.length - 1, Math.max(0, Math.floor(p * (sorted.length - 1))));
  return sorted[idx];
}

/**
 * Step latency: DONE sent until the next snapshot arrives.
 * Fill latency: order sent until its fill arrives (known ids only).
 */
export class LatencyTracker {
  private readonly samples = new Map<LatencyStage, number[]>();
  private readonly windowSize: number;

  constructor(windowSize: number = 1000, private readonly clock: () => number = Date.now) {
    this.windowSize = windowSize;
  }

  record(stage: LatencyStage, durationMs: number): void {
    if (!Number.isFinite(durationMs) || durationMs < 0) return;
    const list = this.samples.get(stage) ?? [];
    list.push(durationMs);
    while (list.length > this.windowSize) list.shift();
    this.samples.set(stage, list);
  }

  /** Average of the most recent `lastN` samples, 0 without samples. */
  recentAverage(stage: LatencyStage, lastN: number = 100): number {
    const list = this.samples.get(stage) ?? [];
    if (list.length === 0) return 0;
    const recent = list.slice(-Math.max(1, lastN));
    return recent.reduce((acc, v) => acc + v, 0) / recent.length;
  }

  snapshot(): LatencySnapshot {
    const stages: Partial<Record<LatencyStage, LatencyStats>> = {};
    for (const [stage, list] of this.samples.entries()) {
      if (list.length === 0) continue;
      const sum = list.reduce((acc, v) => acc + v, 0);
      const avg = sum / list.length;
      stages[stage] = {
        avgMs: Number(avg.toFixed(2)),
        p95Ms: Number(percentile(list, 0.95).toFixed(2)),
        minMs: Number(Math.min(...list).toFixed(2)),
        maxMs: Number(Math.max(...list).toFixed(2)),
        samples: list.length,
      };
    }

    return {
      updatedAt: this.clock(),
      stages,
    };
  }
}
