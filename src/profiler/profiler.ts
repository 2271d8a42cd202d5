/**
 * Lightweight profiler for tracking per-phase durations of a search run.
 */

export interface ProfileMetrics {
  count: number;
  totalTimeMs: number;
  minMs: number;
  maxMs: number;
}

export class Profiler {
  private metrics = new Map<string, ProfileMetrics>();

  record(key: string, durationMs: number): void {
    let metric = this.metrics.get(key);
    if (!metric) {
      metric = {
        count: 0,
        totalTimeMs: 0,
        minMs: Number.MAX_VALUE,
        maxMs: 0
      };
      this.metrics.set(key, metric);
    }

    metric.count++;
    metric.totalTimeMs += durationMs;
    metric.minMs = Math.min(metric.minMs, durationMs);
    metric.maxMs = Math.max(metric.maxMs, durationMs);
  }

  /**
   * Run `fn` and record how long it took under `key`, whether it succeeds or throws.
   */
  async time<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.record(key, performance.now() - start);
    }
  }

  getMetrics(key: string): ProfileMetrics | undefined {
    return this.metrics.get(key);
  }

  getAverageMs(key: string): number {
    const metric = this.metrics.get(key);
    if (!metric || metric.count === 0) {
      return 0;
    }
    return metric.totalTimeMs / metric.count;
  }

  getAllMetrics(): Map<string, ProfileMetrics> {
    return new Map(this.metrics);
  }

  reset(): void {
    this.metrics.clear();
  }
}
