// ---------------------------------------------------------------------------
// In-process counter registry.
// ---------------------------------------------------------------------------

export type MetricsSnapshot = {
  startedAt: string;
  counters: Record<string, number>;
};

export class MetricsRegistry {
  private readonly counters = new Map<string, number>();
  private readonly startedAt = new Date().toISOString();

  increment(name: string, by = 1): void {
    if (!Number.isFinite(by)) return;
    this.counters.set(name, (this.counters.get(name) ?? 0) + by);
  }

  get(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  snapshot(): MetricsSnapshot {
    return {
      startedAt: this.startedAt,
      counters: Object.fromEntries(this.counters),
    };
  }

  reset(): void {
    this.counters.clear();
  }
}

export type CounterSink = Pick<MetricsRegistry, 'increment'>;

/** Process-wide default; components accept an override through their options. */
export const globalMetrics = new MetricsRegistry();
