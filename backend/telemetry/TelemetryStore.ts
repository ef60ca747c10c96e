export type TelemetryEvent = {
  ts: string;
  name: string;
  durationMs?: number;
  tags?: Record<string, string | number | boolean | null | undefined>;
  metrics?: Record<string, number | null | undefined>;
  message?: string;
};

export type TelemetryEventInput = Omit<TelemetryEvent, 'ts'> & { ts?: string };

type MetricAggregate = { count: number; sum: number; max: number };

type StageAggregate = {
  count: number;
  totalMs: number;
  maxMs: number;
  metrics: Map<string, MetricAggregate>;
};

/** Aggregates for one event name, in the order the names were first seen. */
export type StageSummary = {
  name: string;
  count: number;
  totalMs: number;
  maxMs: number;
  metrics: Record<string, { avg: number; max: number }>;
};

const finiteOrNull = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

/**
 * Keeps the most recent events of a run together with per-name aggregates of
 * their durations and numeric metrics.
 */
export class TelemetryStore {
  private readonly capacity: number;
  private readonly events: TelemetryEvent[] = [];
  private readonly stages = new Map<string, StageAggregate>();

  constructor(capacity = 200) {
    this.capacity = Math.max(1, Math.trunc(capacity));
  }

  record(input: TelemetryEventInput): TelemetryEvent {
    const event: TelemetryEvent = { ...input, ts: input.ts ?? new Date().toISOString() };

    this.events.push(event);
    if (this.events.length > this.capacity) this.events.shift();

    let stage = this.stages.get(event.name);
    if (!stage) {
      stage = { count: 0, totalMs: 0, maxMs: 0, metrics: new Map() };
      this.stages.set(event.name, stage);
    }
    stage.count += 1;

    const durationMs = finiteOrNull(event.durationMs);
    if (durationMs !== null) {
      stage.totalMs += durationMs;
      stage.maxMs = Math.max(stage.maxMs, durationMs);
    }

    for (const [metric, raw] of Object.entries(event.metrics ?? {})) {
      const value = finiteOrNull(raw);
      if (value === null) continue;
      const agg = stage.metrics.get(metric);
      if (agg) {
        agg.count += 1;
        agg.sum += value;
        agg.max = Math.max(agg.max, value);
      } else {
        stage.metrics.set(metric, { count: 1, sum: value, max: value });
      }
    }

    return event;
  }

  recent(limit = this.capacity): readonly TelemetryEvent[] {
    const n = Math.max(0, Math.trunc(limit));
    return n === 0 ? [] : this.events.slice(-n);
  }

  summary(): StageSummary[] {
    return Array.from(this.stages, ([name, stage]) => ({
      name,
      count: stage.count,
      totalMs: stage.totalMs,
      maxMs: stage.maxMs,
      metrics: Object.fromEntries(
        Array.from(stage.metrics, ([metric, agg]) => [metric, { avg: agg.sum / agg.count, max: agg.max }]),
      ),
    }));
  }

  clear(): void {
    this.events.length = 0;
    this.stages.clear();
  }
}
