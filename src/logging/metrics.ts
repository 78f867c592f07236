import { MetricKind, RequestMetric } from './types.js';

export interface AggregatedMetrics {
  kind: MetricKind;
  name: string;
  count: number;
  total_latency_ms: number;
  avg_latency_ms: number;
  min_latency_ms: number;
  max_latency_ms: number;
  success_rate: number;
  cache_hit_rate: number;
  errors: number;
}

export interface MetricsSnapshot {
  total_requests: number;
  by_kind: Record<MetricKind, number>;
  aggregated: AggregatedMetrics[];
  recent: RequestMetric[];
}

const DEFAULT_CAPACITY = 10000;
const RECENT_COUNT = 100;

function percent(part: number, whole: number): number {
  return whole === 0 ? 0 : Math.round((part / whole) * 100);
}

/** In-memory ring of request metrics; oldest entries drop once `capacity` is reached. */
export class MetricsCollector {
  private metrics: RequestMetric[] = [];

  constructor(
    private enabled: boolean,
    private readonly capacity: number = DEFAULT_CAPACITY
  ) {}

  isEnabled(): boolean {
    return this.enabled;
  }

  /** Disabling drops what was collected so far. */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled) this.clear();
  }

  record(metric: RequestMetric): void {
    if (!this.enabled) return;

    this.metrics.push(metric);
    if (this.metrics.length > this.capacity) {
      this.metrics = this.metrics.slice(-this.capacity);
    }
  }

  getMetrics(): MetricsSnapshot {
    const byKind: Record<MetricKind, number> = { tool: 0, resource: 0, graphql: 0 };
    for (const metric of this.metrics) byKind[metric.kind] += 1;

    return {
      total_requests: this.metrics.length,
      by_kind: byKind,
      aggregated: this.aggregate(),
      recent: this.metrics.slice(-RECENT_COUNT),
    };
  }

  private aggregate(): AggregatedMetrics[] {
    const grouped = new Map<string, RequestMetric[]>();

    for (const metric of this.metrics) {
      const key = `${metric.kind}:${metric.name}`;
      const bucket = grouped.get(key);
      if (bucket) {
        bucket.push(metric);
      } else {
        grouped.set(key, [metric]);
      }
    }

    const result: AggregatedMetrics[] = [];
    for (const bucket of grouped.values()) {
      const [{ kind, name }] = bucket;
      const latencies = bucket.map((m) => m.latency_ms);
      const total = latencies.reduce((a, b) => a + b, 0);
      const successes = bucket.filter((m) => m.success).length;

      result.push({
        kind,
        name,
        count: bucket.length,
        total_latency_ms: total,
        avg_latency_ms: Math.round(total / bucket.length),
        min_latency_ms: Math.min(...latencies),
        max_latency_ms: Math.max(...latencies),
        success_rate: percent(successes, bucket.length),
        cache_hit_rate: percent(bucket.filter((m) => m.cache_hit === true).length, bucket.length),
        errors: bucket.length - successes,
      });
    }

    // Most used first
    return result.sort((a, b) => b.count - a.count);
  }

  clear(): void {
    this.metrics = [];
  }
}
