/**
 * Metrics Collector
 *
 * Collects and exposes Prometheus-compatible metrics via GET /api/portal/v1/metrics.
 * Tracks: workflow runs by name/status, workflow duration histogram and
 * portal detail fetches skipped during listing traversal.
 *
 * Uses simple in-memory counters.
 */

interface MetricCounters {
  [key: string]: number;
}

const COUNTERS = [
  { name: "portal_workflows_total", help: "Portal workflows run" },
  { name: "portal_subfetch_failures_total", help: "Detail or handle fetches skipped in a listing" },
];

export class MetricsCollector {
  private counters: MetricCounters = {};
  private durations: number[] = [];
  private maxDurationSamples = 1000;

  /** Increment a counter metric */
  increment(name: string, labels: Record<string, string> = {}): void {
    const key = this.buildKey(name, labels);
    this.counters[key] = (this.counters[key] || 0) + 1;
  }

  /** Record a workflow duration for the histogram */
  recordDuration(durationSeconds: number): void {
    this.durations.push(durationSeconds);
    if (this.durations.length > this.maxDurationSamples) {
      this.durations = this.durations.slice(-this.maxDurationSamples);
    }
  }

  /** Current value of a counter (0 when never incremented) */
  get(name: string, labels: Record<string, string> = {}): number {
    return this.counters[this.buildKey(name, labels)] ?? 0;
  }

  /**
   * Format all metrics as Prometheus text exposition format.
   */
  format(): string {
    const lines: string[] = [];

    for (const counter of COUNTERS) {
      lines.push(`# HELP ${counter.name} ${counter.help}`);
      lines.push(`# TYPE ${counter.name} counter`);
      for (const [key, value] of Object.entries(this.counters)) {
        if (key === counter.name || key.startsWith(`${counter.name}{`)) {
          lines.push(`${key} ${value}`);
        }
      }
      lines.push("");
    }

    lines.push("# HELP portal_workflow_duration_seconds Portal workflow duration");
    lines.push("# TYPE portal_workflow_duration_seconds histogram");
    const buckets = [1, 5, 15, 60, 300];
    for (const le of buckets) {
      const count = this.durations.filter((d) => d <= le).length;
      lines.push(`portal_workflow_duration_seconds_bucket{le="${le}"} ${count}`);
    }
    lines.push(
      `portal_workflow_duration_seconds_bucket{le="+Inf"} ${this.durations.length}`
    );
    lines.push(`portal_workflow_duration_seconds_count ${this.durations.length}`);
    const sum = this.durations.reduce((a, b) => a + b, 0);
    lines.push(`portal_workflow_duration_seconds_sum ${sum.toFixed(2)}`);

    return lines.join("\n");
  }

  private buildKey(name: string, labels: Record<string, string>): string {
    if (Object.keys(labels).length === 0) return name;
    const labelStr = Object.entries(labels)
      .map(([k, v]) => `${k}="${v}"`)
      .join(",");
    return `${name}{${labelStr}}`;
  }
}

/** Singleton metrics collector instance */
export const metrics = new MetricsCollector();
