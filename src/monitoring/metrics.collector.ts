/**
 * Metrics Collector
 *
 * Collects and exposes Prometheus-compatible metrics via GET /metrics.
 * Tracks: job counts by status, document sections saved by storage mode,
 * and a job duration histogram.
 *
 * Counters live in process memory, so each worker process keeps its own.
 */

interface MetricCounters {
  [key: string]: number;
}

const COUNTERS = [
  { name: "scrape_jobs_total", help: "Total scrape jobs processed" },
  { name: "document_sections_saved_total", help: "Document sections written, by storage mode" },
  { name: "document_section_errors_total", help: "Document sections that failed to persist" },
] as const;

export type CounterName = (typeof COUNTERS)[number]["name"];

export class MetricsCollector {
  private counters: MetricCounters = {};
  private durations: number[] = [];
  private maxDurationSamples = 1000;

  /** Increment a counter metric */
  increment(name: CounterName, labels: Record<string, string> = {}): void {
    const key = this.buildKey(name, labels);
    this.counters[key] = (this.counters[key] || 0) + 1;
  }

  /** Current value of a counter, 0 when never incremented */
  value(name: CounterName, labels: Record<string, string> = {}): number {
    return this.counters[this.buildKey(name, labels)] || 0;
  }

  /** Record a job duration for histogram */
  recordDuration(durationSeconds: number): void {
    this.durations.push(durationSeconds);
    if (this.durations.length > this.maxDurationSamples) {
      this.durations = this.durations.slice(-this.maxDurationSamples);
    }
  }

  reset(): void {
    this.counters = {};
    this.durations = [];
  }

  /**
   * Format all metrics as Prometheus text exposition format.
   * This string is returned by the /metrics endpoint.
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

    // Scrapes include a manual verification step, so buckets run long
    lines.push("# HELP scrape_job_duration_seconds Scrape job duration");
    lines.push("# TYPE scrape_job_duration_seconds histogram");
    const buckets = [30, 60, 120, 300, 600, 1200];
    for (const le of buckets) {
      const count = this.durations.filter((d) => d <= le).length;
      lines.push(`scrape_job_duration_seconds_bucket{le="${le}"} ${count}`);
    }
    lines.push(`scrape_job_duration_seconds_bucket{le="+Inf"} ${this.durations.length}`);
    lines.push(`scrape_job_duration_seconds_count ${this.durations.length}`);
    const sum = this.durations.reduce((a, b) => a + b, 0);
    lines.push(`scrape_job_duration_seconds_sum ${sum.toFixed(2)}`);

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
