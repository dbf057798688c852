/**
 * Metrics Collector
 *
 * Collects and exposes Prometheus-compatible metrics via GET /api/enforcement/v1/metrics.
 * Tracks: sessions by terminal status, record outcomes, fetch results,
 * review actions and session duration.
 *
 * Uses simple in-memory counters.
 */

interface MetricCounters {
  [key: string]: number;
}

const COUNTER_FAMILIES = [
  { name: "scrape_sessions_total", help: "Scrape sessions by terminal status" },
  { name: "records_processed_total", help: "Records processed by outcome" },
  { name: "fetch_requests_total", help: "Outbound fetches by result" },
  { name: "match_reviews_total", help: "Match review events by action" },
] as const;

export type CounterName = (typeof COUNTER_FAMILIES)[number]["name"];

class MetricsCollector {
  private counters: MetricCounters = {};
  private durations: number[] = [];
  private maxDurationSamples = 1000;

  /** Increment a counter metric */
  increment(name: CounterName, labels: Record<string, string> = {}, by: number = 1): void {
    const key = this.buildKey(name, labels);
    this.counters[key] = (this.counters[key] || 0) + by;
  }

  /** Current value of a counter (0 when never incremented) */
  get(name: CounterName, labels: Record<string, string> = {}): number {
    return this.counters[this.buildKey(name, labels)] || 0;
  }

  /** Record a session duration for the histogram */
  recordDuration(durationSeconds: number): void {
    this.durations.push(durationSeconds);
    // Keep only the last N samples to bound memory
    if (this.durations.length > this.maxDurationSamples) {
      this.durations = this.durations.slice(-this.maxDurationSamples);
    }
  }

  /**
   * Format all metrics as Prometheus text exposition format.
   * This string is returned by the /metrics endpoint.
   */
  format(): string {
    const lines: string[] = [];

    for (const family of COUNTER_FAMILIES) {
      lines.push(`# HELP ${family.name} ${family.help}`);
      lines.push(`# TYPE ${family.name} counter`);
      for (const [key, value] of Object.entries(this.counters)) {
        if (key === family.name || key.startsWith(`${family.name}{`)) {
          lines.push(`${key} ${value}`);
        }
      }
      lines.push("");
    }

    lines.push("# HELP scrape_session_duration_seconds Scrape session duration");
    lines.push("# TYPE scrape_session_duration_seconds histogram");
    const buckets = [60, 300, 900, 1800, 3600];
    for (const le of buckets) {
      const count = this.durations.filter((d) => d <= le).length;
      lines.push(`scrape_session_duration_seconds_bucket{le="${le}"} ${count}`);
    }
    lines.push(
      `scrape_session_duration_seconds_bucket{le="+Inf"} ${this.durations.length}`
    );
    lines.push(`scrape_session_duration_seconds_count ${this.durations.length}`);
    const sum = this.durations.reduce((a, b) => a + b, 0);
    lines.push(`scrape_session_duration_seconds_sum ${sum.toFixed(2)}`);

    return lines.join("\n");
  }

  /** Drop all samples */
  reset(): void {
    this.counters = {};
    this.durations = [];
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
