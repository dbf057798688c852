import { describe, it, expect, beforeEach } from "vitest";
import { metrics } from "../metrics.collector";

describe("metrics", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("counts per label set", () => {
    metrics.increment("records_processed_total", { agency: "hse", status: "created" });
    metrics.increment("records_processed_total", { agency: "hse", status: "created" });
    metrics.increment("records_processed_total", { agency: "ea", status: "error" }, 3);

    expect(metrics.get("records_processed_total", { agency: "hse", status: "created" })).toBe(2);
    expect(metrics.get("records_processed_total", { agency: "ea", status: "error" })).toBe(3);
    expect(metrics.get("records_processed_total")).toBe(0);
  });

  it("formats counters under their family", () => {
    metrics.increment("scrape_sessions_total", { status: "completed" });

    const lines = metrics.format().split("\n");

    expect(lines.slice(0, 4)).toEqual([
      "# HELP scrape_sessions_total Scrape sessions by terminal status",
      "# TYPE scrape_sessions_total counter",
      'scrape_sessions_total{status="completed"} 1',
      "",
    ]);
  });

  it("buckets session durations", () => {
    metrics.recordDuration(30);
    metrics.recordDuration(400.5);

    const lines = metrics.format().split("\n");

    expect(lines.slice(-9)).toEqual([
      "# TYPE scrape_session_duration_seconds histogram",
      'scrape_session_duration_seconds_bucket{le="60"} 1',
      'scrape_session_duration_seconds_bucket{le="300"} 1',
      'scrape_session_duration_seconds_bucket{le="900"} 2',
      'scrape_session_duration_seconds_bucket{le="1800"} 2',
      'scrape_session_duration_seconds_bucket{le="3600"} 2',
      'scrape_session_duration_seconds_bucket{le="+Inf"} 2',
      "scrape_session_duration_seconds_count 2",
      "scrape_session_duration_seconds_sum 430.50",
    ]);
  });
});
