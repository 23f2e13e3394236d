import { describe, it, expect } from "vitest";
import { MetricsCollector } from "../metrics.collector";

describe("MetricsCollector", () => {
  it("counts each increment once per label set", () => {
    const collector = new MetricsCollector();

    collector.increment("scrape_jobs_total", { status: "completed" });
    collector.increment("scrape_jobs_total", { status: "completed" });
    collector.increment("scrape_jobs_total", { status: "failed" });

    expect(collector.value("scrape_jobs_total", { status: "completed" })).toBe(2);
    expect(collector.value("scrape_jobs_total", { status: "failed" })).toBe(1);
    expect(collector.value("document_section_errors_total")).toBe(0);
  });

  it("formats labelled counters in the exposition text", () => {
    const collector = new MetricsCollector();
    collector.increment("document_sections_saved_total", { mode: "overflow" });

    const lines = collector.format().split("\n");

    expect(lines).toContain('document_sections_saved_total{mode="overflow"} 1');
    expect(lines).toContain("scrape_job_duration_seconds_count 0");
  });
});
