/**
 * Tests for the per-job scrape pipeline.
 */
import { describe, it, expect, beforeEach } from "vitest";
import { jobYear, ScrapePipeline } from "../scrape.pipeline";
import { DocumentPersistenceEngine } from "../../persistence/documents/document.engine";
import type { JobIdentity, ScrapeJobRepository } from "../../persistence/repositories/scrapejob.repository";
import type { ScrapeOutcome, ScrapeRequest, Scraper } from "../../scraping/pwmr.scraper";
import { DatabaseOperationalError, StorageUnavailableError } from "../../shared/errors/persistence.errors";
import { ScrapeFailureError } from "../../shared/errors/scrape.errors";
import type { JobParams, JobPayload } from "../../shared/types/job.types";
import type { SectionTable } from "../../shared/types/section.types";
import { currentYear } from "../../shared/utils/date";
import { InMemoryEntityStore } from "../../__tests__/fakes/in-memory-entity-store";

const EMAIL = "ops@example.com";

class FakeScraper implements Scraper {
  requests: ScrapeRequest[] = [];

  async scrape(request: ScrapeRequest): Promise<ScrapeOutcome> {
    this.requests.push(request);
    return {
      entityName: "Acme Plastics",
      entityType: "Brand Owner",
      sections: {
        wallet: [{ Credit: "EPR-1", Balance: 120 }],
        next_target: [{ "Next Year": "2025", "Projected Amount": "1,200.5" }],
        sales: [],
      },
    };
  }
}

class FakeRepository implements ScrapeJobRepository {
  jobs: JobIdentity[] = [];
  nextTargets: SectionTable[] = [];
  nextTargetError: Error | null = null;

  async createScrapeJob(identity: JobIdentity): Promise<number> {
    this.jobs.push(identity);
    return this.jobs.length;
  }

  async saveNextTargets(_jobId: number, rows: SectionTable): Promise<number> {
    if (this.nextTargetError) throw this.nextTargetError;
    this.nextTargets.push(rows);
    return rows.length;
  }
}

function job(params: JobParams = {}): JobPayload {
  const payload: JobPayload = {
    job_id: "job-1",
    email: EMAIL,
    created_at: "2024-06-01T00:00:00.000Z",
    password: "test-secret",
    entity_name: "Acme",
    entity_type: "Producer",
    year: 2024,
  };
  Object.assign(payload, params);
  return payload;
}

describe("ScrapePipeline", () => {
  let scraper: FakeScraper;
  let repository: FakeRepository;
  let store: InMemoryEntityStore;
  let pipeline: ScrapePipeline;

  beforeEach(() => {
    scraper = new FakeScraper();
    repository = new FakeRepository();
    store = new InMemoryEntityStore();
    pipeline = new ScrapePipeline(scraper, repository, new DocumentPersistenceEngine(store));
  });

  it("creates the job row, saves next targets and writes the document", async () => {
    const result = await pipeline.process(job());

    expect(result.resultId).toBe(1);
    expect(result.nextTargetsSaved).toBe(1);
    expect(result.report.success).toBe(true);
    expect(result.report.sectionsSaved).toBe(2);
    expect(result.report.years).toEqual(["2024"]);

    expect(scraper.requests).toEqual([{ email: EMAIL, password: "test-secret" }]);
    expect(repository.jobs).toEqual([{ email: EMAIL, entityName: "Acme", entityType: "Producer" }]);

    const saved = store.entities.get(EMAIL);
    expect(saved?.company_name).toBe("Acme Plastics");
    expect(saved?.entity_type).toBe("Brand Owner");
    expect(saved?.scrap_data["2024"]?.wallet).toEqual([{ Credit: "EPR-1", Balance: 120 }]);
  });

  it("keeps going when next targets fail for a reason other than MySQL being down", async () => {
    repository.nextTargetError = new Error("Incorrect decimal value");

    const result = await pipeline.process(job());

    expect(result.nextTargetsSaved).toBe(0);
    expect(result.report.success).toBe(true);
  });

  it("propagates MySQL outages from next-target saving", async () => {
    repository.nextTargetError = new DatabaseOperationalError("MySQL unavailable during saveNextTargets");

    await expect(pipeline.process(job())).rejects.toBeInstanceOf(DatabaseOperationalError);
    expect(store.entities.size).toBe(0);
  });

  it("fails with StorageUnavailableError when the document store is down", async () => {
    store.down = true;

    await expect(pipeline.process(job())).rejects.toBeInstanceOf(StorageUnavailableError);
  });

  it("refuses to scrape without a password", async () => {
    await expect(pipeline.process(job({ password: "" }))).rejects.toBeInstanceOf(ScrapeFailureError);
    expect(repository.jobs).toEqual([]);
    expect(scraper.requests).toEqual([]);
  });
});

describe("jobYear", () => {
  it("reads numeric and string years", () => {
    expect(jobYear(job({ year: 2023 }))).toBe(2023);
    expect(jobYear(job({ year: "2022" }))).toBe(2022);
  });

  it("falls back to the current year", () => {
    expect(jobYear(job({ year: null }))).toBe(currentYear());
    expect(jobYear(job({ year: "soon" }))).toBe(currentYear());
  });
});
