/**
 * Scrape Pipeline
 *
 * What a worker runs for one job:
 *   1. insert the pwmr_jobs row
 *   2. scrape the portal (includes the manual verification wait)
 *   3. save next_target rows in one transaction
 *   4. save every section to the document store for the job's year
 *
 * A next_target failure other than MySQL being down is logged and the
 * pipeline carries on; the document store still gets the full result.
 */
import { SECTION_NAMES } from "../config/constants";
import { logger } from "../monitoring/logger";
import type { DocumentPersistenceEngine } from "../persistence/documents/document.engine";
import type { ScrapeJobRepository } from "../persistence/repositories/scrapejob.repository";
import type { Scraper } from "../scraping/pwmr.scraper";
import { DatabaseOperationalError, StorageUnavailableError } from "../shared/errors/persistence.errors";
import { ScrapeFailureError } from "../shared/errors/scrape.errors";
import { errorMessage } from "../shared/errors/service.error";
import type { SaveReport } from "../shared/types/document.types";
import type { JobParamValue, JobPayload } from "../shared/types/job.types";
import { currentYear } from "../shared/utils/date";

export interface ProcessResult {
  /** pwmr_jobs row id */
  resultId: number;
  report: SaveReport;
  nextTargetsSaved: number;
}

/** Runs one dequeued job to completion */
export interface JobProcessor {
  process(job: JobPayload): Promise<ProcessResult>;
}

function textParam(value: JobParamValue | undefined): string {
  if (value === undefined || value === null) return "";
  return String(value);
}

/** The job's year parameter, or the current year when absent or unreadable */
export function jobYear(job: JobPayload): number {
  const raw = job.year;
  const year = typeof raw === "number" ? raw : parseInt(textParam(raw), 10);
  return Number.isInteger(year) && year > 0 ? year : currentYear();
}

export class ScrapePipeline implements JobProcessor {
  private readonly scraper: Scraper;
  private readonly repository: ScrapeJobRepository;
  private readonly engine: DocumentPersistenceEngine;

  constructor(scraper: Scraper, repository: ScrapeJobRepository, engine: DocumentPersistenceEngine) {
    this.scraper = scraper;
    this.repository = repository;
    this.engine = engine;
  }

  async process(job: JobPayload): Promise<ProcessResult> {
    const password = textParam(job.password);
    if (password.length === 0) {
      throw new ScrapeFailureError(`No password available for ${job.email}`);
    }

    const resultId = await this.repository.createScrapeJob({
      email: job.email,
      entityName: textParam(job.entity_name),
      entityType: textParam(job.entity_type),
    });
    logger.info({ jobId: job.job_id, resultId }, "Job row created");

    const outcome = await this.scraper.scrape({ email: job.email, password });

    let nextTargetsSaved = 0;
    const nextTargets = outcome.sections[SECTION_NAMES.NEXT_TARGET] ?? [];
    try {
      nextTargetsSaved = await this.repository.saveNextTargets(resultId, nextTargets);
    } catch (error) {
      if (error instanceof DatabaseOperationalError) throw error;
      logger.error({ jobId: job.job_id, resultId, error: errorMessage(error) }, "Next targets not saved");
    }

    const report = await this.engine.save(
      outcome.sections,
      job.email,
      outcome.entityName || textParam(job.entity_name),
      outcome.entityType || textParam(job.entity_type),
      jobYear(job)
    );
    if (!report.success) {
      throw new StorageUnavailableError(report.message);
    }

    return { resultId, report, nextTargetsSaved };
  }
}
