/**
 * Scrape Job Repository
 *
 * Insert-only access to PWMR_JOBS and NEXT_TARGET.
 * Connection-level failures are rethrown as DatabaseOperationalError so
 * the worker can tell "MySQL is down" apart from a bad row.
 */
import { ConnectionError } from "sequelize";
import sequelize from "../db/sequelize";
import { NextTarget, PwmrJob } from "../db/models";
import { logger } from "../../monitoring/logger";
import { toNextTargetValues } from "../../processing/next-target";
import { DatabaseOperationalError } from "../../shared/errors/persistence.errors";
import type { SectionTable } from "../../shared/types/section.types";
import { nowISO } from "../../shared/utils/date";

export interface JobIdentity {
  email: string;
  entityName: string;
  entityType: string;
}

/** The relational operations the scrape pipeline depends on */
export interface ScrapeJobRepository {
  createScrapeJob(identity: JobIdentity): Promise<number>;
  saveNextTargets(jobId: number, rows: SectionTable): Promise<number>;
}

async function withDatabase<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof ConnectionError) {
      logger.error({ operation, error: error.message }, "MySQL unavailable");
      throw new DatabaseOperationalError(`MySQL unavailable during ${operation}: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Insert the job row.
 *
 * @returns the relational job id
 */
export async function createScrapeJob(identity: JobIdentity): Promise<number> {
  return withDatabase("createScrapeJob", async () => {
    const job = await PwmrJob.create({
      createdAt: nowISO(),
      typeOfEntity: identity.entityType,
      entityName: identity.entityName,
      email: identity.email,
    });
    return job.id;
  });
}

/**
 * Insert all next-target rows for a job in one transaction.
 * Any failing row rolls back the whole batch.
 *
 * @returns number of rows inserted
 */
export async function saveNextTargets(jobId: number, rows: SectionTable): Promise<number> {
  if (rows.length === 0) return 0;

  return withDatabase("saveNextTargets", async () => {
    const created = await sequelize.transaction((transaction) =>
      NextTarget.bulkCreate(
        rows.map((row) => ({ jobId, ...toNextTargetValues(row) })),
        { transaction }
      )
    );
    logger.info({ jobId, rows: created.length }, "Next targets saved");
    return created.length;
  });
}

export const scrapeJobRepository: ScrapeJobRepository = {
  createScrapeJob,
  saveNextTargets,
};
