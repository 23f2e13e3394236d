/**
 * Maintenance Scheduler
 *
 * Runs queue housekeeping on a node-cron schedule inside the API process:
 * - failed statuses older than FAILED_JOB_MAX_AGE_MINUTES are deleted
 * - processing jobs whose worker lease has lapsed are marked failed
 *
 * Default schedule: every minute.
 */
import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import config from "../config";
import { logger } from "../monitoring/logger";
import type { QueueClient } from "../queue/queue.client";
import { cleanFailedJobs, reapAbandonedJobs } from "../queue/queue.maintenance";
import { errorMessage } from "../shared/errors/service.error";

export interface MaintenanceResult {
  cleaned: string[];
  reaped: string[];
}

/** A processing job counts as abandoned after two lease periods without activity */
export function reapGraceMs(leaseTtlMs: number = config.leaseTtlMs): number {
  return leaseTtlMs * 2;
}

export async function runMaintenance(
  client: QueueClient,
  maxAgeMinutes: number = config.failedJobMaxAgeMinutes,
  now: Date = new Date()
): Promise<MaintenanceResult> {
  const cleaned = await cleanFailedJobs(client, maxAgeMinutes, now);
  const reaped = await reapAbandonedJobs(client, reapGraceMs(), now);
  return { cleaned, reaped };
}

export class MaintenanceScheduler {
  private readonly client: QueueClient;
  private readonly maxAgeMinutes: number;
  private task: ScheduledTask | null = null;
  private isRunning = false;

  constructor(client: QueueClient, maxAgeMinutes: number = config.failedJobMaxAgeMinutes) {
    this.client = client;
    this.maxAgeMinutes = maxAgeMinutes;
  }

  start(expression: string = config.maintenanceCron): void {
    logger.info({ cronExpression: expression }, "Starting maintenance scheduler");
    this.task = cron.schedule(expression, () => {
      this.runCycle().catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, "Maintenance cycle crashed");
      });
    });
  }

  /** One cycle; overlapping invocations are skipped */
  async runCycle(): Promise<MaintenanceResult | null> {
    if (this.isRunning) {
      logger.warn("Maintenance cycle already in progress, skipping");
      return null;
    }

    this.isRunning = true;
    const startTime = Date.now();
    try {
      const result = await runMaintenance(this.client, this.maxAgeMinutes);
      logger.debug(
        { durationMs: Date.now() - startTime, cleaned: result.cleaned.length, reaped: result.reaped.length },
        "Maintenance cycle completed"
      );
      return result;
    } catch (error) {
      logger.error({ error: errorMessage(error), durationMs: Date.now() - startTime }, "Maintenance cycle failed");
      return null;
    } finally {
      this.isRunning = false;
    }
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }
}
