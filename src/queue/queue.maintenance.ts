/**
 * Queue Maintenance
 *
 * Housekeeping over the status store:
 * - cleanFailedJobs: remove failed statuses once they are old enough that
 *   nobody is polling them any more
 * - reapAbandonedJobs: fail processing jobs whose worker died (no live lease)
 *
 * Run every minute by the maintenance scheduler and on demand by the
 * maintenance CLI.
 */
import { STATUS_MESSAGES } from "../config/constants";
import { logger } from "../monitoring/logger";
import type { JobStatusRecord } from "../shared/types/job.types";
import { parseTimestamp } from "../shared/utils/date";
import type { QueueClient } from "./queue.client";

/** Last time the status was touched: updated_at, falling back to created_at */
export function lastActivity(record: JobStatusRecord): Date | null {
  return parseTimestamp(record.updated_at) ?? parseTimestamp(record.created_at);
}

/**
 * Delete failed statuses older than maxAgeMinutes.
 * Statuses whose timestamps cannot be parsed are left alone.
 *
 * @returns ids of the deleted jobs
 */
export async function cleanFailedJobs(
  client: QueueClient,
  maxAgeMinutes: number = 5,
  now: Date = new Date()
): Promise<string[]> {
  const cutoff = now.getTime() - maxAgeMinutes * 60000;
  const removed: string[] = [];

  for (const record of await client.listStatuses()) {
    if (record.status !== "failed") continue;

    const activity = lastActivity(record);
    if (!activity) {
      logger.warn({ jobId: record.job_id }, "Failed job has no parseable timestamp, skipping");
      continue;
    }

    if (activity.getTime() < cutoff) {
      await client.deleteStatus(record.job_id);
      removed.push(record.job_id);
    }
  }

  if (removed.length > 0) {
    logger.info({ count: removed.length, maxAgeMinutes }, "Removed old failed jobs");
  }
  return removed;
}

/**
 * Mark processing jobs failed when their lease is gone and they have not
 * been touched for graceMs. They are not requeued: a half-finished portal
 * session cannot be resumed safely.
 *
 * @returns ids of the reaped jobs
 */
export async function reapAbandonedJobs(
  client: QueueClient,
  graceMs: number,
  now: Date = new Date()
): Promise<string[]> {
  const reaped: string[] = [];

  for (const record of await client.listStatuses()) {
    if (record.status !== "processing") continue;

    const activity = lastActivity(record);
    if (activity && now.getTime() - activity.getTime() < graceMs) continue;
    if (await client.hasLease(record.job_id)) continue;

    if (await client.updateStatus(record.job_id, "failed", STATUS_MESSAGES.LEASE_EXPIRED)) {
      reaped.push(record.job_id);
    }
  }

  if (reaped.length > 0) {
    logger.warn({ jobIds: reaped }, "Reaped abandoned jobs");
  }
  return reaped;
}
