/**
 * PWMR Controller
 *
 * Enqueues scrape jobs and exposes job statuses, the waiting queue and the
 * stored scrape documents.
 */
import type { Request, Response } from "express";
import { logger } from "../../monitoring/logger";
import { backfillCredentials } from "../../credentials/credential.loader";
import { validateScrapeRequest } from "../../processing/data-validator";
import { QueueUnavailableError } from "../../shared/errors/queue.errors";
import { CredentialNotFoundError } from "../../shared/errors/scrape.errors";
import { errorMessage } from "../../shared/errors/service.error";
import type { JobRequest } from "../../shared/types/job.types";
import type { ApiDependencies } from "../dependencies";

type Handler = (req: Request, res: Response) => Promise<void>;

export interface PwmrController {
  scrape: Handler;
  getStatus: Handler;
  listJobs: Handler;
  getQueue: Handler;
  getData: Handler;
}

function respondQueueUnavailable(res: Response, error: unknown, operation: string): boolean {
  if (!(error instanceof QueueUnavailableError)) return false;
  logger.error({ operation, error: error.message }, "Queue unavailable");
  res.status(503).json({ error: "Queue service unavailable" });
  return true;
}

export function createPwmrController(deps: ApiDependencies): PwmrController {
  const { queue, engine, credentials, queueName } = deps;

  /**
   * POST /api/v1/pwmr/scrape
   *
   * Body: { email, password?, entity_name?, entity_type?, year?, ... }
   * Without a password the stored credentials for the email are used.
   */
  async function scrape(req: Request, res: Response): Promise<void> {
    const validated = validateScrapeRequest(req.body);
    if (!validated.ok) {
      res.status(400).json({ error: validated.error.message, details: validated.error.details });
      return;
    }

    try {
      let request: JobRequest = validated.value;
      if (!request.password) {
        request = await backfillCredentials(request, credentials);
        logger.info({ email: request.email }, "Loaded stored credentials");
      }

      const jobId = await queue.enqueue(queueName, request);
      res.status(202).json({
        message: "PWMR scraping job queued successfully",
        job_id: jobId,
      });
    } catch (error) {
      if (error instanceof CredentialNotFoundError) {
        res.status(404).json({ error: error.message });
        return;
      }
      if (respondQueueUnavailable(res, error, "enqueue")) return;
      logger.error({ error: errorMessage(error) }, "Failed to queue scrape job");
      res.status(500).json({ error: "Failed to queue scrape job" });
    }
  }

  /** GET /api/v1/pwmr/status/:jobId */
  async function getStatus(req: Request, res: Response): Promise<void> {
    const { jobId } = req.params;
    try {
      const status = await queue.getStatus(jobId);
      if (!status) {
        res.status(404).json({ error: `Job ${jobId} not found` });
        return;
      }
      res.json({ job_id: jobId, status });
    } catch (error) {
      if (respondQueueUnavailable(res, error, "getStatus")) return;
      logger.error({ jobId, error: errorMessage(error) }, "Failed to get job status");
      res.status(500).json({ error: "Failed to retrieve job status" });
    }
  }

  /** GET /api/v1/pwmr/jobs */
  async function listJobs(_req: Request, res: Response): Promise<void> {
    try {
      const jobs = await queue.listStatuses();
      res.json({ jobs, count: jobs.length });
    } catch (error) {
      if (respondQueueUnavailable(res, error, "listStatuses")) return;
      logger.error({ error: errorMessage(error) }, "Failed to list jobs");
      res.status(500).json({ error: "Failed to list jobs" });
    }
  }

  /** GET /api/v1/pwmr/queue */
  async function getQueue(_req: Request, res: Response): Promise<void> {
    try {
      const queued = await queue.peekQueue(queueName);
      const statuses = await queue.listStatuses();
      res.json({
        queued_jobs: queued,
        job_statuses: { count: statuses.length, jobs: statuses },
      });
    } catch (error) {
      if (respondQueueUnavailable(res, error, "peekQueue")) return;
      logger.error({ error: errorMessage(error) }, "Failed to inspect queue");
      res.status(500).json({ error: "Failed to inspect queue" });
    }
  }

  /** GET /api/v1/pwmr/data/:email?year=2024 */
  async function getData(req: Request, res: Response): Promise<void> {
    const { email } = req.params;
    const year = typeof req.query.year === "string" && req.query.year.length > 0 ? req.query.year : undefined;

    try {
      const view = year === undefined ? await engine.get(email) : await engine.get(email, year);
      if (!view) {
        res.status(404).json({ error: `No data found for ${email}` });
        return;
      }
      res.json(view);
    } catch (error) {
      logger.error({ email, year, error: errorMessage(error) }, "Failed to read scrape data");
      res.status(503).json({ error: "Document store unavailable" });
    }
  }

  return { scrape, getStatus, listJobs, getQueue, getData };
}
