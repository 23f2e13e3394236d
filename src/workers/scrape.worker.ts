/**
 * Scrape Worker
 *
 * One blocking loop per OS process:
 *
 *   connecting → idle → claimed → processing → (completed | failed) → idle
 *
 * - Redis down: retry the connection with exponential backoff (5s, 10s, ...
 *   capped at 60s), reset once connected
 * - Queue lost mid-job: drop the connection and go back to connecting; the
 *   job's lease expires and the reaper fails it
 * - MySQL/MongoDB down: fail the job with "Database error: ..." and cool down
 * - Any other failure: fail the job and take the next one
 *
 * A lease key is held for the job while it runs, renewed every third of
 * its TTL.
 */
import { STATUS_MESSAGES } from "../config/constants";
import { backfillCredentials } from "../credentials/credential.loader";
import type { CredentialLookup } from "../credentials/credential.loader";
import { logger } from "../monitoring/logger";
import { metrics } from "../monitoring/metrics.collector";
import type { JobProcessor } from "../pipeline/scrape.pipeline";
import type { QueueClient } from "../queue/queue.client";
import type { JobPayload, JobStatus } from "../queue/queue.types";
import { QueueUnavailableError } from "../shared/errors/queue.errors";
import { CredentialNotFoundError } from "../shared/errors/scrape.errors";
import { errorMessage } from "../shared/errors/service.error";
import { isStorageConnectivityError } from "../shared/errors/error-classifier";
import { workerOptionsFromConfig } from "./worker.config";
import type { ScrapeWorkerOptions } from "./worker.config";

export type WorkerState = "connecting" | "idle" | "claimed" | "processing" | "stopped";

export interface JobOutcome {
  status: Extract<JobStatus, "completed" | "failed">;
  message: string;
  /** Storage was unreachable; pause before the next job */
  cooldown: boolean;
}

export class ScrapeWorker {
  private readonly queue: QueueClient;
  private readonly processor: JobProcessor;
  private readonly credentials: CredentialLookup;
  private readonly options: ScrapeWorkerOptions;
  private reconnectDelayMs: number;
  private stopping = false;
  private state: WorkerState = "connecting";

  constructor(
    queue: QueueClient,
    processor: JobProcessor,
    credentials: CredentialLookup,
    options: Partial<ScrapeWorkerOptions> = {}
  ) {
    this.queue = queue;
    this.processor = processor;
    this.credentials = credentials;
    this.options = workerOptionsFromConfig(options);
    this.reconnectDelayMs = this.options.reconnectInitialDelayMs;
  }

  get currentState(): WorkerState {
    return this.state;
  }

  /** Delay the next failed connection attempt will wait */
  get nextReconnectDelayMs(): number {
    return this.reconnectDelayMs;
  }

  /** Ask the loop to exit after the current iteration */
  stop(): void {
    this.stopping = true;
  }

  async start(): Promise<void> {
    logger.info({ workerId: this.options.workerId, queue: this.options.queueName }, "Worker started");
    while (!this.stopping) {
      await this.tick();
    }
    this.state = "stopped";
    logger.info({ workerId: this.options.workerId }, "Worker stopped");
  }

  /** One loop iteration. Never throws. */
  async tick(): Promise<void> {
    try {
      if (!this.queue.isConnected) {
        this.state = "connecting";
        if (!(await this.queue.ensureConnection())) {
          logger.warn(
            { workerId: this.options.workerId, retryInMs: this.reconnectDelayMs },
            "Queue unavailable, backing off"
          );
          await this.options.sleep(this.reconnectDelayMs);
          this.reconnectDelayMs = Math.min(this.reconnectDelayMs * 2, this.options.reconnectMaxDelayMs);
          return;
        }
        this.reconnectDelayMs = this.options.reconnectInitialDelayMs;
        logger.info({ workerId: this.options.workerId }, "Connected to queue");
      }

      this.state = "idle";
      const job = await this.queue.dequeueBlocking(this.options.queueName, this.options.dequeueTimeoutSeconds);
      if (!job) return;

      this.state = "claimed";
      await this.handle(job);
      this.state = "idle";
    } catch (error) {
      if (error instanceof QueueUnavailableError) {
        logger.warn({ workerId: this.options.workerId, error: error.message }, "Lost queue connection");
        await this.queue.reset();
        this.state = "connecting";
        return;
      }

      logger.error(
        { workerId: this.options.workerId, error: errorMessage(error) },
        "Unexpected error in worker loop"
      );
      await this.options.sleep(this.options.unexpectedErrorPauseMs);
    }
  }

  private async handle(job: JobPayload): Promise<void> {
    const startTime = Date.now();
    logger.info({ jobId: job.job_id, email: job.email }, "Job claimed");

    await this.queue.updateStatus(job.job_id, "processing", STATUS_MESSAGES.PROCESSING);
    await this.queue.acquireLease(job.job_id, this.options.workerId, this.options.leaseTtlMs);
    const heartbeat = this.startHeartbeat(job.job_id);

    let outcome: JobOutcome | undefined;
    try {
      this.state = "processing";
      outcome = await this.run(job);
      this.record(job, outcome, (Date.now() - startTime) / 1000);
      await this.queue.updateStatus(job.job_id, outcome.status, outcome.message);
    } finally {
      clearInterval(heartbeat);
      await this.releaseLease(job.job_id);
      if (outcome?.cooldown) {
        logger.warn({ cooldownMs: this.options.storageCooldownMs }, "Storage unavailable, cooling down");
        await this.options.sleep(this.options.storageCooldownMs);
      }
    }
  }

  private record(job: JobPayload, outcome: JobOutcome, durationSeconds: number): void {
    metrics.increment("scrape_jobs_total", { status: outcome.status });
    metrics.recordDuration(durationSeconds);

    const context = { jobId: job.job_id, status: outcome.status, durationSeconds };
    if (outcome.status === "completed") {
      logger.info(context, outcome.message);
    } else {
      logger.error(context, outcome.message);
    }
  }

  /** Run the processor and turn its result or error into a final status */
  async run(job: JobPayload): Promise<JobOutcome> {
    try {
      const ready = this.hasPassword(job) ? job : await backfillCredentials(job, this.credentials);
      const result = await this.processor.process(ready);
      return {
        status: "completed",
        message: `Scraping completed successfully. Result ID: ${result.resultId}`,
        cooldown: false,
      };
    } catch (error) {
      if (error instanceof CredentialNotFoundError) {
        return { status: "failed", message: error.message, cooldown: false };
      }
      if (isStorageConnectivityError(error)) {
        return { status: "failed", message: `Database error: ${errorMessage(error)}`, cooldown: true };
      }
      return { status: "failed", message: `Scraping failed: ${errorMessage(error)}`, cooldown: false };
    }
  }

  private hasPassword(job: JobPayload): boolean {
    return typeof job.password === "string" && job.password.length > 0;
  }

  private startHeartbeat(jobId: string): NodeJS.Timeout {
    const interval = Math.max(Math.floor(this.options.leaseTtlMs / 3), 1000);
    const timer = setInterval(() => {
      this.queue.renewLease(jobId, this.options.workerId, this.options.leaseTtlMs).catch((error: unknown) => {
        logger.warn({ jobId, error: errorMessage(error) }, "Lease renewal failed");
      });
    }, interval);
    timer.unref();
    return timer;
  }

  private async releaseLease(jobId: string): Promise<void> {
    try {
      await this.queue.releaseLease(jobId);
    } catch (error) {
      logger.warn({ jobId, error: errorMessage(error) }, "Lease release failed; it will expire");
    }
  }
}
