/**
 * Worker Manager
 *
 * Forks WORKER_COUNT worker processes and keeps them alive:
 * - a worker that exits while the manager is running is respawned
 * - SIGTERM/SIGINT are forwarded; the manager exits once all workers have
 * - the queue length is polled every 5s and logged when it changes
 */
import { fork } from "child_process";
import type { ChildProcess } from "child_process";
import path from "path";
import config from "../config";
import { logger } from "../monitoring/logger";
import { QueueClient } from "../queue/queue.client";
import { QueueUnavailableError } from "../shared/errors/queue.errors";
import { errorMessage } from "../shared/errors/service.error";

const QUEUE_POLL_INTERVAL_MS = 5000;
const RESPAWN_DELAY_MS = 1000;

/** The worker entry beside this file, .ts under tsx and .js once built */
const WORKER_ENTRY = path.join(__dirname, `worker.process${path.extname(__filename)}`);

export class WorkerManager {
  private readonly workers = new Map<number, ChildProcess>();
  private shuttingDown = false;
  private lastQueueLength: number | null = null;
  private pollTimer: NodeJS.Timeout | null = null;
  private readonly queue: QueueClient;
  private readonly count: number;

  constructor(count: number = config.workerCount, queue: QueueClient = new QueueClient()) {
    this.count = Math.max(1, count);
    this.queue = queue;
  }

  start(): void {
    for (let slot = 0; slot < this.count; slot++) {
      this.spawn(slot);
    }
    this.pollTimer = setInterval(() => {
      this.logQueueLength().catch((error: unknown) => {
        logger.warn({ error: errorMessage(error) }, "Queue length poll failed");
      });
    }, QUEUE_POLL_INTERVAL_MS);

    logger.info({ workers: this.count, queue: config.pwmrQueue }, "Worker manager started");
  }

  private spawn(slot: number): void {
    const child = fork(WORKER_ENTRY, [], { execArgv: process.execArgv });
    this.workers.set(slot, child);
    logger.info({ slot, pid: child.pid }, "Worker spawned");

    child.on("exit", (code, signal) => {
      this.workers.delete(slot);
      if (this.shuttingDown) {
        logger.info({ slot, code, signal }, "Worker exited");
        if (this.workers.size === 0) this.finish();
        return;
      }
      logger.error({ slot, code, signal }, "Worker died, respawning");
      setTimeout(() => {
        if (!this.shuttingDown) this.spawn(slot);
      }, RESPAWN_DELAY_MS);
    });
  }

  private async logQueueLength(): Promise<void> {
    try {
      const length = await this.queue.queueLength(config.pwmrQueue);
      if (length !== this.lastQueueLength) {
        logger.info({ queue: config.pwmrQueue, length, previous: this.lastQueueLength }, "Queue length changed");
        this.lastQueueLength = length;
      }
    } catch (error) {
      if (!(error instanceof QueueUnavailableError)) throw error;
      logger.warn("Queue unavailable while polling length");
    }
  }

  stop(signal: NodeJS.Signals): void {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    logger.info({ signal, workers: this.workers.size }, "Stopping workers");

    if (this.pollTimer) clearInterval(this.pollTimer);
    for (const child of this.workers.values()) {
      child.kill(signal);
    }
    if (this.workers.size === 0) this.finish();
  }

  private finish(): void {
    this.queue
      .close()
      .catch((error: unknown) => {
        logger.warn({ error: errorMessage(error) }, "Queue close failed");
      })
      .finally(() => {
        logger.info("All workers stopped");
        process.exit(0);
      });
  }
}

if (require.main === module) {
  const manager = new WorkerManager();
  manager.start();
  process.on("SIGTERM", () => manager.stop("SIGTERM"));
  process.on("SIGINT", () => manager.stop("SIGINT"));
}
