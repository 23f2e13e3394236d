/**
 * Worker Configuration
 *
 * Timing and identity settings for one ScrapeWorker loop.
 * Defaults come from the environment; tests override individual fields.
 */
import config from "../config";
import { sleep } from "../shared/utils/retry";

export interface ScrapeWorkerOptions {
  queueName: string;
  workerId: string;
  dequeueTimeoutSeconds: number;
  /** First wait after a failed Redis connection; doubles up to the max */
  reconnectInitialDelayMs: number;
  reconnectMaxDelayMs: number;
  /** Pause after a job failed because MySQL or MongoDB was unreachable */
  storageCooldownMs: number;
  /** Pause after an unexpected error in the loop itself */
  unexpectedErrorPauseMs: number;
  leaseTtlMs: number;
  sleep: (ms: number) => Promise<void>;
}

export function workerOptionsFromConfig(overrides: Partial<ScrapeWorkerOptions> = {}): ScrapeWorkerOptions {
  return {
    queueName: config.pwmrQueue,
    workerId: `worker-${process.pid}`,
    dequeueTimeoutSeconds: config.dequeueTimeoutSeconds,
    reconnectInitialDelayMs: config.reconnectInitialDelayMs,
    reconnectMaxDelayMs: config.reconnectMaxDelayMs,
    storageCooldownMs: config.storageCooldownMs,
    unexpectedErrorPauseMs: config.unexpectedErrorPauseMs,
    leaseTtlMs: config.leaseTtlMs,
    sleep,
    ...overrides,
  };
}
