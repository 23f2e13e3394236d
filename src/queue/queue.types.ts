/**
 * Queue Types — Re-exports from shared types for convenience.
 * Modules in the queue layer import from here.
 */
export type {
  JobParams,
  JobParamValue,
  JobPayload,
  JobRequest,
  JobStatus,
  JobStatusRecord,
  QueuedJobSummary,
  QueueSnapshot,
} from "../shared/types/job.types";
export type { ConnectionFactory, QueueConnection, StoreCommand } from "./queue.connection";
