/**
 * Job Types
 *
 * Payloads travel through the Redis list as JSON; statuses live in a
 * Redis hash per job. Both are flat string-keyed maps of plain values.
 */
import type { JOB_STATUSES } from "../../config/constants";

export type JobStatus = (typeof JOB_STATUSES)[number];

/** Scalar values a job parameter may carry */
export type JobParamValue = string | number | boolean | null;

export type JobParams = Record<string, JobParamValue>;

/** What a caller hands to enqueue(). job_id is assigned by the queue. */
export interface JobRequest extends JobParams {
  email: string;
}

/** A job as stored in and popped from the queue */
export interface JobPayload extends JobParams {
  job_id: string;
  email: string;
  created_at: string;
}

export interface JobStatusRecord {
  job_id: string;
  status: JobStatus;
  message: string;
  created_at: string;
  updated_at: string;
  email: string;
  entity_name: string;
  entity_type: string;
  queue_name: string;
}

/** Minimal view of a job still waiting in the list */
export interface QueuedJobSummary {
  job_id: string;
  email: string;
  entity_name: string;
  queued_at: string;
}

export interface QueueSnapshot {
  count: number;
  jobs: QueuedJobSummary[];
}

/** Parameters stored for one account in a credential file */
export type CredentialEntry = JobParams;

/** Account email → stored parameters (password, entity_name, ...) */
export type CredentialMap = Record<string, CredentialEntry>;
