/**
 * Runtime type guards for values read back from Redis and MongoDB.
 */
import { JOB_STATUSES } from "../../config/constants";
import type { JobParamValue, JobStatus } from "../types/job.types";

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

export function isJobParamValue(value: unknown): value is JobParamValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

export function isJobStatus(value: unknown): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}
