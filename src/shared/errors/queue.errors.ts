/**
 * Queue and status store errors.
 * Transport-level Redis failures never escape the QueueClient as-is;
 * they surface as QueueUnavailableError.
 */
import { ServiceError } from "./service.error";
import { ERROR_CODES } from "../../config/constants";

/** Redis is unreachable or a command failed on the wire */
export class QueueUnavailableError extends ServiceError {
  constructor(message: string = "Queue service unavailable") {
    super(message, ERROR_CODES.QUEUE_UNAVAILABLE, true);
    this.name = "QueueUnavailableError";
  }
}

/** A job payload could not be turned into JSON */
export class SerializationError extends ServiceError {
  constructor(message: string = "Job payload could not be serialized") {
    super(message, ERROR_CODES.SERIALIZATION_FAILED, false);
    this.name = "SerializationError";
  }
}
