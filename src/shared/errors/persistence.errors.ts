/**
 * Storage errors.
 *
 * PersistenceFailureError stays local to one document section.
 * DatabaseOperationalError and StorageUnavailableError mean a whole store is
 * down; the worker treats them as a signal to cool down before the next job.
 */
import { ServiceError } from "./service.error";
import { ERROR_CODES } from "../../config/constants";

export class PersistenceFailureError extends ServiceError {
  public readonly section: string;

  constructor(section: string, message: string) {
    super(`Failed to persist section "${section}": ${message}`, ERROR_CODES.PERSISTENCE_FAILED, false);
    this.name = "PersistenceFailureError";
    this.section = section;
  }
}

/** MySQL could not be reached */
export class DatabaseOperationalError extends ServiceError {
  constructor(message: string) {
    super(message, ERROR_CODES.DB_OPERATIONAL_ERROR, true);
    this.name = "DatabaseOperationalError";
  }
}

/** MongoDB could not be reached */
export class StorageUnavailableError extends ServiceError {
  constructor(message: string) {
    super(message, ERROR_CODES.STORAGE_UNAVAILABLE, true);
    this.name = "StorageUnavailableError";
  }
}
