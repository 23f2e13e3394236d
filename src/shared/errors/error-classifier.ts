/**
 * Failure classification for storage access.
 *
 * isStorageConnectivityError: MySQL or MongoDB unreachable while a job
 * runs. The worker fails the job with "Database error: ..." and cools
 * down before the next one.
 *
 * isTransientConnectionError: a startup connect that may succeed if tried
 * again. Rejected credentials and malformed connection settings are not.
 */
import mongoose from "mongoose";
import { AccessDeniedError, ConnectionError, InvalidConnectionError } from "sequelize";
import { DatabaseOperationalError, StorageUnavailableError } from "./persistence.errors";

export function isStorageConnectivityError(error: unknown): boolean {
  return (
    error instanceof DatabaseOperationalError ||
    error instanceof StorageUnavailableError ||
    error instanceof ConnectionError ||
    error instanceof mongoose.mongo.MongoNetworkError ||
    error instanceof mongoose.mongo.MongoServerSelectionError
  );
}

export function isTransientConnectionError(error: unknown): boolean {
  if (error instanceof AccessDeniedError || error instanceof InvalidConnectionError) return false;
  return isStorageConnectivityError(error);
}
