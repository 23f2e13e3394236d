/**
 * MongoDB Connection (Mongoose)
 *
 * Holds the per-entity scrape documents and their overflow chunks.
 * Command buffering is disabled: while MongoDB is down, queries fail
 * straight away instead of queueing, so the worker can cool down.
 */
import mongoose from "mongoose";
import config from "../../config";
import { logger } from "../../monitoring/logger";
import { isTransientConnectionError } from "../../shared/errors/error-classifier";
import { retryWithBackoff } from "../../shared/utils/retry";

mongoose.set("bufferCommands", false);

let listenersAttached = false;

function openConnection(): Promise<typeof mongoose> {
  return mongoose.connect(config.mongoUri, {
    dbName: config.mongoDbName,
    serverSelectionTimeoutMS: 5000,
  });
}

export async function connectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 1) return;

  await retryWithBackoff(openConnection, {
    maxAttempts: 5,
    initialDelayMs: 2000,
    label: "MongoDB connection",
    shouldRetry: isTransientConnectionError,
  });
  attachListeners();
  logger.info({ dbName: config.mongoDbName }, "Connected to MongoDB");
}

/**
 * One connection attempt when the initial connect never succeeded.
 * Once connected, the driver reconnects on its own.
 */
export async function reconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState !== 0) return;
  await openConnection();
  attachListeners();
  logger.info({ dbName: config.mongoDbName }, "Reconnected to MongoDB");
}

function attachListeners(): void {
  if (!listenersAttached) {
    listenersAttached = true;
    mongoose.connection.on("error", (err: Error) => {
      logger.error({ error: err.message }, "MongoDB runtime error");
    });
    mongoose.connection.on("disconnected", () => {
      logger.warn("Disconnected from MongoDB");
    });
  }
}

export async function disconnectMongo(): Promise<void> {
  await mongoose.disconnect();
  logger.info("Disconnected from MongoDB");
}

export default mongoose;
