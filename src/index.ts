/**
 * Entry Point
 *
 * Starts the API process:
 * 1. API Server: scrape requests, job status, stored data, monitoring
 * 2. Maintenance scheduler: failed-job cleanup and abandoned-job reaping
 *
 * Scrape workers run as separate processes (see workers/worker.manager).
 * Storage connections are attempted at startup; the API still serves
 * queue endpoints while MongoDB or MySQL is down and reports it on /health.
 */
import config from "./config";
import sequelize, { connectDatabase } from "./persistence/db/sequelize";
import "./persistence/db/models"; // Ensure models are registered
import { startServer } from "./api/server";
import { defaultCredentialLookup } from "./credentials/credential.loader";
import { checkHealth } from "./monitoring/health.checker";
import { logger } from "./monitoring/logger";
import { metrics } from "./monitoring/metrics.collector";
import { DocumentPersistenceEngine } from "./persistence/documents/document.engine";
import { MongoEntityStore } from "./persistence/mongo/entity.store";
import { connectMongo, disconnectMongo } from "./persistence/mongo/mongoose";
import { QueueClient } from "./queue/queue.client";
import { QueueUnavailableError } from "./shared/errors/queue.errors";
import { errorMessage } from "./shared/errors/service.error";
import { MaintenanceScheduler } from "./scheduler/maintenance.scheduler";

const queue = new QueueClient();
const entityStore = new MongoEntityStore();
const scheduler = new MaintenanceScheduler(queue);

async function main(): Promise<void> {
  logger.info(
    { env: config.env, port: config.port },
    "Starting EPR compliance scraper API"
  );

  // 1. Storage connections (non-fatal)
  try {
    await connectDatabase();
  } catch (error) {
    logger.error({ error: errorMessage(error) }, "MySQL unavailable at startup");
  }
  try {
    await connectMongo();
  } catch (error) {
    logger.error({ error: errorMessage(error) }, "MongoDB unavailable at startup");
  }
  if (!(await queue.ensureConnection())) {
    logger.warn("Redis unavailable at startup; enqueue requests will answer 503 until it is back");
  }

  // 2. Start API server
  await startServer({
    queue,
    engine: new DocumentPersistenceEngine(entityStore),
    credentials: defaultCredentialLookup,
    metrics,
    queueName: config.pwmrQueue,
    serviceSecret: config.serviceSecret,
    health: () =>
      checkHealth({
        redis: async () => {
          if (!(await queue.ensureConnection())) throw new QueueUnavailableError();
        },
        mongo: () => entityStore.ping(),
        mysql: () => sequelize.authenticate(),
      }),
  });

  // 3. Start maintenance scheduler
  scheduler.start();

  logger.info("All subsystems started, service is ready");
}

// --- Graceful Shutdown ---
async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Shutdown signal received");

  try {
    scheduler.stop();
    await queue.close();
    await disconnectMongo();
    await sequelize.close();
    logger.info("Graceful shutdown complete");
    process.exit(0);
  } catch (error) {
    logger.error(
      { error: errorMessage(error) },
      "Error during shutdown"
    );
    process.exit(1);
  }
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});
process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  logger.fatal({ error: error.message, stack: error.stack }, "Uncaught exception");
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason }, "Unhandled rejection");
  process.exit(1);
});

// Start the service
main().catch((error: unknown) => {
  logger.fatal({ error: errorMessage(error) }, "Failed to start service");
  process.exit(1);
});
