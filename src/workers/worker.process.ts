/**
 * Worker Process Entry
 *
 * Forked by the worker manager, one per worker. Wires the queue client,
 * the scrape pipeline and the credential files into a ScrapeWorker and
 * runs it until SIGTERM/SIGINT.
 *
 * Storage connections are attempted at startup but not required: while
 * MySQL or MongoDB is down, jobs fail with a database error and the worker
 * cools down instead of exiting.
 */
import config from "../config";
import { defaultCredentialLookup } from "../credentials/credential.loader";
import { logger } from "../monitoring/logger";
import { ScrapePipeline } from "../pipeline/scrape.pipeline";
import sequelize, { connectDatabase } from "../persistence/db/sequelize";
import "../persistence/db/models";
import { DocumentPersistenceEngine } from "../persistence/documents/document.engine";
import { MongoEntityStore } from "../persistence/mongo/entity.store";
import { connectMongo, disconnectMongo } from "../persistence/mongo/mongoose";
import { scrapeJobRepository } from "../persistence/repositories/scrapejob.repository";
import { QueueClient } from "../queue/queue.client";
import { PwmrScraper } from "../scraping/pwmr.scraper";
import { errorMessage } from "../shared/errors/service.error";
import { ScrapeWorker } from "./scrape.worker";

async function connectStorage(): Promise<void> {
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
}

async function main(): Promise<void> {
  await connectStorage();

  const queue = new QueueClient();
  const pipeline = new ScrapePipeline(
    new PwmrScraper(),
    scrapeJobRepository,
    new DocumentPersistenceEngine(new MongoEntityStore())
  );
  const worker = new ScrapeWorker(queue, pipeline, defaultCredentialLookup, {
    queueName: config.pwmrQueue,
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Stop requested, finishing current iteration");
    worker.stop();
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  await worker.start();

  await queue.close();
  await disconnectMongo();
  await sequelize.close();
}

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason }, "Unhandled rejection");
  process.exit(1);
});

main()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    logger.fatal({ error: errorMessage(error) }, "Worker process crashed");
    process.exit(1);
  });
