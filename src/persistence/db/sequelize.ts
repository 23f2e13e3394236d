/**
 * Sequelize Database Connection
 *
 * MySQL holds one row per scrape job (pwmr_jobs) and the next-year
 * target projections scraped for it (next_target). Rows are insert-only.
 */
import { Sequelize } from "sequelize";
import config from "../../config";
import { logger } from "../../monitoring/logger";
import { isTransientConnectionError } from "../../shared/errors/error-classifier";
import { retryWithBackoff } from "../../shared/utils/retry";

const USER = encodeURIComponent(config.dbUser);
const PASSWORD = encodeURIComponent(config.dbPassword);
const URI = `mysql://${USER}:${PASSWORD}@${config.dbHost}:${config.dbPort}/${config.dbName}`;

const sequelize = new Sequelize(URI, {
  dialect: "mysql",
  // Only log queries in development; production uses structured Pino logs
  logging:
    config.env === "development"
      ? (msg) => logger.debug({ sql: msg }, "SQL Query")
      : false,
  pool: {
    max: 5,
    min: 0,
    acquire: 30000,
    idle: 10000,
  },
});

/** Authenticate and create missing tables */
export async function connectDatabase(): Promise<void> {
  await retryWithBackoff(() => sequelize.authenticate(), {
    maxAttempts: 5,
    initialDelayMs: 2000,
    label: "MySQL connection",
    shouldRetry: isTransientConnectionError,
  });
  await sequelize.sync();
  logger.info({ host: config.dbHost, db: config.dbName }, "Connected to MySQL");
}

export default sequelize;
