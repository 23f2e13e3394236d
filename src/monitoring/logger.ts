/**
 * Shared pino logger for every process of the scraper: the API server,
 * the worker processes forked by the worker manager, and the maintenance
 * CLI. Pretty-printed in development, JSON elsewhere.
 *
 * Base fields: service, and pid to tell forked workers apart in the
 * combined output.
 */
import pino from "pino";
import config from "../config";

export const logger = pino({
  level: config.logLevel,
  transport:
    config.env === "development"
      ? { target: "pino-pretty", options: { colorize: true } }
      : undefined,
  base: {
    service: "epr-compliance-scraper",
    pid: process.pid,
  },
});
