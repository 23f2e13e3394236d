/**
 * Environment Configuration
 *
 * Centralizes all environment variables into a typed configuration object.
 * All modules import config from here instead of reading process.env directly.
 *
 * Groups:
 * - Server: Express API settings
 * - Redis: job queue and status store
 * - Worker: process count, polling, cooldowns and leases
 * - MongoDB: yearly scrape documents and overflow chunks
 * - Database: MySQL for job rows and next-target projections
 * - Portal: browser and manual verification settings
 * - Credentials: JSON files used to backfill job parameters
 * - Auth: shared bearer secret for the HTTP API
 */
import dotenv from "dotenv";

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function listFromEnv(name: string, fallback: string[]): string[] {
  const raw = process.env[name];
  if (!raw) return fallback;
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const config = {
  // --- Server ---
  env: process.env.NODE_ENV || "development",
  port: intFromEnv("PORT", 4000),
  logLevel: process.env.LOG_LEVEL || "info",
  timezone: process.env.TZ_NAME || "Asia/Kolkata",

  // --- Redis (queue + status store) ---
  redisHost: process.env.REDIS_HOST || "localhost",
  redisPort: intFromEnv("REDIS_PORT", 6379),
  redisPassword: process.env.REDIS_PASSWORD || undefined,
  redisDb: intFromEnv("REDIS_DB", 0),
  pwmrQueue: process.env.PWMR_QUEUE || "pwmr_jobs",
  statusTtlSeconds: intFromEnv("STATUS_TTL_SECONDS", 86400),

  // --- Workers ---
  workerCount: intFromEnv("WORKER_COUNT", 1),
  dequeueTimeoutSeconds: intFromEnv("DEQUEUE_TIMEOUT_SECONDS", 1),
  reconnectInitialDelayMs: intFromEnv("RECONNECT_INITIAL_DELAY_MS", 5000),
  reconnectMaxDelayMs: intFromEnv("RECONNECT_MAX_DELAY_MS", 60000),
  storageCooldownMs: intFromEnv("STORAGE_COOLDOWN_MS", 10000),
  unexpectedErrorPauseMs: intFromEnv("UNEXPECTED_ERROR_PAUSE_MS", 5000),
  leaseTtlMs: intFromEnv("LEASE_TTL_MS", 60000),

  // --- MongoDB ---
  mongoUri: process.env.MONGO_URI || "mongodb://localhost:27017",
  mongoDbName: process.env.MONGO_DB_NAME || "cpcb_scraper",
  mongoCollection: process.env.MONGO_COLLECTION || "pwmr_data",
  mongoOverflowCollection:
    process.env.MONGO_OVERFLOW_COLLECTION || "pwmr_data_overflow",

  // --- Database (MySQL) ---
  dbUser: process.env.DB_USER || "root",
  dbPassword: process.env.DB_PASSWORD || "",
  dbHost: process.env.DB_HOST || "localhost",
  dbPort: process.env.DB_PORT || "3306",
  dbName: process.env.DB_NAME || "epr_compliance",

  // --- Portal / browser ---
  portalBaseUrl: process.env.PORTAL_BASE_URL || "https://eprplastic.cpcb.gov.in",
  chromeExecutablePath:
    process.env.CHROME_EXECUTABLE_PATH || "/usr/bin/google-chrome",
  browserHeadless: process.env.BROWSER_HEADLESS === "true",
  manualVerificationTimeoutMs: intFromEnv(
    "MANUAL_VERIFICATION_TIMEOUT_MS",
    600000
  ),
  pageTimeoutMs: intFromEnv("PAGE_TIMEOUT_MS", 30000),

  // --- Credentials ---
  credentialFiles: listFromEnv("CREDENTIAL_FILES", [
    "credentials.json",
    "credentials1.json",
    "credentials2.json",
  ]),

  // --- Maintenance ---
  failedJobMaxAgeMinutes: intFromEnv("FAILED_JOB_MAX_AGE_MINUTES", 5),
  maintenanceCron: process.env.MAINTENANCE_CRON || "* * * * *",

  // --- Service Authentication ---
  serviceSecret: process.env.SERVICE_SECRET || "change-this-to-a-strong-secret",
};

export type AppConfig = typeof config;

export default config;
