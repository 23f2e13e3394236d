/**
 * Application Constants
 *
 * Static values that don't change per environment.
 * Includes Redis key prefixes, job status ordering, document store limits,
 * portal selectors and error codes.
 */

// --- Redis Keys ---
export const REDIS_KEYS = {
  /** Hash per job: job_status:{job_id} */
  STATUS_PREFIX: "job_status:",
  /** String per in-flight job holding the owning worker id */
  LEASE_PREFIX: "job_lease:",
} as const;

// --- Job Status ---
export const JOB_STATUSES = ["queued", "processing", "completed", "failed"] as const;

/** Position of each status in the lifecycle. Terminal states share a rank. */
export const STATUS_RANK = {
  queued: 0,
  processing: 1,
  completed: 2,
  failed: 2,
} as const;

export const STATUS_MESSAGES = {
  QUEUED: "Job queued, waiting for worker",
  PROCESSING: "Scraping in progress...",
  LEASE_EXPIRED: "Worker lease expired; job abandoned",
} as const;

// --- Document Store ---
export const DOCUMENT_LIMITS = {
  /** MongoDB hard ceiling for a single BSON document */
  MAX_DOCUMENT_BYTES: 16 * 1024 * 1024,
  SAFETY_MARGIN_BYTES: 1024 * 1024,
  /** JSON is smaller than BSON for arrays of objects */
  SIZE_OVERHEAD_FACTOR: 1.2,
  DEFAULT_CHUNK_SIZE: 1000,
  MAX_CHUNKS: 50,
} as const;

/** Columns repeated on every scraped row; stored once at document level */
export const IDENTITY_COLUMNS = ["Type_of_entity", "Entity_Name", "Email"] as const;

/** Row-level labels that place a row in a specific financial year */
export const FINANCIAL_YEAR_COLUMNS = [
  "Financial Year",
  "Financial_Year",
  "financial_year",
  "FinancialYear",
  "FY",
] as const;

export const UNKNOWN_VALUE = "Unknown";
export const REF_SUFFIX = "_ref";

// --- Portal ---
export const PORTAL = {
  LOGIN_PATH: "/#/plastic/home",
  DASHBOARD_PATH: "/#/epr/pibo-dashboard-view",
  PROCUREMENT_PATH: "/#/epr/pibo-operations/material",
  SALES_PATH: "/#/epr/pibo-operations/sales",
  WALLET_PATH: "/#/epr/pibo-wallet",
  ANNUAL_PATH: "/#/epr/annual-report-filing",
  /** First financial year with portal data (April–March) */
  FIRST_FINANCIAL_YEAR: 2020,
  SELECTORS: {
    USER_INPUT: "#user_name",
    PASSWORD_INPUT: "#password_pass",
    LOGGED_IN_MARKER: "span.account-name",
    DATE_FROM: "#date_from",
    DATE_TO: "#date_to",
    FETCH_BUTTON: "button::-p-text(Fetch)",
    TABLE_BODY: "#ScrollableSimpleTableBody",
    PROFILE_MENU: "#user_profile",
  },
  LABELS: {
    ENTITY_TYPE: "User Type",
    COMPANY_NAME: "Company Name",
  },
  SETTLE_DELAY_MS: 3000,
} as const;

export const SECTION_NAMES = {
  PROCUREMENT: "procurement",
  SALES: "sales",
  WALLET: "wallet",
  TARGET: "target",
  ANNUAL: "annual",
  COMPLIANCE: "compliance",
  NEXT_TARGET: "next_target",
} as const;

// --- Error Codes ---
export const ERROR_CODES = {
  QUEUE_UNAVAILABLE: "QUEUE_UNAVAILABLE",
  VALIDATION_FAILED: "VALIDATION_FAILED",
  SERIALIZATION_FAILED: "SERIALIZATION_FAILED",
  CREDENTIAL_NOT_FOUND: "CREDENTIAL_NOT_FOUND",
  SCRAPE_FAILED: "SCRAPE_FAILED",
  MANUAL_VERIFICATION_TIMEOUT: "MANUAL_VERIFICATION_TIMEOUT",
  PERSISTENCE_FAILED: "PERSISTENCE_FAILED",
  DB_OPERATIONAL_ERROR: "DB_OPERATIONAL_ERROR",
  STORAGE_UNAVAILABLE: "STORAGE_UNAVAILABLE",
  UNKNOWN: "UNKNOWN",
} as const;
