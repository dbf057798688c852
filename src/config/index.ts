/**
 * Environment Configuration
 *
 * Centralizes all environment variables into a typed configuration object.
 * All modules import config from here instead of reading process.env directly.
 *
 * Groups:
 * - Server: Express API settings
 * - Database: MySQL connection for records, offenders, reviews and sessions
 * - Redis: BullMQ queue backend and progress pub/sub
 * - Fetch: HTTP timeout, retry and pacing toward agency websites
 * - Session: page limits and early-stop thresholds
 * - Resolver: fuzzy-match confidence band
 * - Duplicates: near-duplicate detection thresholds
 * - Registry: Companies House API access
 * - Scheduler: cron expression and scheduled targets
 */
import dotenv from "dotenv";

dotenv.config();

const config = {
  // --- Server ---
  env: process.env.NODE_ENV || "development",
  port: parseInt(process.env.PORT || "4000", 10),
  logLevel: process.env.LOG_LEVEL || "info",

  // --- Database ---
  dbUser: process.env.DB_USER || "root",
  dbPassword: process.env.DB_PASSWORD || "",
  dbHost: process.env.DB_HOST || "localhost",
  dbPort: process.env.DB_PORT || "3306",
  dbName: process.env.DB_NAME || "enforcement",

  // --- Redis ---
  redisHost: process.env.REDIS_HOST || "localhost",
  redisPort: parseInt(process.env.REDIS_PORT || "6379", 10),
  redisPassword: process.env.REDIS_PASSWORD || undefined,

  // --- Fetch ---
  fetchTimeoutMs: parseInt(process.env.FETCH_TIMEOUT_MS || "30000", 10),
  fetchMaxAttempts: parseInt(process.env.FETCH_MAX_ATTEMPTS || "3", 10),
  fetchBaseDelayMs: parseInt(process.env.FETCH_BASE_DELAY_MS || "1000", 10),
  userAgent:
    process.env.SCRAPER_USER_AGENT ||
    "Mozilla/5.0 (compatible; EnforcementRecordScraper/1.0)",
  /** Minimum gap between two requests of the same session */
  detailDelayMs: parseInt(process.env.DETAIL_DELAY_MS || "3000", 10),

  // --- Session ---
  maxPagesPerSession: parseInt(process.env.MAX_PAGES_PER_SESSION || "100", 10),
  consecutiveExistingThreshold: parseInt(
    process.env.CONSECUTIVE_EXISTING_THRESHOLD || "10",
    10
  ),
  maxConsecutiveErrors: parseInt(process.env.MAX_CONSECUTIVE_ERRORS || "3", 10),
  defaultHseCountry: process.env.DEFAULT_HSE_COUNTRY || "England",

  // --- Resolver ---
  matchHighThreshold: parseFloat(process.env.MATCH_HIGH_THRESHOLD || "0.85"),
  matchLowThreshold: parseFloat(process.env.MATCH_LOW_THRESHOLD || "0.5"),
  reviewCandidateLimit: parseInt(process.env.REVIEW_CANDIDATE_LIMIT || "3", 10),

  // --- Duplicate Detection ---
  duplicateDateWindowDays: parseInt(
    process.env.DUPLICATE_DATE_WINDOW_DAYS || "7",
    10
  ),
  duplicateDescriptionThreshold: parseFloat(
    process.env.DUPLICATE_DESCRIPTION_THRESHOLD || "0.8"
  ),

  // --- Companies House ---
  companiesHouseApiKey: process.env.COMPANIES_HOUSE_API_KEY || "",
  companiesHouseBaseUrl:
    process.env.COMPANIES_HOUSE_BASE_URL ||
    "https://api.company-information.service.gov.uk",
  companiesHouseTimeoutMs: parseInt(
    process.env.COMPANIES_HOUSE_TIMEOUT_MS || "10000",
    10
  ),

  // --- Queue / Workers ---
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || "2", 10),

  // --- Scheduler ---
  scheduleCron: process.env.SCHEDULE_CRON || "0 2 * * *",
  /** Comma-separated agency:database pairs, e.g. "hse:convictions,ea:cases" */
  scheduledTargets:
    process.env.SCHEDULED_TARGETS || "hse:convictions,hse:notices,ea:cases",
  scheduledLookbackDays: parseInt(process.env.SCHEDULED_LOOKBACK_DAYS || "30", 10),
};

export default config;
