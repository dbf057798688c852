/**
 * Application Constants
 *
 * Static values that don't change per environment.
 * Includes agency endpoints, listing/detail labels, date formats,
 * queue names and error codes.
 */

// --- Queue Names ---
export const QUEUE_NAMES = {
  /** Scheduled and manually queued scraping sessions */
  SESSIONS: "scrape-sessions",
} as const;

// --- Agencies ---
export const AGENCIES = {
  hse: {
    name: "Health and Safety Executive",
    baseUrl: "https://resources.hse.gov.uk",
  },
  ea: {
    name: "Environment Agency",
    baseUrl: "https://environment.data.gov.uk",
  },
} as const;

// --- HSE Website ---
export const HSE = {
  BASE_URL: "https://resources.hse.gov.uk",
  CASE_DATABASES: ["convictions", "appeals"],
  NOTICE_DATABASE: "notices",
  /** Label text on case and notice detail pages */
  LABELS: {
    DIRECTORATE: "HSE Directorate",
    MAIN_ACTIVITY: "Main Activity",
    INDUSTRY: "Industry",
    LOCAL_AUTHORITY: "Local Authority",
    TOTAL_FINE: "Total Fine",
    TOTAL_COSTS: "Total Costs Awarded to HSE",
    RESULT: "Result",
    DESCRIPTION: "Description",
    COMPLIANCE_DATE: "Compliance Date",
    REVISED_COMPLIANCE_DATE: "Revised Compliance Date",
    ADDRESS: "Address",
    POSTCODE: "Postcode",
  },
  /** Link texts on detail pages that lead to secondary listings */
  LINKS: {
    BREACHES: /breach(es)? involved/i,
    RELATED_CASES: /related cases/i,
  },
  RELATED_CASE_PREFIX: "HSE_",
} as const;

// --- Environment Agency public register ---
export const EA = {
  BASE_URL: "https://environment.data.gov.uk",
  REGISTER_URL:
    "https://environment.data.gov.uk/public-register/enforcement-action/registration",
  ACTION_TYPE_URI_PREFIX:
    "http://environment.data.gov.uk/public-register/enforcement-action/def/action-type/",
  ACTION_TYPE_SLUGS: {
    court_case: "court-case",
    caution: "caution",
    enforcement_notice: "enforcement-notice",
  },
  DATABASE_ACTION_TYPES: {
    cases: ["court_case", "caution"],
    notices: ["enforcement_notice"],
  },
  /** The register stops returning rows past this count for a single query */
  RESULT_CAP: 2000,
  LABELS: {
    COMPANY_NUMBER: "Company No.",
    INDUSTRY_SECTOR: "Industry Sector",
    ADDRESS: "Address",
    TOWN: "Town",
    COUNTY: "County",
    POSTCODE: "Postcode",
    TOTAL_FINE: "Total Fine",
    OFFENCE: "Offence",
    CASE_REFERENCE: "Case Reference",
    EVENT_REFERENCE: "Event Reference",
    AGENCY_FUNCTION: "Agency Function",
    WATER_IMPACT: "Water Impact",
    LAND_IMPACT: "Land Impact",
    AIR_IMPACT: "Air Impact",
    ACT: "Act",
    SECTION: "Section",
  },
} as const;

// --- Display names for normalized action types ---
export const ACTION_TYPE_LABELS = {
  court_case: "Court Case",
  caution: "Formal Caution",
  enforcement_notice: "Enforcement Notice",
} as const;

// --- Date formats tried in order (strict) per agency ---
export const DATE_FORMATS = {
  hse: ["DD/MM/YYYY", "D/M/YYYY", "YYYY-MM-DD"],
  ea: ["DD/MM/YYYY", "D/M/YYYY", "YYYY-MM-DD", "D MMMM YYYY", "D MMM YYYY"],
} as const;

// --- Error Codes ---
export const ERROR_CODES = {
  FETCH_FAILED: "FETCH_FAILED",
  PARSE_FAILED: "PARSE_FAILED",
  VALIDATION_FAILED: "VALIDATION_FAILED",
  REGISTRY_UNAVAILABLE: "REGISTRY_UNAVAILABLE",
  REVIEW_NOT_FOUND: "REVIEW_NOT_FOUND",
  INVALID_REVIEW_TRANSITION: "INVALID_REVIEW_TRANSITION",
  CANDIDATE_NOT_FOUND: "CANDIDATE_NOT_FOUND",
  SESSION_NOT_FOUND: "SESSION_NOT_FOUND",
  RESOLVE_FAILED: "RESOLVE_FAILED",
  UNKNOWN: "UNKNOWN",
} as const;

// --- Retry Configuration for queued sessions ---
export const RETRY_CONFIG = {
  MAX_ATTEMPTS: 2,
  BACKOFF_TYPE: "exponential" as const,
  INITIAL_DELAY_MS: 60000,
} as const;

/** Backoff multiplier applied when the source answers HTTP 429 */
export const RATE_LIMIT_BACKOFF_MULTIPLIER = 3;
