/**
 * Custom Error Classes for Scraping Operations
 *
 * Each error class maps to an ERROR_CODE in constants.ts.
 * Fetch and parse failures travel inside Result values; the service-level
 * errors below are thrown and mapped to HTTP statuses by the API layer.
 */
import { ERROR_CODES } from "../../config/constants";

/**
 * Base class for all scraping errors.
 * Includes an error code for classification in logs and session records.
 */
export class ScrapeError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, code: string, retryable: boolean = true) {
    super(message);
    this.name = "ScrapeError";
    this.code = code;
    this.retryable = retryable;
  }
}

export type FetchErrorKind =
  | "timeout"
  | "connection"
  | "dns"
  | "rate_limited"
  | "http"
  | "unknown";

const RETRYABLE_KINDS: ReadonlySet<FetchErrorKind> = new Set([
  "timeout",
  "connection",
  "rate_limited",
]);

/**
 * An outbound HTTP request failed.
 * 5xx responses are retryable; every other "http" status is permanent.
 */
export class FetchError extends ScrapeError {
  public readonly kind: FetchErrorKind;
  public readonly url: string;
  public readonly status?: number;
  public attempts: number;

  constructor(
    kind: FetchErrorKind,
    url: string,
    message: string,
    status?: number
  ) {
    const retryable =
      RETRYABLE_KINDS.has(kind) || (kind === "http" && (status ?? 0) >= 500);
    super(message, ERROR_CODES.FETCH_FAILED, retryable);
    this.name = "FetchError";
    this.kind = kind;
    this.url = url;
    this.status = status;
    this.attempts = 1;
  }
}

/** A document or row did not have the structure a parser expects */
export class ParseError extends ScrapeError {
  public readonly url?: string;

  constructor(message: string, url?: string) {
    super(message, ERROR_CODES.PARSE_FAILED, false);
    this.name = "ParseError";
    this.url = url;
  }
}

/** Input failed schema validation */
export class ValidationFailedError extends ScrapeError {
  public readonly details: string[];

  constructor(message: string = "Data validation failed", details: string[] = []) {
    super(message, ERROR_CODES.VALIDATION_FAILED, false);
    this.name = "ValidationFailedError";
    this.details = details;
  }
}

/** Companies House lookup could not be performed */
export class RegistryUnavailableError extends ScrapeError {
  constructor(message: string = "Company registry unavailable") {
    super(message, ERROR_CODES.REGISTRY_UNAVAILABLE, true);
    this.name = "RegistryUnavailableError";
  }
}

/** The offender store failed while resolving an organization */
export class ResolveError extends ScrapeError {
  constructor(message: string) {
    super(message, ERROR_CODES.RESOLVE_FAILED, true);
    this.name = "ResolveError";
  }
}

export class ReviewNotFoundError extends ScrapeError {
  constructor(reviewId: string) {
    super(`Match review not found: ${reviewId}`, ERROR_CODES.REVIEW_NOT_FOUND, false);
    this.name = "ReviewNotFoundError";
  }
}

export class InvalidReviewTransitionError extends ScrapeError {
  constructor(reviewId: string, from: string, action: string) {
    super(
      `Cannot ${action} review ${reviewId} in status ${from}`,
      ERROR_CODES.INVALID_REVIEW_TRANSITION,
      false
    );
    this.name = "InvalidReviewTransitionError";
  }
}

export class CandidateNotFoundError extends ScrapeError {
  constructor(reviewId: string, index: number) {
    super(
      `Review ${reviewId} has no candidate at position ${index}`,
      ERROR_CODES.CANDIDATE_NOT_FOUND,
      false
    );
    this.name = "CandidateNotFoundError";
  }
}

export class SessionNotFoundError extends ScrapeError {
  constructor(sessionId: string) {
    super(`Scrape session not found: ${sessionId}`, ERROR_CODES.SESSION_NOT_FOUND, false);
    this.name = "SessionNotFoundError";
  }
}

/** Extract a message from anything thrown */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
