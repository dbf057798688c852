/**
 * Scrape Session Types
 */
import type {
  AgencyCode,
  EaActionType,
  EaDatabase,
  HseDatabase,
} from "./record.types";

export type SessionStatus = "pending" | "running" | "completed" | "failed" | "stopped";

export const TERMINAL_STATUSES: ReadonlySet<SessionStatus> = new Set([
  "completed",
  "failed",
  "stopped",
]);

export interface PageRange {
  kind: "pages";
  startPage: number;
  maxPages: number;
  /** HSE notices listing filter */
  country?: string;
}

export interface DateRange {
  kind: "dates";
  dateFrom: string;
  dateTo: string;
  actionTypes: EaActionType[];
}

export type RangeParams = PageRange | DateRange;

export type ScrapeTarget =
  | { agency: "hse"; database: HseDatabase }
  | { agency: "ea"; database: EaDatabase };

export interface SessionCounters {
  pagesProcessed: number;
  recordsFound: number;
  recordsCreated: number;
  recordsUpdated: number;
  recordsExisting: number;
  errorsCount: number;
}

export interface SessionLimits {
  maxPages: number;
  stopOnExisting: boolean;
  consecutiveExistingThreshold: number;
  maxConsecutiveErrors: number;
  requestDelayMs: number;
}

export type StopReason =
  | "range_exhausted"
  | "max_pages"
  | "consecutive_existing"
  | "max_consecutive_errors"
  | "summary_failed"
  | "stop_requested"
  | "unexpected_error";

export interface ScrapeSession {
  sessionId: string;
  agency: AgencyCode;
  targetDatabase: string;
  rangeParams: RangeParams;
  limits: SessionLimits;
  status: SessionStatus;
  counters: SessionCounters;
  currentPage: number | null;
  stopReason: StopReason | null;
  lastError: string | null;
  startedAt: Date | null;
  finishedAt: Date | null;
  createdAt: Date;
}

export type SessionEventType = "started" | "progress" | "stopped" | "completed" | "failed";

export interface SessionEvent {
  type: SessionEventType;
  sessionId: string;
  status: SessionStatus;
  pagesProcessed: number;
  recordsFound: number;
  recordsCreated: number;
  recordsUpdated: number;
  errorsCount: number;
  counters: SessionCounters;
  stopReason: StopReason | null;
  at: string;
}

/** Validated body of a session start request */
export interface StartSessionRequest {
  agency: AgencyCode;
  database: string;
  startPage?: number;
  maxPages?: number;
  endPage?: number;
  country?: string;
  dateFrom?: string;
  dateTo?: string;
  actionTypes?: EaActionType[];
  stopOnExisting?: boolean;
  consecutiveExistingThreshold?: number;
  maxConsecutiveErrors?: number;
  requestDelayMs?: number;
}

export function emptyCounters(): SessionCounters {
  return {
    pagesProcessed: 0,
    recordsFound: 0,
    recordsCreated: 0,
    recordsUpdated: 0,
    recordsExisting: 0,
    errorsCount: 0,
  };
}
