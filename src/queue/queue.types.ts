/**
 * Queue Job Types
 */
import type { ScrapeSession, StartSessionRequest } from "../shared/types/session.types";

export type SessionTrigger = "schedule" | "api";

export interface SessionJobPayload {
  request: StartSessionRequest;
  trigger: SessionTrigger;
  /** ISO timestamp of when the job was queued */
  enqueuedAt: string;
}

export interface SessionJobResult {
  sessionId: string;
  status: ScrapeSession["status"];
  stopReason: ScrapeSession["stopReason"];
  counters: ScrapeSession["counters"];
}
