/**
 * API Context
 *
 * Services the HTTP layer calls into. Built once in index.ts; tests build
 * their own with in-memory stores.
 */
import type { HealthReport } from "../monitoring/health.checker";
import type { SessionJobQueue } from "../queue/queue.producer";
import type { DuplicateDetector } from "../resolution/duplicate-detector";
import type { ReviewService } from "../resolution/review.service";
import type { SessionManager } from "../sessions/session-manager";

export interface ApiContext {
  sessions: SessionManager;
  reviews: ReviewService;
  duplicates: DuplicateDetector;
  /** Present when Redis is configured; enables queued session starts */
  sessionQueue: SessionJobQueue | null;
  health: () => Promise<HealthReport>;
}
