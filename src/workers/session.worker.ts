/**
 * Session Worker
 *
 * Processes one `scrape-sessions` job: starts the session through the
 * session manager and waits for it to finish. A failed session throws,
 * so BullMQ applies the queue's retry policy; a stopped or completed
 * session resolves.
 */
import type { Job } from "bullmq";
import { ERROR_CODES } from "../config/constants";
import { logger } from "../monitoring/logger";
import type { SessionJobPayload, SessionJobResult } from "../queue/queue.types";
import type { SessionManager } from "../sessions/session-manager";
import { ScrapeError } from "../shared/errors/scrape.errors";

export type SessionJob = Pick<Job<SessionJobPayload, SessionJobResult>, "id" | "data" | "attemptsMade">;

export async function processSessionJob(
  job: SessionJob,
  manager: Pick<SessionManager, "start">
): Promise<SessionJobResult> {
  const { request, trigger } = job.data;
  const handle = await manager.start(request);

  logger.info(
    {
      jobId: job.id,
      sessionId: handle.sessionId,
      agency: request.agency,
      database: request.database,
      trigger,
      attempt: job.attemptsMade + 1,
    },
    "Session job started"
  );

  const session = await handle.done;

  if (session.status === "failed") {
    throw new ScrapeError(
      `Session ${session.sessionId} failed: ${session.lastError ?? session.stopReason ?? "unknown"}`,
      ERROR_CODES.UNKNOWN,
      true
    );
  }

  return {
    sessionId: session.sessionId,
    status: session.status,
    stopReason: session.stopReason,
    counters: session.counters,
  };
}
