/**
 * Queue Producer
 *
 * Enqueues session start requests onto the `scrape-sessions` queue.
 * Used by the scheduler and by POST /sessions when `queued` is set.
 *
 * Job IDs follow the pattern: {agency}-{database}-{YYYYMMDD}
 * so a target is queued at most once per day.
 */
import type { Queue } from "bullmq";
import { logger } from "../monitoring/logger";
import type { StartSessionRequest } from "../shared/types/session.types";
import { formatLondon } from "../shared/utils/date";
import type { SessionJobPayload, SessionJobResult, SessionTrigger } from "./queue.types";

export type SessionJobQueue = Pick<Queue<SessionJobPayload, SessionJobResult>, "add">;

export function sessionJobId(request: StartSessionRequest, day: string): string {
  return `${request.agency}-${request.database}-${day}`;
}

/**
 * Enqueue one session request.
 * Returns the job id; re-adding an id BullMQ already holds is a no-op.
 */
export async function enqueueSession(
  queue: SessionJobQueue,
  request: StartSessionRequest,
  trigger: SessionTrigger,
  now: Date = new Date()
): Promise<string> {
  const jobId = sessionJobId(request, formatLondon(now, "YYYYMMDD"));
  const payload: SessionJobPayload = {
    request,
    trigger,
    enqueuedAt: now.toISOString(),
  };

  await queue.add(jobId, payload, {
    jobId, // Deduplication: same ID won't be added twice
  });

  logger.info(
    { jobId, agency: request.agency, database: request.database, trigger },
    "Session job enqueued"
  );

  return jobId;
}
