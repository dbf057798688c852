/**
 * Worker Manager
 *
 * Creates and manages the BullMQ worker for the session queue.
 */
import { Job, Worker } from "bullmq";
import { QUEUE_NAMES } from "../config/constants";
import { logger } from "../monitoring/logger";
import type { SessionJobPayload, SessionJobResult } from "../queue/queue.types";
import type { SessionManager } from "../sessions/session-manager";
import { processSessionJob } from "./session.worker";
import { sessionWorkerOptions } from "./worker.config";

const workers: Worker<SessionJobPayload, SessionJobResult>[] = [];

/**
 * Start the session worker.
 * Jobs run through the same session manager the API uses.
 */
export function startWorkers(manager: SessionManager): void {
  const worker = new Worker<SessionJobPayload, SessionJobResult>(
    QUEUE_NAMES.SESSIONS,
    (job: Job<SessionJobPayload, SessionJobResult>) => processSessionJob(job, manager),
    sessionWorkerOptions
  );
  setupWorkerEvents(worker);
  workers.push(worker);

  logger.info({ workerCount: workers.length, concurrency: sessionWorkerOptions.concurrency }, "Workers started");
}

function setupWorkerEvents(worker: Worker<SessionJobPayload, SessionJobResult>): void {
  worker.on("completed", (job, result) => {
    logger.debug(
      { jobId: job.id, sessionId: result.sessionId, status: result.status },
      "Job completed"
    );
  });

  worker.on("failed", (job, error) => {
    logger.error(
      {
        jobId: job?.id,
        agency: job?.data.request.agency,
        database: job?.data.request.database,
        error: error.message,
        attemptsMade: job?.attemptsMade,
      },
      "Job failed"
    );
  });

  worker.on("error", (error) => {
    logger.error({ error: error.message }, "Worker error");
  });
}

/** Gracefully shut down all workers */
export async function stopWorkers(): Promise<void> {
  logger.info("Stopping all workers...");

  for (const worker of workers) {
    await worker.close();
  }
  workers.length = 0;

  logger.info("All workers stopped");
}

export function workerCount(): number {
  return workers.length;
}
