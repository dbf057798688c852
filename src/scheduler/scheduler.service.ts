/**
 * Scheduler Service
 *
 * Runs on a node-cron expression (02:00 London time by default) and
 * queues one session per scheduled target.
 */
import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import config from "../config";
import { logger } from "../monitoring/logger";
import { enqueueSession } from "../queue/queue.producer";
import type { SessionJobQueue } from "../queue/queue.producer";
import { errorMessage } from "../shared/errors/scrape.errors";
import { todayIso } from "../shared/utils/date";
import { parseScheduledTargets, planScheduledSessions } from "./schedule-planner";

let isRunning = false;
let task: ScheduledTask | null = null;

/**
 * Plan and enqueue one scheduled run.
 * Returns the ids of the jobs queued.
 */
export async function runOnce(queue: SessionJobQueue, today: string = todayIso()): Promise<string[]> {
  const requests = planScheduledSessions(today, parseScheduledTargets(config.scheduledTargets), {
    lookbackDays: config.scheduledLookbackDays,
    maxPages: config.maxPagesPerSession,
  });

  const jobIds: string[] = [];
  for (const request of requests) {
    jobIds.push(await enqueueSession(queue, request, "schedule"));
  }
  return jobIds;
}

/** Start the scheduler cron job */
export function startScheduler(queue: SessionJobQueue): void {
  logger.info({ cronExpression: config.scheduleCron }, "Starting scheduler");

  task = cron.schedule(
    config.scheduleCron,
    async () => {
      if (isRunning) {
        logger.warn("Scheduler cycle already in progress, skipping");
        return;
      }

      isRunning = true;
      const startTime = Date.now();

      try {
        const jobIds = await runOnce(queue);
        logger.info(
          { durationMs: Date.now() - startTime, jobCount: jobIds.length },
          "Scheduler cycle completed"
        );
      } catch (error) {
        logger.error(
          { error: errorMessage(error), durationMs: Date.now() - startTime },
          "Scheduler cycle failed"
        );
      } finally {
        isRunning = false;
      }
    },
    { timezone: "Europe/London" }
  );
}

export function stopScheduler(): void {
  task?.stop();
  task = null;
}
