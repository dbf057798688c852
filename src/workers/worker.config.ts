/**
 * Worker Configuration
 *
 * BullMQ Worker settings for the session queue.
 */
import type { WorkerOptions } from "bullmq";
import { redisConnection } from "../queue/queue.config";
import config from "../config";

export const sessionWorkerOptions: WorkerOptions = {
  connection: redisConnection,
  autorun: true,
  concurrency: Math.max(1, config.workerConcurrency),
  removeOnComplete: { count: 1000 },
  removeOnFail: { count: 5000 },
  // Sessions run for minutes; renew the job lock well inside that
  lockDuration: 5 * 60 * 1000,
};
