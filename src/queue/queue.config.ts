/**
 * BullMQ Queue Configuration
 *
 * One queue, `scrape-sessions`, carries session start requests from the
 * scheduler (and from API callers that prefer queueing) to the workers.
 * The same Redis connection mirrors session progress over pub/sub.
 */
import { Queue } from "bullmq";
import IORedis from "ioredis";
import config from "../config";
import { QUEUE_NAMES, RETRY_CONFIG } from "../config/constants";
import { logger } from "../monitoring/logger";
import type { SessionJobPayload, SessionJobResult } from "./queue.types";

/**
 * Shared Redis connection for the queue and workers.
 * Using IORedis with maxRetriesPerRequest: null as required by BullMQ.
 */
export const redisConnection = new IORedis({
  host: config.redisHost,
  port: config.redisPort,
  password: config.redisPassword || undefined,
  maxRetriesPerRequest: null, // Required by BullMQ
  enableReadyCheck: false,
});

redisConnection.on("connect", () => {
  logger.info({ host: config.redisHost, port: config.redisPort }, "Redis connected");
});

redisConnection.on("error", (err) => {
  logger.error({ error: err.message }, "Redis connection error");
});

/** Session queue; a failed session is retried once after a minute */
export const sessionQueue = new Queue<SessionJobPayload, SessionJobResult>(QUEUE_NAMES.SESSIONS, {
  connection: redisConnection,
  defaultJobOptions: {
    attempts: RETRY_CONFIG.MAX_ATTEMPTS,
    backoff: {
      type: RETRY_CONFIG.BACKOFF_TYPE,
      delay: RETRY_CONFIG.INITIAL_DELAY_MS,
    },
    removeOnComplete: { count: 1000 }, // Keep last 1000 completed jobs
    removeOnFail: false, // Keep all failed jobs for analysis
  },
});
