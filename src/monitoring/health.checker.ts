/**
 * Health Checker
 *
 * Performs connectivity checks against all external dependencies:
 * - MySQL database
 * - Redis (BullMQ backend and progress pub/sub)
 *
 * and reports how many sessions this process is running.
 * Exposed via GET /api/enforcement/v1/health
 */
import type { Sequelize } from "sequelize";
import type { Redis } from "ioredis";
import { logger } from "./logger";
import { errorMessage } from "../shared/errors/scrape.errors";

export interface HealthCheck {
  status: "up" | "down";
  latency?: number;
  error?: string;
}

export interface HealthReport {
  status: "healthy" | "unhealthy";
  uptime: number;
  activeSessions: number;
  checks: {
    database: HealthCheck;
    redis: HealthCheck;
  };
}

const startTime = Date.now();

/**
 * Run all health checks and produce a report.
 *
 * @param activeSessions - Sessions currently running in this process
 */
export async function checkHealth(
  sequelize: Pick<Sequelize, "authenticate">,
  redis: Pick<Redis, "ping">,
  activeSessions: number
): Promise<HealthReport> {
  const [dbCheck, redisCheck] = await Promise.all([
    timedCheck("Database", () => sequelize.authenticate()),
    timedCheck("Redis", () => redis.ping()),
  ]);

  const allUp = dbCheck.status === "up" && redisCheck.status === "up";

  return {
    status: allUp ? "healthy" : "unhealthy",
    uptime: Math.floor((Date.now() - startTime) / 1000),
    activeSessions,
    checks: {
      database: dbCheck,
      redis: redisCheck,
    },
  };
}

async function timedCheck(name: string, run: () => Promise<unknown>): Promise<HealthCheck> {
  const start = Date.now();
  try {
    await run();
    return { status: "up", latency: Date.now() - start };
  } catch (error) {
    const msg = errorMessage(error);
    logger.error({ error: msg }, `${name} health check failed`);
    return { status: "down", latency: Date.now() - start, error: msg };
  }
}
