/**
 * Entry Point: enforcement-scraper
 *
 * Starts the three main subsystems:
 * 1. API Server: Express endpoints for sessions, reviews and monitoring
 * 2. Workers: BullMQ worker that runs queued sessions
 * 3. Scheduler: node-cron planner that queues the nightly sessions
 *
 * Also initializes the database (schema sync and agency rows) and wires
 * the Redis progress mirror.
 */
import type { Server } from "http";
import config from "./config";
import sequelize from "./persistence/db/sequelize";
import "./persistence/db/models"; // Ensure models are registered
import { ensureAgencies } from "./persistence/repositories/agency.repository";
import { offenderRepository } from "./persistence/repositories/offender.repository";
import { recordRepository } from "./persistence/repositories/record.repository";
import { reviewRepository } from "./persistence/repositories/review.repository";
import { sessionRepository } from "./persistence/repositories/session.repository";
import { redisConnection, sessionQueue } from "./queue/queue.config";
import { DuplicateDetector } from "./resolution/duplicate-detector";
import { OffenderResolver } from "./resolution/offender-resolver";
import { CompaniesHouseClient } from "./resolution/registry/companies-house.client";
import { ReviewService } from "./resolution/review.service";
import { HttpFetcher } from "./scraping/fetch/http-fetcher";
import { ProgressChannel, RedisProgressPublisher } from "./sessions/progress-channel";
import { SessionManager } from "./sessions/session-manager";
import { startServer } from "./api/server";
import type { ApiContext } from "./api/context";
import { startScheduler, stopScheduler } from "./scheduler/scheduler.service";
import { startWorkers, stopWorkers } from "./workers/worker.manager";
import { checkHealth } from "./monitoring/health.checker";
import { logger } from "./monitoring/logger";
import { errorMessage } from "./shared/errors/scrape.errors";

let sessionManager: SessionManager | null = null;
let httpServer: Server | null = null;

function buildContext(): ApiContext {
  const stores = {
    records: recordRepository,
    offenders: offenderRepository,
    reviews: reviewRepository,
    sessions: sessionRepository,
  };

  const registry = config.companiesHouseApiKey
    ? new CompaniesHouseClient({
        apiKey: config.companiesHouseApiKey,
        baseUrl: config.companiesHouseBaseUrl,
        timeoutMs: config.companiesHouseTimeoutMs,
      })
    : null;
  if (!registry) {
    logger.warn("COMPANIES_HOUSE_API_KEY not set; match reviews will list offender candidates only");
  }

  const resolver = new OffenderResolver({
    offenders: stores.offenders,
    reviews: stores.reviews,
    registry,
  });

  const manager = new SessionManager({
    ...stores,
    resolver,
    channel: new ProgressChannel([new RedisProgressPublisher(redisConnection)]),
    fetcher: new HttpFetcher(),
  });
  sessionManager = manager;

  return {
    sessions: manager,
    reviews: new ReviewService(stores),
    duplicates: new DuplicateDetector(stores),
    sessionQueue,
    health: () => checkHealth(sequelize, redisConnection, manager.listActive().length),
  };
}

async function main(): Promise<void> {
  logger.info(
    { env: config.env, port: config.port },
    "Starting enforcement-scraper service"
  );

  // 1. Verify database connection and schema
  try {
    await sequelize.authenticate();
    await sequelize.sync();
    await ensureAgencies();
    logger.info("Database connection established");
  } catch (error) {
    logger.fatal(
      { error: errorMessage(error) },
      "Failed to connect to database, aborting startup"
    );
    process.exit(1);
  }

  const ctx = buildContext();

  // 2. Start API server
  httpServer = await startServer(ctx);

  // 3. Start BullMQ worker
  startWorkers(ctx.sessions);

  // 4. Start scheduler
  startScheduler(sessionQueue);

  logger.info("All subsystems started, service is ready");
}

// --- Graceful Shutdown ---
async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Shutdown signal received");

  try {
    stopScheduler();
    httpServer?.close();
    // Running sessions stop at their next record boundary and persist
    await sessionManager?.stopAll();
    await stopWorkers();
    await sessionQueue.close();
    await redisConnection.quit();
    await sequelize.close();
    logger.info("Graceful shutdown complete");
    process.exit(0);
  } catch (error) {
    logger.error(
      { error: errorMessage(error) },
      "Error during shutdown"
    );
    process.exit(1);
  }
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});
process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  logger.fatal({ error: error.message, stack: error.stack }, "Uncaught exception");
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason }, "Unhandled rejection");
  process.exit(1);
});

// Start the service
main().catch((error: unknown) => {
  logger.fatal({ error: errorMessage(error) }, "Failed to start service");
  process.exit(1);
});
