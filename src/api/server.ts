/**
 * Express API Server
 *
 * Exposes session control, match review, duplicate detection and
 * monitoring routes.
 */
import type { Server } from "http";
import express from "express";
import cors from "cors";
import { createRoutes } from "./routes";
import type { ApiContext } from "./context";
import { errorMiddleware } from "./middlewares/error.middleware";
import { logger } from "../monitoring/logger";
import config from "../config";

export const API_PREFIX = "/api/enforcement/v1";

/**
 * Create and configure the Express application.
 */
export function createServer(ctx: ApiContext): express.Application {
  const app = express();

  // CORS
  app.use(cors());

  // Body parsing
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Request logging
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, path: req.path }, "Incoming request");
    next();
  });

  // API routes
  app.use(API_PREFIX, createRoutes(ctx));

  // Error handler
  app.use(errorMiddleware);

  return app;
}

/**
 * Start the Express server.
 */
export function startServer(ctx: ApiContext): Promise<Server> {
  return new Promise((resolve) => {
    const app = createServer(ctx);
    const server = app.listen(config.port, () => {
      logger.info(
        { port: config.port, env: config.env },
        "API server started"
      );
      resolve(server);
    });
  });
}
