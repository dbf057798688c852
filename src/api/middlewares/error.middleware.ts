/**
 * Error Middleware
 *
 * Global error handler for the Express API.
 * Known ScrapeError codes map to client statuses; anything else is a 500.
 */
import type { Request, Response, NextFunction } from "express";
import { ERROR_CODES } from "../../config/constants";
import { logger } from "../../monitoring/logger";
import { ScrapeError, ValidationFailedError } from "../../shared/errors/scrape.errors";

const STATUS_BY_CODE: Record<string, number> = {
  [ERROR_CODES.VALIDATION_FAILED]: 400,
  [ERROR_CODES.REVIEW_NOT_FOUND]: 404,
  [ERROR_CODES.SESSION_NOT_FOUND]: 404,
  [ERROR_CODES.CANDIDATE_NOT_FOUND]: 422,
  [ERROR_CODES.INVALID_REVIEW_TRANSITION]: 409,
  [ERROR_CODES.REGISTRY_UNAVAILABLE]: 503,
};

export function errorMiddleware(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status = err instanceof ScrapeError ? STATUS_BY_CODE[err.code] ?? 500 : 500;

  if (status < 500) {
    logger.info({ error: err.message, method: req.method, path: req.path, status }, "Request rejected");
    res.status(status).json({
      error: err instanceof ScrapeError ? err.code : "ERROR",
      message: err.message,
      details: err instanceof ValidationFailedError ? err.details : undefined,
    });
    return;
  }

  logger.error(
    {
      error: err.message,
      stack: err.stack,
      method: req.method,
      path: req.path,
    },
    "Unhandled API error"
  );

  res.status(status).json({
    error: "Internal Server Error",
    message: process.env.NODE_ENV === "development" ? err.message : undefined,
  });
}
