/**
 * Status Controller
 *
 * Health check and metrics endpoints.
 */
import type { Request, Response } from "express";
import { metrics } from "../../monitoring/metrics.collector";
import { errorMessage } from "../../shared/errors/scrape.errors";
import type { ApiContext } from "../context";

export function statusController(ctx: ApiContext) {
  return {
    /**
     * GET /health
     *
     * Health check endpoint for load balancers and monitoring.
     */
    async health(_req: Request, res: Response): Promise<void> {
      try {
        const report = await ctx.health();
        res.status(report.status === "healthy" ? 200 : 503).json(report);
      } catch (error) {
        res.status(503).json({ status: "unhealthy", error: errorMessage(error) });
      }
    },

    /**
     * GET /metrics
     *
     * Prometheus-compatible metrics endpoint.
     */
    metrics(_req: Request, res: Response): void {
      res.set("Content-Type", "text/plain");
      res.send(metrics.format());
    },
  };
}
