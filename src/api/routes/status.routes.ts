/**
 * Status Routes
 *
 * Health and metrics endpoints (for load balancers and Prometheus).
 */
import { Router } from "express";
import type { ApiContext } from "../context";
import { statusController } from "../controllers/status.controller";

export function statusRoutes(ctx: ApiContext): Router {
  const router = Router();
  const controller = statusController(ctx);

  router.get("/health", controller.health);
  router.get("/metrics", controller.metrics);

  return router;
}
