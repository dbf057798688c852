/**
 * Route Aggregator
 *
 * Mounts all API routes under the /api/enforcement/v1 prefix.
 */
import { Router } from "express";
import type { ApiContext } from "../context";
import { duplicatesController } from "../controllers/duplicates.controller";
import { reviewsRoutes } from "./reviews.routes";
import { sessionsRoutes } from "./sessions.routes";
import { statusRoutes } from "./status.routes";

export function createRoutes(ctx: ApiContext): Router {
  const router = Router();

  router.use("/sessions", sessionsRoutes(ctx));
  router.use("/reviews", reviewsRoutes(ctx));
  router.get("/duplicates/:resourceType", duplicatesController(ctx).find);
  router.use("/", statusRoutes(ctx));

  return router;
}
