/**
 * Session Routes
 */
import { Router } from "express";
import type { ApiContext } from "../context";
import { sessionsController } from "../controllers/sessions.controller";

export function sessionsRoutes(ctx: ApiContext): Router {
  const router = Router();
  const controller = sessionsController(ctx);

  router.get("/", controller.listActive);
  router.post("/", controller.start);
  router.get("/:id", controller.get);
  router.post("/:id/stop", controller.stop);
  router.get("/:id/events", controller.events);

  return router;
}
