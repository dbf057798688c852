/**
 * Match Review Routes
 */
import { Router } from "express";
import type { ApiContext } from "../context";
import { reviewsController } from "../controllers/reviews.controller";

export function reviewsRoutes(ctx: ApiContext): Router {
  const router = Router();
  const controller = reviewsController(ctx);

  router.get("/", controller.list);
  router.post("/:id/approve", controller.approve);
  router.post("/:id/skip", controller.skip);
  router.post("/:id/flag", controller.flag);

  return router;
}
