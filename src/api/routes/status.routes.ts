/**
 * Status Routes
 *
 * Health and metrics endpoints are public (for load balancers and scrapers).
 */
import { Router } from "express";
import { createStatusController } from "../controllers/status.controller";
import type { ApiDependencies } from "../dependencies";

export function createStatusRoutes(deps: ApiDependencies): Router {
  const router = Router();
  const controller = createStatusController(deps);

  router.get("/health", controller.getHealth);
  router.get("/metrics", controller.getMetrics);

  return router;
}
