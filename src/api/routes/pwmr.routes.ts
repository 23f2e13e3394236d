/**
 * PWMR Routes
 *
 * Scrape job endpoints. All protected by service authentication.
 */
import { Router } from "express";
import { createPwmrController } from "../controllers/pwmr.controller";
import { createAuthMiddleware } from "../middlewares/auth.middleware";
import type { ApiDependencies } from "../dependencies";

export function createPwmrRoutes(deps: ApiDependencies): Router {
  const router = Router();
  const controller = createPwmrController(deps);

  router.use(createAuthMiddleware(deps.serviceSecret));

  router.post("/scrape", controller.scrape);
  router.get("/status/:jobId", controller.getStatus);
  router.get("/jobs", controller.listJobs);
  router.get("/queue", controller.getQueue);
  router.get("/data/:email", controller.getData);

  return router;
}
