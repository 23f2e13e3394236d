/**
 * Route Aggregator
 *
 * Mounts all API routes under the /api/v1 prefix.
 */
import { Router } from "express";
import { createPwmrRoutes } from "./pwmr.routes";
import { createStatusRoutes } from "./status.routes";
import type { ApiDependencies } from "../dependencies";

export function createRoutes(deps: ApiDependencies): Router {
  const router = Router();

  router.use("/pwmr", createPwmrRoutes(deps));
  router.use("/", createStatusRoutes(deps));

  return router;
}
