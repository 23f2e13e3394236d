/**
 * Status Controller
 *
 * Provides health check and metrics endpoints.
 */
import type { Request, Response } from "express";
import { errorMessage } from "../../shared/errors/service.error";
import type { ApiDependencies } from "../dependencies";

export function createStatusController(deps: Pick<ApiDependencies, "health" | "metrics">) {
  /**
   * GET /api/v1/health
   *
   * Health check endpoint for load balancers and monitoring.
   */
  async function getHealth(_req: Request, res: Response): Promise<void> {
    try {
      const health = await deps.health();
      const statusCode = health.status === "healthy" ? 200 : 503;
      res.status(statusCode).json(health);
    } catch (error) {
      res.status(503).json({
        status: "unhealthy",
        error: errorMessage(error),
      });
    }
  }

  /**
   * GET /api/v1/metrics
   *
   * Prometheus-compatible metrics endpoint.
   */
  async function getMetrics(_req: Request, res: Response): Promise<void> {
    res.set("Content-Type", "text/plain");
    res.send(deps.metrics.format());
  }

  return { getHealth, getMetrics };
}
