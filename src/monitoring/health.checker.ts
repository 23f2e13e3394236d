/**
 * Health Checker
 *
 * Performs connectivity checks against all external dependencies:
 * - Redis (queue and status store)
 * - MongoDB (scrape documents)
 * - MySQL (job rows and next targets)
 *
 * Each dependency has a ping that resolves when reachable and throws
 * otherwise. Exposed via GET /api/v1/health
 */
import { logger } from "./logger";
import { errorMessage } from "../shared/errors/service.error";

export type DependencyPing = () => Promise<void>;

export interface HealthCheck {
  status: "up" | "down";
  latency: number;
  error?: string;
}

export interface HealthReport {
  status: "healthy" | "unhealthy";
  uptime: number;
  checks: Record<string, HealthCheck>;
}

const startTime = Date.now();

/**
 * Run every ping and produce a report.
 * The service is healthy only when every ping is up.
 */
export async function checkHealth(pings: Record<string, DependencyPing>): Promise<HealthReport> {
  const entries = await Promise.all(
    Object.entries(pings).map(async ([name, ping]): Promise<[string, HealthCheck]> => [
      name,
      await runPing(name, ping),
    ])
  );
  const checks = Object.fromEntries(entries);
  const allUp = entries.every(([, check]) => check.status === "up");

  return {
    status: allUp ? "healthy" : "unhealthy",
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks,
  };
}

async function runPing(name: string, ping: DependencyPing): Promise<HealthCheck> {
  const start = Date.now();
  try {
    await ping();
    return { status: "up", latency: Date.now() - start };
  } catch (error) {
    const msg = errorMessage(error);
    logger.error({ dependency: name, error: msg }, "Health check failed");
    return { status: "down", latency: Date.now() - start, error: msg };
  }
}
