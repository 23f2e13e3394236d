/**
 * Auth Middleware
 *
 * Validates service-to-service authentication using a shared secret.
 * Callers that enqueue or inspect scrape jobs send it as a bearer token.
 */
import type { Request, Response, NextFunction, RequestHandler } from "express";
import config from "../../config";
import { logger } from "../../monitoring/logger";

/**
 * Validate the service secret from the Authorization header.
 * Expected format: Bearer <service-secret>
 * Missing header → 401, wrong secret → 403.
 */
export function createAuthMiddleware(secret: string = config.serviceSecret): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      logger.warn(
        { ip: req.ip, path: req.path },
        "Missing or invalid Authorization header"
      );
      res.status(401).json({ error: "Unauthorized" });
      return;
    }

    const token = authHeader.substring(7);

    if (token !== secret) {
      logger.warn(
        { ip: req.ip, path: req.path },
        "Invalid service secret"
      );
      res.status(403).json({ error: "Forbidden" });
      return;
    }

    next();
  };
}
