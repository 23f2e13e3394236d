/**
 * Error Middleware
 *
 * Global error handler for the Express API.
 * Catches unhandled errors and returns structured JSON responses.
 */
import type { Request, Response, NextFunction } from "express";
import config from "../../config";
import { logger } from "../../monitoring/logger";

/**
 * Global error handler.
 * Unparseable JSON bodies get a 400; anything else is logged and answered with 500.
 */
export function errorMiddleware(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof SyntaxError) {
    logger.warn({ method: req.method, path: req.path }, "Malformed JSON body");
    res.status(400).json({ error: "Malformed JSON body" });
    return;
  }

  logger.error(
    {
      error: err.message,
      stack: err.stack,
      method: req.method,
      path: req.path,
    },
    "Unhandled API error"
  );

  res.status(500).json({
    error: "Internal Server Error",
    message: config.env === "development" ? err.message : undefined,
  });
}
