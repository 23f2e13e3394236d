/**
 * Express API Server
 *
 * Accepts scrape requests and exposes job status, stored data and
 * monitoring routes.
 */
import express from "express";
import cors from "cors";
import type { Server } from "http";
import { createRoutes } from "./routes";
import type { ApiDependencies } from "./dependencies";
import { errorMiddleware } from "./middlewares/error.middleware";
import { logger } from "../monitoring/logger";
import config from "../config";

/**
 * Create and configure the Express application.
 */
export function createServer(deps: ApiDependencies): express.Application {
  const app = express();

  // CORS
  app.use(cors());

  // Body parsing
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Request logging
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, path: req.path }, "Incoming request");
    next();
  });

  // API routes
  app.use("/api/v1", createRoutes(deps));

  // Error handler
  app.use(errorMiddleware);

  return app;
}

/**
 * Start the Express server.
 */
export function startServer(deps: ApiDependencies, port: number = config.port): Promise<Server> {
  return new Promise((resolve) => {
    const app = createServer(deps);
    const server = app.listen(port, () => {
      logger.info(
        { port, env: config.env },
        "API server started"
      );
      resolve(server);
    });
  });
}
