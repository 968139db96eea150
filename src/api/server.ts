/**
 * Express API Server
 *
 * Minimal Express server for the portal service.
 * Exposes one route per portal workflow plus monitoring routes.
 */
import type { Server } from "http";
import express from "express";
import cors from "cors";
import { createRoutes } from "./routes";
import { errorMiddleware } from "./middlewares/error.middleware";
import type { PortalClient } from "../workflows/portal.client";
import { logger } from "../monitoring/logger";
import config from "../config";

/**
 * Create and configure the Express application.
 */
export function createServer(client: PortalClient): express.Application {
  const app = express();

  // CORS
  app.use(cors());

  // Body parsing
  app.use(express.json());

  // Request logging
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, path: req.path }, "Incoming request");
    next();
  });

  // API routes
  app.use("/api/portal/v1", createRoutes(client));

  // Error handler
  app.use(errorMiddleware);

  return app;
}

/**
 * Start the Express server.
 */
export function startServer(client: PortalClient): Promise<Server> {
  return new Promise((resolve) => {
    const app = createServer(client);
    const server = app.listen(config.port, () => {
      logger.info(
        { port: config.port, env: config.env },
        "API server started"
      );
      resolve(server);
    });
  });
}
