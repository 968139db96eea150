/**
 * Entry Point: registry-portal-scraping
 *
 * Builds the portal client from configuration and starts the API server
 * that exposes its workflows.
 */
import config from "./config";
import { startServer } from "./api/server";
import { createPortalClient } from "./workflows/portal.client";
import { logger } from "./monitoring/logger";

async function main(): Promise<void> {
  logger.info(
    { env: config.env, port: config.port, portal: config.portalBaseUrl },
    "Starting registry-portal-scraping service"
  );

  const client = createPortalClient();
  const server = await startServer(client);

  // --- Graceful Shutdown ---
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((error) => {
      if (error) {
        logger.error({ error: error.message }, "Error during shutdown");
        process.exit(1);
      }
      logger.info("Graceful shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  logger.info("Service is ready");
}

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  logger.fatal({ error: error.message, stack: error.stack }, "Uncaught exception");
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason }, "Unhandled rejection");
  process.exit(1);
});

// Start the service
main().catch((error: Error) => {
  logger.fatal({ error: error.message }, "Failed to start service");
  process.exit(1);
});
