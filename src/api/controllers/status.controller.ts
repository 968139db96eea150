/**
 * Status Controller
 *
 * Provides health check and metrics endpoints.
 */
import type { Request, Response } from "express";
import { checkHealth } from "../../monitoring/health.checker";
import { metrics } from "../../monitoring/metrics.collector";
import config from "../../config";

/**
 * GET /api/portal/v1/health
 *
 * Health check endpoint for load balancers and monitoring.
 */
export function getHealth(req: Request, res: Response): void {
  const health = checkHealth({
    credentials: {
      pfxPath: config.pfxPath,
      passphrase: config.pfxPassphrase,
      caPath: config.caPath,
    },
    transactionUrl: config.portalTransactionUrl,
  });

  const statusCode = health.status === "unhealthy" ? 503 : 200;
  res.status(statusCode).json(health);
}

/**
 * GET /api/portal/v1/metrics
 *
 * Prometheus-compatible metrics endpoint.
 */
export function getMetrics(req: Request, res: Response): void {
  res.set("Content-Type", "text/plain");
  res.send(metrics.format());
}
