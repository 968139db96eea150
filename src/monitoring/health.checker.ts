/**
 * Health Checker
 *
 * Checks what the service needs before it can reach the portal:
 * - Client certificate bundle and CA (readable and decodable)
 * - Transaction endpoint configured
 *
 * Exposed via GET /api/portal/v1/health
 */
import { type CredentialPaths, loadClientCredentials, verifyClientCredentials } from "../scraping/session/credentials";
import { logger } from "./logger";

interface HealthCheck {
  status: "up" | "down";
  error?: string;
}

export interface HealthReport {
  status: "healthy" | "degraded" | "unhealthy";
  uptime: number;
  checks: {
    credentials: HealthCheck;
    transactionEndpoint: HealthCheck;
  };
}

export interface HealthTargets {
  credentials: CredentialPaths;
  transactionUrl: string;
}

const startTime = Date.now();

/**
 * Run all health checks and produce a report.
 * Missing credentials make the service unhealthy; a missing transaction
 * endpoint only disables transactions.
 */
export function checkHealth(targets: HealthTargets): HealthReport {
  const credentials = checkCredentials(targets.credentials);
  const transactionEndpoint: HealthCheck = targets.transactionUrl
    ? { status: "up" }
    : { status: "down", error: "PORTAL_TRANSACTION_URL is not set" };

  const status =
    credentials.status === "down"
      ? "unhealthy"
      : transactionEndpoint.status === "down"
        ? "degraded"
        : "healthy";

  return {
    status,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks: { credentials, transactionEndpoint },
  };
}

function checkCredentials(paths: CredentialPaths): HealthCheck {
  try {
    verifyClientCredentials(loadClientCredentials(paths));
    return { status: "up" };
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    logger.error({ error: msg }, "Credential health check failed");
    return { status: "down", error: msg };
  }
}
