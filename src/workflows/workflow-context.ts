/**
 * Workflow Context
 *
 * Everything one workflow run needs: its own portal session, the shared
 * collaborators, a child logger tagged with a workflow id and the caller's
 * abort signal.
 *
 * Usage:
 *   return runWorkflow("searchIpv4", deps, options, async (ctx) => {
 *     // ... ctx.session.get(...) ...
 *   });
 *
 * The session is always closed when the run ends, even on errors.
 */
import { v4 as uuidv4 } from "uuid";
import type { PortalSession } from "../scraping/session/portal-session";
import type { RateLimiter } from "../scraping/traversal/rate-limiter";
import type { ErrorClassifier } from "../processing/error-classifier";
import { PortalError } from "../shared/errors/portal.errors";
import { throwIfAborted } from "../shared/utils/sleep";
import { metrics } from "../monitoring/metrics.collector";
import { logger, type Logger } from "../monitoring/logger";

export interface WorkflowOptions {
  signal?: AbortSignal;
}

export interface WorkflowDependencies {
  /** Opens a new, unshared session. Throws CredentialError on bad material. */
  openSession: () => PortalSession;
  /** Certificate-login page that leads to the top-level menu */
  loginPath: string;
  /** Absolute URL of the transactional endpoint ("" when not configured) */
  transactionUrl: string;
  classifier: ErrorClassifier;
  /** One limiter per listing traversal */
  createRateLimiter: () => RateLimiter;
}

export interface WorkflowContext {
  readonly workflowId: string;
  readonly session: PortalSession;
  readonly deps: WorkflowDependencies;
  readonly log: Logger;
  readonly signal?: AbortSignal;
}

export async function runWorkflow<T>(
  name: string,
  deps: WorkflowDependencies,
  options: WorkflowOptions,
  body: (ctx: WorkflowContext) => Promise<T>
): Promise<T> {
  const workflowId = uuidv4();
  const log = logger.child({ workflow: name, workflowId });
  const startTime = Date.now();
  let session: PortalSession | undefined;

  try {
    throwIfAborted(options.signal);
    session = deps.openSession();
    log.info("Workflow started");

    const result = await body({ workflowId, session, deps, log, signal: options.signal });

    const durationMs = Date.now() - startTime;
    metrics.increment("portal_workflows_total", { workflow: name, status: "success" });
    metrics.recordDuration(durationMs / 1000);
    log.info({ durationMs }, "Workflow completed");
    return result;
  } catch (error) {
    const durationMs = Date.now() - startTime;
    const errorCode = error instanceof PortalError ? error.code : "UNKNOWN";
    metrics.increment("portal_workflows_total", { workflow: name, status: "error" });
    log.error(
      { errorCode, errorMessage: (error as Error).message, durationMs },
      "Workflow failed"
    );
    throw error;
  } finally {
    session?.close();
  }
}
