/**
 * Portal Controller
 *
 * Exposes the portal workflows over HTTP. Each request runs one workflow on
 * its own session; when the caller disconnects, the workflow is aborted.
 * Errors go to the error middleware, which maps them to HTTP statuses.
 */
import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { PortalClient } from "../../workflows/portal.client";
import type { WorkflowOptions } from "../../workflows/workflow-context";

type WorkflowHandler = (req: Request, options: WorkflowOptions) => Promise<unknown>;

/**
 * Wrap a workflow call: abort on client disconnect, reply with JSON.
 */
function handle(run: WorkflowHandler): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const result = await run(req, { signal: controller.signal });
      res.json(result);
    } catch (error) {
      next(error);
    }
  };
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === "string" ? value : undefined;
}

export function createPortalController(client: PortalClient) {
  return {
    /** POST /search/ipv4  Body: Ipv4SearchCriteria (partial) */
    searchIpv4: handle((req, options) => client.searchIpv4(req.body ?? {}, options)),

    /** POST /search/ipv6  Body: Ipv6SearchCriteria (partial) */
    searchIpv6: handle((req, options) => client.searchIpv6(req.body ?? {}, options)),

    /** GET /details?link=/jpnic/... */
    getRegistrationDetail: handle((req, options) =>
      client.getRegistrationDetail(queryString(req, "link") ?? "", options)
    ),

    /** GET /handles/:handle */
    getHandleDetail: handle((req, options) => client.getHandleDetail(req.params.handle, options)),

    /** GET /resource-summary */
    getResourceSummary: handle((_req, options) => client.getResourceSummary(options)),

    /** POST /contacts  Body: ContactChangeInput; replies with the receipt number */
    changeContactInfo: handle(async (req, options) => ({
      recepNo: await client.changeContactInfo(req.body, options),
    })),

    /** GET /requests?recepNo= */
    listRequests: handle((req, options) =>
      client.listRequests(queryString(req, "recepNo") ?? "", options)
    ),

    /** POST /transactions  Body: WebTransaction */
    sendTransaction: handle((req, options) => client.sendTransaction(req.body, options)),
  };
}

export type PortalController = ReturnType<typeof createPortalController>;
