/**
 * Route Aggregator
 *
 * Mounts all API routes under the /api/portal/v1 prefix.
 */
import { Router } from "express";
import type { PortalClient } from "../../workflows/portal.client";
import { createPortalRoutes } from "./portal.routes";
import statusRoutes from "./status.routes";

export function createRoutes(client: PortalClient): Router {
  const router = Router();

  router.use("/", statusRoutes);
  router.use("/", createPortalRoutes(client));

  return router;
}
