/**
 * Portal Routes
 *
 * One route per workflow.
 * Protected by service-to-service authentication.
 */
import { Router } from "express";
import type { PortalClient } from "../../workflows/portal.client";
import { createPortalController } from "../controllers/portal.controller";
import { authMiddleware } from "../middlewares/auth.middleware";

export function createPortalRoutes(client: PortalClient): Router {
  const router = Router();
  const controller = createPortalController(client);

  // All portal routes require service authentication
  router.use(authMiddleware);

  router.post("/search/ipv4", controller.searchIpv4);
  router.post("/search/ipv6", controller.searchIpv6);
  router.get("/details", controller.getRegistrationDetail);
  router.get("/handles/:handle", controller.getHandleDetail);
  router.get("/resource-summary", controller.getResourceSummary);
  router.post("/contacts", controller.changeContactInfo);
  router.get("/requests", controller.listRequests);
  router.post("/transactions", controller.sendTransaction);

  return router;
}
