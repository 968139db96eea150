/**
 * Status Routes
 *
 * Health and metrics endpoints are public (for load balancers).
 */
import { Router } from "express";
import { getHealth, getMetrics } from "../controllers/status.controller";

const router = Router();

router.get("/health", getHealth);
router.get("/metrics", getMetrics);

export default router;
