/**
 * Route Aggregator
 * Combines all routers into a single exported router.
 */

import { Router } from "express";
import { healthRouter } from "./health.js";
import { recordingsRouter } from "./recordings.js";
import { comparisonsRouter } from "./comparisons.js";

export const router = Router();

/** Register all route modules */
router.use(healthRouter);
router.use("/recordings", recordingsRouter);
router.use(comparisonsRouter);
