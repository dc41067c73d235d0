/**
 * Comparison Routes
 * Endpoints polled by the notification service.
 */

import { Router } from "express";
import {
  getPendingDeviations,
  getWeekendComparisons,
  markNotified,
} from "../controllers/comparisonController.js";
import { requireAuth } from "../middlewares/auth.middleware.js";
import { markNotifiedSchema } from "../middlewares/schemas/comparisonSchemas.js";
import { validateBody } from "../middlewares/validation.js";

export const comparisonsRouter = Router();

/** Flagged deviations not yet notified, oldest first */
comparisonsRouter.get("/comparisons/pending", requireAuth, getPendingDeviations);

/** Mark a flagged pair as notified */
comparisonsRouter.post("/comparisons/notified", requireAuth, validateBody(markNotifiedSchema), markNotified);

/** All scored pairs of a weekend */
comparisonsRouter.get("/weekends/:weekendGroupId/comparisons", requireAuth, getWeekendComparisons);
