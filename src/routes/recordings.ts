/**
 * Recording Routes
 * HTTP endpoints for registering and analyzing recordings.
 */

import { Router } from "express";
import { getRecording, processRecording, registerRecording } from "../controllers/recordingController.js";
import { requireAuth } from "../middlewares/auth.middleware.js";
import { processingLimiter } from "../middlewares/rateLimiting.js";
import { registerRecordingSchema } from "../middlewares/schemas/recordingSchemas.js";
import { validateBody } from "../middlewares/validation.js";

export const recordingsRouter = Router();

/** Register a recording (queued when it has a transcript) */
recordingsRouter.post(
  "/",
  requireAuth,
  processingLimiter,
  validateBody(registerRecordingSchema),
  registerRecording
);

/** Recording with its homily segment and comparisons */
recordingsRouter.get("/:id", requireAuth, getRecording);

/** Queue (re-)analysis */
recordingsRouter.post("/:id/process", requireAuth, processingLimiter, processRecording);
