/**
 * Recording Controller
 * Handles HTTP requests for recordings.
 */

import { Request, Response, NextFunction } from "express";
import { getHomilyConfig } from "../config/init.js";
import type { RegisterRecordingBody } from "../middlewares/schemas/recordingSchemas.js";
import {
  getRecordingDetails,
  registerRecording as registerRecordingService,
  requestProcessing,
} from "../services/business/recordingService.js";

/**
 * POST /recordings - Registers a recording and queues it when the transcript is ready
 */
export async function registerRecording(
  req: Request<Record<string, string>, unknown, RegisterRecordingBody>,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const config = await getHomilyConfig();
    const registered = await registerRecordingService(req.body, config);
    res.status(201).json(registered);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /recordings/:id - Recording with its homily and comparisons
 */
export async function getRecording(req: Request<{ id: string }>, res: Response, next: NextFunction): Promise<void> {
  try {
    const details = await getRecordingDetails(req.params.id);
    res.json(details);
  } catch (error) {
    next(error);
  }
}

/**
 * POST /recordings/:id/process - Queues (re-)analysis
 */
export async function processRecording(req: Request<{ id: string }>, res: Response, next: NextFunction): Promise<void> {
  try {
    const job = await requestProcessing(req.params.id);
    res.status(202).json(job);
  } catch (error) {
    next(error);
  }
}
