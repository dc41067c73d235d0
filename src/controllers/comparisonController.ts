/**
 * Comparison Controller
 * Handles HTTP requests for deviation results.
 */

import { Request, Response, NextFunction } from "express";
import { getHomilyConfig } from "../config/init.js";
import { pendingQuerySchema, type MarkNotifiedBody } from "../middlewares/schemas/comparisonSchemas.js";
import {
  listPendingDeviations,
  listWeekendComparisons,
  markDeviationNotified,
} from "../services/business/comparisonService.js";
import { BadRequestError } from "../utils/errors.js";

/**
 * GET /comparisons/pending - Flagged deviations awaiting notification
 */
export async function getPendingDeviations(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const query = pendingQuerySchema.safeParse(req.query);
    if (!query.success) {
      throw new BadRequestError(query.error.issues[0]?.message ?? "Invalid query");
    }
    const config = await getHomilyConfig();
    const pending = await listPendingDeviations(config, query.data.weekend_group_id);
    res.json({ count: pending.length, comparisons: pending });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /comparisons/notified - Marks a flagged pair as delivered
 */
export async function markNotified(
  req: Request<Record<string, string>, unknown, MarkNotifiedBody>,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const config = await getHomilyConfig();
    const result = await markDeviationNotified(config, req.body);
    res.json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /weekends/:weekendGroupId/comparisons - Every scored pair of a weekend
 */
export async function getWeekendComparisons(
  req: Request<{ weekendGroupId: string }>,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const comparisons = await listWeekendComparisons(req.params.weekendGroupId);
    res.json(comparisons);
  } catch (error) {
    next(error);
  }
}
