/**
 * Validation Middleware
 * Validates request bodies against Zod schemas.
 */

import { Request, Response, NextFunction } from "express";
import { ZodError, type ZodIssue, type ZodType } from "zod";

export interface ValidationDetail {
  path: string;
  message: string;
}

export function formatZodIssues(issues: readonly ZodIssue[]): ValidationDetail[] {
  return issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Validates request body against a Zod schema and replaces it with the parsed value.
 * Returns 400 with validation errors if invalid.
 */
export function validateBody<T>(schema: ZodType<T>) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      req.body = schema.parse(req.body);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(400).json({
          error: "Validation failed",
          details: formatZodIssues(error.issues),
        });
      } else {
        next(error);
      }
    }
  };
}
