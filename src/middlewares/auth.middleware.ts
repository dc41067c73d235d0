/**
 * Authentication Middleware
 * Validates Supabase JWT tokens for operator and notification-service calls.
 */

import { Request, Response, NextFunction } from "express";
import { supabase } from "../config/supabase.js";
import { AppError } from "../utils/errors.js";

// User type is extended in src/types/express.d.ts

/**
 * Middleware to verify Supabase JWT token and attach the caller
 */
export async function requireAuth(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      throw new AppError("No authorization token provided", 401);
    }

    const token = authHeader.substring(7); // Remove 'Bearer ' prefix

    const {
      data: { user },
      error,
    } = await supabase.auth.getUser(token);

    if (error || !user) {
      throw new AppError("Invalid or expired token", 401);
    }

    req.user = {
      id: user.id,
      email: user.email || "",
    };

    next();
  } catch (error) {
    if (error instanceof AppError) {
      res.status(error.statusCode).json({ error: error.message });
    } else {
      console.error("[auth] Token verification failed:", error);
      res.status(401).json({ error: "Authentication failed" });
    }
  }
}
