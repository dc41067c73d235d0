/**
 * Rate Limiting Middleware
 * Caps how often clients can hit the API and queue pipeline work.
 */

import rateLimit from "express-rate-limit";

const FIFTEEN_MINUTES_MS = 15 * 60 * 1000;

export interface RateLimitSubject {
  user?: { id: string };
  ip?: string;
}

/**
 * Authenticated callers are limited per user, so operators behind one
 * address do not share a budget; anonymous ones per IP.
 */
export function rateLimitKey(req: RateLimitSubject): string {
  return req.user ? `user:${req.user.id}` : `ip:${req.ip ?? "unknown"}`;
}

/**
 * Applied to every route. Sized for the notification service polling
 * pending deviations a few times a minute.
 */
export const apiLimiter = rateLimit({
  windowMs: FIFTEEN_MINUTES_MS,
  limit: 300,
  message: "Too many requests from this IP, please try again later.",
  standardHeaders: "draft-7",
  legacyHeaders: false,
});

/**
 * Registering or re-processing a recording queues ffmpeg work.
 * Mount after requireAuth so the key is the operator.
 */
export const processingLimiter = rateLimit({
  windowMs: FIFTEEN_MINUTES_MS,
  limit: 30,
  keyGenerator: (req) => rateLimitKey(req),
  message: "Too many processing requests, please slow down.",
  standardHeaders: "draft-7",
  legacyHeaders: false,
});
