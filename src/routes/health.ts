/**
 * Health Check Routes
 * /health answers while the process is up; /ready only once the homily
 * config loads and the job queue's Redis answers.
 */

import { Router } from "express";
import { getHomilyConfig } from "../config/init.js";
import { redis } from "../config/redis.js";

export const healthRouter = Router();

healthRouter.get("/health", (_req, res) => {
  res.json({ ok: true });
});

healthRouter.get("/ready", (_req, res) => {
  // Commands queue while disconnected, so read the connection state instead of pinging
  if (redis.status !== "ready") {
    res.status(503).json({ ready: false, error: `redis ${redis.status}` });
    return;
  }
  getHomilyConfig()
    .then(() => res.json({ ready: true }))
    .catch((error: unknown) => {
      console.warn(`[health] Not ready: ${String(error)}`);
      res.status(503).json({ ready: false, error: String(error) });
    });
});
