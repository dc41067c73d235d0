import express from "express";
import helmet from "helmet";
import cors from "cors";
import { CORS_ORIGINS } from "./config/env.js";
import { router } from "./routes/index.js";
import { apiLimiter } from "./middlewares/rateLimiting.js";
import { errorHandler } from "./middlewares/errorHandler.js";

/**
 * HTTP API for registering recordings and reading comparison results.
 */
export const app = express();

app.disable("x-powered-by");
app.use(helmet());
// Server-to-server callers send no Origin and are unaffected
app.use(cors({ origin: CORS_ORIGINS.length > 0 ? CORS_ORIGINS : false }));
// Recording registrations and notification acks are small
app.use(express.json({ limit: "64kb" }));
app.use(apiLimiter);

app.use(router);

// Must stay last
app.use(errorHandler);
