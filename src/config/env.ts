/**
 * Environment Configuration
 * Validates and exports type-safe environment variables.
 * Fails fast at startup if required variables are missing.
 */

import os from "os";
import path from "path";

/** Server configuration */
export const PORT = parseInt(process.env.PORT || "3000", 10);
export const NODE_ENV = process.env.NODE_ENV || "development";

/** Browser origins allowed to call the API (comma-separated); none when unset */
export const CORS_ORIGINS = (process.env.CORS_ORIGINS || "")
  .split(",")
  .map((origin) => origin.trim())
  .filter((origin) => origin.length > 0);

/** Supabase configuration */
export const SUPABASE_URL = getRequiredEnv("SUPABASE_URL");
export const SUPABASE_SERVICE_ROLE_KEY = getRequiredEnv("SUPABASE_SERVICE_ROLE_KEY");

/** Redis configuration (BullMQ) */
export const REDIS_URL = getRequiredEnv("REDIS_URL");

/** Homily pipeline configuration */
export const HOMILY_CONFIG_PATH = process.env.HOMILY_CONFIG_PATH || path.resolve("config/homily.json");
/** Extracted homily audio is written here */
export const HOMILY_OUTPUT_DIR = process.env.HOMILY_OUTPUT_DIR || path.join(os.tmpdir(), "homily-output");

/**
 * Helper to safely retrieve required environment variables.
 * Throws immediately if variable is missing.
 */
function getRequiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}
