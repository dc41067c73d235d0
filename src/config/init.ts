/**
 * Application Initialization
 * Loads and validates the homily configuration on startup.
 *
 * Note: Schema migrations should be run separately via:
 *   npx supabase db push
 */

import { HOMILY_CONFIG_PATH } from "./env.js";
import { loadHomilyConfig, type HomilyConfig } from "./homily.js";

let homilyConfig: Promise<HomilyConfig> | null = null;

/**
 * Returns the homily configuration, reading it from disk on first use.
 * A failed read is not cached so the next call tries again.
 */
export function getHomilyConfig(): Promise<HomilyConfig> {
  if (!homilyConfig) {
    homilyConfig = loadHomilyConfig(HOMILY_CONFIG_PATH).catch((error: unknown) => {
      homilyConfig = null;
      throw error;
    });
  }
  return homilyConfig;
}

/**
 * Initializes application dependencies on startup.
 */
export async function initializeApp(): Promise<void> {
  console.log("Initializing application...");

  try {
    const config = await getHomilyConfig();
    console.log(
      `✓ Homily config: metric=${config.similarity_metric}, threshold=${config.deviation_threshold}, fallback=${config.boundary_fallback.policy}`
    );

    console.log("✓ Application initialized successfully\n");
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}
