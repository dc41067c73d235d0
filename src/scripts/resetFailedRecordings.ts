/**
 * Reset recordings whose homily could not be located
 * Run with: npm run script:reset-failed
 *
 * This script:
 * 1. Resets "boundary_failed" recordings to "transcribed" status
 *    (after the markers in config/homily.json were adjusted)
 * 2. Clears error messages
 * 3. Re-enqueues them for processing
 */

import "dotenv/config";
import { z } from "zod";
import { supabase } from "../config/supabase.js";
import { enqueueProcessRecording } from "../services/external/queue/enqueueProcessRecording.js";

async function resetFailedRecordings() {
  console.log("Resetting recordings with no detected homily...\n");

  try {
    const { data, error } = await supabase
      .from("recordings")
      .update({
        status: "transcribed",
        error_message: null,
        updated_at: new Date().toISOString(),
      })
      .eq("status", "boundary_failed")
      .select("id");

    if (error) {
      throw new Error(`Failed to reset recordings: ${error.message}`);
    }

    const ids = z.array(z.object({ id: z.string() })).parse(data || []).map((row) => row.id);
    console.log(`✓ Reset ${ids.length} recordings`);

    for (const recordingId of ids) {
      await enqueueProcessRecording({ recordingId });
    }

    console.log(`\n✓ Re-enqueued ${ids.length} recordings`);
  } catch (error) {
    console.error("Error resetting recordings:", error);
    process.exit(1);
  }

  process.exit(0);
}

resetFailedRecordings();
