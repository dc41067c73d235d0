/**
 * List flagged deviations that have not been notified yet
 * Run with: npm run script:pending-deviations [-- <weekend_group_id>]
 */

import "dotenv/config";
import { findPendingNotifications } from "../repositories/comparisonRepository.js";

async function listPendingDeviations() {
  const weekendGroupId = process.argv[2];

  try {
    const pending = await findPendingNotifications(weekendGroupId);

    if (pending.length === 0) {
      console.log("✅ No pending deviations.");
      process.exit(0);
    }

    console.log(`Found ${pending.length} pending deviation(s):\n`);
    for (const result of pending) {
      console.log(`  [${result.weekend_group_id}] ${result.recording_id_a} ↔ ${result.recording_id_b}`);
      console.log(`    ${result.metric}: ${result.similarity_score.toFixed(3)}  compared ${result.compared_at}`);
    }
  } catch (error) {
    console.error("Error listing deviations:", error);
    process.exit(1);
  }

  process.exit(0);
}

listPendingDeviations();
