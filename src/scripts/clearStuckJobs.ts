/**
 * Emergency Script: Clear Stuck Jobs from Queue
 *
 * Removes stalled and failed jobs from the processRecording queue so the
 * recordings can be re-enqueued.
 */

import "dotenv/config";
import { queues } from "../config/queues.js";

const STUCK_THRESHOLD_MS = 10 * 60 * 1000; // 10 minutes

function describeProgress(progress: unknown): string {
  if (typeof progress === "number") {
    return `${progress}%`;
  }
  if (progress && typeof progress === "object" && "progress" in progress && "status" in progress) {
    return `${String(progress.progress)}% - ${String(progress.status)}`;
  }
  return "unknown";
}

async function clearStuckJobs() {
  console.log("🔍 Analyzing queue state...\n");

  try {
    const [waiting, active, delayed, failed] = await Promise.all([
      queues.processRecording.getJobs(["waiting"]),
      queues.processRecording.getJobs(["active"]),
      queues.processRecording.getJobs(["delayed"]),
      queues.processRecording.getJobs(["failed"]),
    ]);

    console.log("📊 Queue Statistics:");
    console.log(`  - Waiting: ${waiting.length} jobs`);
    console.log(`  - Active: ${active.length} jobs`);
    console.log(`  - Delayed: ${delayed.length} jobs`);
    console.log(`  - Failed: ${failed.length} jobs\n`);

    const now = Date.now();
    const stuckJobs = active.filter((job) => now - (job.processedOn || now) > STUCK_THRESHOLD_MS);

    for (const job of active) {
      const minutes = Math.floor((now - (job.processedOn || now)) / 60000);
      console.log(`  - ${job.data.recordingId}: ${describeProgress(job.progress)} (${minutes} min)`);
    }

    if (stuckJobs.length === 0 && failed.length === 0) {
      console.log("✅ Queue is clean! Nothing to clear.\n");
      process.exit(0);
    }

    console.log("\n🧹 Starting cleanup...\n");
    let removedCount = 0;

    for (const job of [...stuckJobs, ...failed]) {
      try {
        await job.remove();
        removedCount++;
        console.log(`  ✅ Removed job: ${job.id}`);
      } catch (err) {
        console.error(`  ❌ Failed to remove job ${job.id}:`, err);
      }
    }

    console.log(`\nRemoved ${removedCount} jobs from queue`);
    console.log("Re-queue a recording with: POST /recordings/:id/process");
    process.exit(0);
  } catch (error) {
    console.error("💥 Fatal error:", error);
    process.exit(1);
  }
}

clearStuckJobs();
