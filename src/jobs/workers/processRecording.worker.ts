/**
 * Process Recording Worker (BullMQ)
 * Runs the homily pipeline for queued recordings.
 */

import "dotenv/config";
import { UnrecoverableError, Worker, type Job } from "bullmq";
import { createRedisConnection } from "../../config/redis.js";
import { PROCESS_RECORDING_QUEUE, type ProcessRecordingJobData } from "../../config/queues.js";
import {
  processRecordingOrchestrator,
  recordProcessingFailure,
} from "../orchestrators/processRecordingOrchestrator.js";
import { isRetryable } from "../../utils/errorMessages.js";

const CONCURRENCY = 4;

/** Aborted on shutdown so running jobs stop at the next stage boundary. */
const shutdown = new AbortController();

async function handleJob(job: Job<ProcessRecordingJobData>) {
  const { recordingId } = job.data;
  console.log("[worker] processing", { jobId: job.id, recordingId, attempt: job.attemptsMade + 1 });

  try {
    const result = await processRecordingOrchestrator({
      recordingId,
      signal: shutdown.signal,
      updateProgress: async (progress: number, status: string) => {
        await job.updateProgress({ progress, status });
        console.log(`[worker] progress ${progress}% - ${status}`);
      },
    });
    return { status: result.status, comparisons: result.comparisons.length, warnings: result.warnings };
  } catch (error) {
    console.error("[worker] ✗ failed", job.id, error);

    await recordProcessingFailure(recordingId, error).catch((recordError) =>
      console.error(`[worker] Could not store failure for ${recordingId}:`, recordError)
    );

    // Deterministic failures would fail the same way on every attempt
    if (!isRetryable(error)) {
      throw new UnrecoverableError(error instanceof Error ? error.message : String(error));
    }
    throw error;
  }
}

const worker = new Worker<ProcessRecordingJobData>(PROCESS_RECORDING_QUEUE, handleJob, {
  connection: createRedisConnection("worker"),
  concurrency: CONCURRENCY,
  lockDuration: 600000, // 10 minutes
  lockRenewTime: 60000,
});

console.log("[worker] Starting worker for queue:", PROCESS_RECORDING_QUEUE);
console.log("[worker] Concurrency:", CONCURRENCY);
console.log("[worker] Waiting for jobs...");

worker.on("completed", (job) => {
  console.log("[worker] ✓ completed", job.id);
});

worker.on("failed", (job, err) => {
  console.error("[worker] ✗ failed", job?.id, err.message);
});

worker.on("error", (err) => {
  console.error("[worker] Worker error:", err);
});

process.on("SIGTERM", () => {
  shutdown.abort();
  worker
    .close()
    .then(() => process.exit(0))
    .catch((err) => {
      console.error("[worker] Failed to close cleanly:", err);
      process.exit(1);
    });
});
