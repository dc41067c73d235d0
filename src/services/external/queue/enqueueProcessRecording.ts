/**
 * Enqueue homily processing for a recording.
 * The job id is derived from the recording, so a recording is never queued twice.
 */

import { queues, type ProcessRecordingJobData } from "../../../config/queues.js";

export interface EnqueueResult {
  jobId: string;
  enqueued: boolean;
}

export async function enqueueProcessRecording(params: ProcessRecordingJobData): Promise<EnqueueResult> {
  const jobId = `recording_${params.recordingId}`;

  const existingJob = await queues.processRecording.getJob(jobId);

  if (existingJob) {
    const state = await existingJob.getState();

    // If job is waiting, delayed or running, don't duplicate
    if (state === "waiting" || state === "delayed" || state === "active") {
      console.log(`[enqueue] Job ${jobId} already ${state}, skipping`);
      return { jobId, enqueued: false };
    }

    // Finished jobs keep their id; remove so the recording can be re-analyzed
    console.log(`[enqueue] Job ${jobId} is ${state}, removing to allow re-run`);
    await existingJob.remove();
  }

  // Retry and retention come from the queue's defaultJobOptions
  await queues.processRecording.add("process_recording", params, { jobId });

  console.log(`[enqueue] Job ${jobId} enqueued for recording ${params.recordingId}`);
  return { jobId, enqueued: true };
}
