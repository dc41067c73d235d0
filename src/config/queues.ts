/**
 * BullMQ queues
 * One job per recording; the worker runs the homily pipeline for it.
 */

import { Queue } from "bullmq";
import { redis } from "./redis.js";

export const PROCESS_RECORDING_QUEUE = "processRecording";

export interface ProcessRecordingJobData {
  recordingId: string;
}

export const queues = {
  processRecording: new Queue<ProcessRecordingJobData>(PROCESS_RECORDING_QUEUE, {
    connection: redis,
    // Only extraction failures are retried; the worker marks the rest unrecoverable
    defaultJobOptions: {
      attempts: 5,
      backoff: { type: "exponential", delay: 10_000 },
      removeOnComplete: { age: 86400, count: 1000 },
      removeOnFail: { age: 86400, count: 100 },
    },
  }),
};
