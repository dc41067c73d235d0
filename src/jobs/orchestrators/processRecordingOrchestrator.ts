/**
 * Process Recording Orchestrator
 * Wires the homily pipeline to Supabase, ffmpeg and the transcript on disk.
 */

import { readFile } from "fs/promises";
import { HOMILY_OUTPUT_DIR } from "../../config/env.js";
import { getHomilyConfig } from "../../config/init.js";
import { comparisonRepository } from "../../repositories/comparisonRepository.js";
import { homilySegmentRepository } from "../../repositories/homilySegmentRepository.js";
import { recordingRepository } from "../../repositories/recordingRepository.js";
import { createComparisonTracker } from "../../services/business/comparisonTracker.js";
import { createDeviationScorerFromConfig } from "../../services/business/deviationScorer.js";
import { processRecording, type ProcessRecordingResult } from "../../services/business/homilyPipeline.js";
import { ffmpegSlicer } from "../../services/external/ffmpeg.js";
import { getGenericErrorMessage } from "../../utils/errorMessages.js";
import { NotFoundError, PipelineError } from "../../utils/errors.js";
import { KeyedLock } from "../../utils/keyedLock.js";

export interface ProcessRecordingJobInput {
  recordingId: string;
  signal?: AbortSignal;
  updateProgress?: (progress: number, status: string) => Promise<void>;
}

/** Shared by every job in this worker so concurrent runs serialize per pair. */
const pairLock = new KeyedLock();

/**
 * Loads the recording's transcript and runs the full homily pipeline.
 */
export async function processRecordingOrchestrator(input: ProcessRecordingJobInput): Promise<ProcessRecordingResult> {
  const { recordingId, signal, updateProgress } = input;

  const recording = await recordingRepository.findById(recordingId);
  if (!recording) {
    throw new NotFoundError("Recording", recordingId);
  }
  if (!recording.transcript_path) {
    throw new Error(`Recording ${recordingId} has no transcript yet`);
  }

  console.log(`[orchestrator] reading transcript ${recording.transcript_path}`);
  await updateProgress?.(5, "Reading transcript...");
  const transcript = await readFile(recording.transcript_path, "utf-8");

  const config = await getHomilyConfig();
  const tracker = createComparisonTracker({
    store: comparisonRepository,
    scorer: createDeviationScorerFromConfig(config),
    lock: pairLock,
  });

  const result = await processRecording(
    { recordingId, transcript },
    {
      config,
      recordings: recordingRepository,
      segments: homilySegmentRepository,
      tracker,
      slicer: ffmpegSlicer,
      outputDir: HOMILY_OUTPUT_DIR,
      signal,
      updateProgress,
    }
  );

  if (result.warnings.length > 0) {
    console.warn(`[orchestrator] ⚠️ ${recordingId} warnings: ${result.warnings.join("; ")}`);
  }
  console.log(`[orchestrator] ✓ completed recording ${recordingId} (${result.status})`);

  return result;
}

/**
 * Stores a short operator-facing message for failures the pipeline did not
 * record itself. The status is left as it is so a retry resumes normally.
 */
export async function recordProcessingFailure(recordingId: string, error: unknown): Promise<void> {
  if (error instanceof PipelineError) {
    return;
  }

  const recording = await recordingRepository.findById(recordingId);
  if (!recording) {
    return;
  }
  await recordingRepository.updateStatus(recordingId, recording.status, getGenericErrorMessage(error));
}
