/**
 * Recording Service
 * Registers service recordings and queues them for homily analysis.
 */

import type { HomilyConfig } from "../../config/homily.js";
import { findByRecordingId } from "../../repositories/homilySegmentRepository.js";
import { findComparisonsByWeekendGroup } from "../../repositories/comparisonRepository.js";
import { createRecording, findById } from "../../repositories/recordingRepository.js";
import type { ComparisonResult, HomilySegment, Recording } from "../../types/homily.js";
import { AppError, BadRequestError, NotFoundError } from "../../utils/errors.js";
import { enqueueProcessRecording, type EnqueueResult } from "../external/queue/enqueueProcessRecording.js";
import { isTerminal } from "./recordingLifecycle.js";
import { deriveWeekendGroupId } from "./weekendGroup.js";

export interface RegisterRecordingInput {
  service_timestamp: string;
  audio_path: string;
  transcript_path?: string;
}

export interface RegisteredRecording {
  recording: Recording;
  job: EnqueueResult | null;
}

export interface RecordingDetails {
  recording: Recording;
  segment: HomilySegment | null;
  comparisons: ComparisonResult[];
}

/**
 * Creates the recording in its weekend group.
 * Recordings that arrive with a transcript are queued right away.
 */
export async function registerRecording(
  input: RegisterRecordingInput,
  config: HomilyConfig
): Promise<RegisteredRecording> {
  const weekendGroupId = deriveWeekendGroupId(input.service_timestamp, {
    timeZone: config.weekend.time_zone,
    vigilStartHour: config.weekend.vigil_start_hour,
  });

  const recording = await createRecording({
    weekend_group_id: weekendGroupId,
    service_timestamp: input.service_timestamp,
    audio_path: input.audio_path,
    transcript_path: input.transcript_path,
  });
  console.log(`[recordings] Registered ${recording.id} in weekend ${weekendGroupId}`);

  const job = recording.transcript_path ? await enqueueProcessRecording({ recordingId: recording.id }) : null;
  return { recording, job };
}

/**
 * Queues (re-)analysis of an existing recording.
 */
export async function requestProcessing(recordingId: string): Promise<EnqueueResult> {
  const recording = await findById(recordingId);
  if (!recording) {
    throw new NotFoundError("Recording", recordingId);
  }
  if (!recording.transcript_path) {
    throw new BadRequestError(`Recording ${recordingId} has no transcript to analyze`);
  }
  if (isTerminal(recording.status)) {
    throw new AppError(`Recording ${recordingId} is ${recording.status} and needs manual review`, 409);
  }

  return enqueueProcessRecording({ recordingId });
}

/**
 * Recording with its homily segment and every comparison it takes part in.
 */
export async function getRecordingDetails(recordingId: string): Promise<RecordingDetails> {
  const recording = await findById(recordingId);
  if (!recording) {
    throw new NotFoundError("Recording", recordingId);
  }

  const [segment, weekendComparisons] = await Promise.all([
    findByRecordingId(recordingId),
    findComparisonsByWeekendGroup(recording.weekend_group_id),
  ]);

  return {
    recording,
    segment,
    comparisons: weekendComparisons.filter(
      (c) => c.recording_id_a === recordingId || c.recording_id_b === recordingId
    ),
  };
}
