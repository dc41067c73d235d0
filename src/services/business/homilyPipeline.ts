/**
 * Homily Pipeline
 * Runs one recording through parse → boundary → extract → normalize → score,
 * persisting each stage through the injected stores.
 *
 * Re-running a recording is safe: its segment is overwritten and existing
 * comparisons are returned from the tracker instead of being recomputed.
 * Status only reaches "finalized" after every comparison is stored, so an
 * aborted run never looks finished.
 */

import type { HomilyConfig } from "../../config/homily.js";
import type { HomilySegmentStore, RecordingStore } from "../../repositories/types.js";
import type { HomilySegment, RecordingStatus } from "../../types/homily.js";
import { AppError, BoundaryNotFoundError, ExtractionFailedError, NotFoundError } from "../../utils/errors.js";
import { formatTimestamp } from "../../utils/timecode.js";
import {
  createBoundaryOptions,
  createNormalizerFromConfig,
  detectBoundary,
  resolveBoundary,
} from "./boundaryDetector.js";
import type { ComparisonTracker, TrackedComparison } from "./comparisonTracker.js";
import { assertTransition, canTransition, isTerminal } from "./recordingLifecycle.js";
import { extractHomilySegment, type AudioSlicer, type ExtractedSegment } from "./segmentExtractor.js";
import { assessTranscript } from "./transcriptQuality.js";
import { parseTranscript } from "./transcriptParser.js";

export interface HomilyPipelineDeps {
  config: HomilyConfig;
  recordings: RecordingStore;
  segments: HomilySegmentStore;
  tracker: ComparisonTracker;
  slicer: AudioSlicer;
  outputDir: string;
  signal?: AbortSignal;
  updateProgress?: (progress: number, status: string) => Promise<void>;
}

export interface ProcessRecordingInput {
  recordingId: string;
  /** Caption text produced by the speech-to-text step. */
  transcript: string;
}

export interface ProcessRecordingResult {
  recording_id: string;
  status: RecordingStatus;
  segment: HomilySegment;
  comparisons: TrackedComparison[];
  warnings: string[];
  skipped_blocks: number;
}

/**
 * Whether a segment takes part in weekend comparisons.
 * Fallback windows are guesses and stay out unless configured otherwise.
 */
export function isComparable(segment: HomilySegment, config: HomilyConfig): boolean {
  return segment.boundary_source === "markers" || config.compare_fallback_segments;
}

async function listComparable(
  segments: HomilySegmentStore,
  weekendGroupId: string,
  config: HomilyConfig
): Promise<HomilySegment[]> {
  return (await segments.findByWeekendGroup(weekendGroupId)).filter((s) => isComparable(s, config));
}

export async function processRecording(
  input: ProcessRecordingInput,
  deps: HomilyPipelineDeps
): Promise<ProcessRecordingResult> {
  const { config, recordings, segments, tracker, slicer, outputDir, signal, updateProgress } = deps;
  const { recordingId } = input;

  const recording = await recordings.findById(recordingId);
  if (!recording) {
    throw new NotFoundError("Recording", recordingId);
  }
  if (isTerminal(recording.status)) {
    throw new AppError(`Recording ${recordingId} is in terminal status ${recording.status}`, 409);
  }

  let status = recording.status;
  const advance = async (to: RecordingStatus, errorMessage: string | null = null): Promise<void> => {
    assertTransition(recordingId, status, to);
    await recordings.updateStatus(recordingId, to, errorMessage);
    status = to;
  };

  const warnings: string[] = [];

  // 1. Parse transcript
  signal?.throwIfAborted();
  await advance("transcribed");
  await updateProgress?.(10, "Parsing transcript...");
  const parsed = parseTranscript(input.transcript);
  console.log(`[pipeline] ${recordingId}: ${parsed.cues.length} cues, ${parsed.skipped_blocks} skipped blocks`);
  if (parsed.skipped_blocks > 0) {
    warnings.push(`parse_skipped: ${parsed.skipped_blocks} blocks`);
  }
  const issue = assessTranscript(parsed.cues);
  if (issue) {
    console.warn(`[pipeline] ⚠️ ${recordingId}: transcript quality issue ${issue}`);
    warnings.push(`transcript_quality: ${issue}`);
  }

  // 2. Detect homily boundaries
  signal?.throwIfAborted();
  await updateProgress?.(25, "Detecting homily boundaries...");
  const detection = detectBoundary(parsed.cues, createBoundaryOptions(config));
  const boundary = resolveBoundary(detection, config.boundary_fallback);
  await advance("boundary_detected");
  if (!boundary) {
    const reason = detection.found ? "unusable boundary" : detection.reason;
    console.warn(`[pipeline] ✗ ${recordingId}: boundary not found (${reason})`);
    await advance("boundary_failed", `BoundaryNotFound: ${reason}`);
    throw new BoundaryNotFoundError(recordingId, reason);
  }
  warnings.push(...boundary.warnings);
  console.log(
    `[pipeline] 🎯 ${recordingId}: homily ${formatTimestamp(boundary.start_time)} → ${formatTimestamp(boundary.end_time)} (${boundary.source})`
  );

  // 3. Extract audio + text
  signal?.throwIfAborted();
  await updateProgress?.(45, "Extracting homily segment...");
  let extracted: ExtractedSegment;
  try {
    extracted = await extractHomilySegment(
      {
        recordingId,
        audioPath: recording.audio_path,
        cues: parsed.cues,
        startSec: boundary.start_time,
        endSec: boundary.end_time,
        outputDir,
      },
      slicer
    );
  } catch (error) {
    if (error instanceof ExtractionFailedError) {
      // Stays at boundary_detected so the next attempt can pick it up
      await recordings.updateStatus(recordingId, status, error.message);
    }
    throw error;
  }
  await advance("extracted");

  // 4. Normalize and commit the segment
  signal?.throwIfAborted();
  await updateProgress?.(65, "Normalizing homily text...");
  const normalize = createNormalizerFromConfig(config);
  const segment = await segments.upsert({
    recording_id: recordingId,
    weekend_group_id: recording.weekend_group_id,
    start_time: extracted.start_time,
    end_time: extracted.end_time,
    raw_text: extracted.raw_text,
    normalized_text: normalize(extracted.raw_text),
    audio_path: extracted.audio_path,
    boundary_source: boundary.source,
  });
  await advance("normalized");

  // 5. Compare with the rest of the weekend
  signal?.throwIfAborted();
  await updateProgress?.(80, "Comparing with other Masses this weekend...");
  const comparable = await listComparable(segments, recording.weekend_group_id, config);
  const comparisons: TrackedComparison[] = [];

  if (isComparable(segment, config)) {
    for (const sibling of comparable) {
      if (sibling.recording_id === recordingId) continue;
      signal?.throwIfAborted();
      comparisons.push(await tracker.compareOnce(segment, sibling));
    }
  } else {
    warnings.push("excluded_from_comparison: fallback boundary");
  }
  await advance("scored");

  // 6. Finalize every recording whose comparisons are now complete.
  // Listed again: a sibling committed after step 5 may have compared with this
  // recording while it was still below "scored" and unable to finalize.
  await updateProgress?.(95, "Finalizing...");
  const comparableIds = (await listComparable(segments, recording.weekend_group_id, config)).map(
    (s) => s.recording_id
  );
  const finalizable = comparableIds.length >= 2 ? comparableIds : [];
  for (const id of finalizable) {
    const complete = await tracker.hasComparedAll(recording.weekend_group_id, id, comparableIds);
    if (!complete) continue;

    if (id === recordingId) {
      await advance("finalized");
      continue;
    }
    const sibling = await recordings.findById(id);
    if (sibling && canTransition(sibling.status, "finalized")) {
      await recordings.updateStatus(id, "finalized", null);
      console.log(`[pipeline] ✓ ${id}: finalized after sibling ${recordingId}`);
    }
  }

  const flagged = comparisons.filter((c) => c.result.deviation_flagged).length;
  console.log(
    `[pipeline] ✓ ${recordingId}: ${status}, ${comparisons.length} comparisons (${flagged} flagged)`
  );
  await updateProgress?.(100, "Processing complete!");

  return {
    recording_id: recordingId,
    status,
    segment,
    comparisons,
    warnings,
    skipped_blocks: parsed.skipped_blocks,
  };
}
