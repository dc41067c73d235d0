/**
 * Segment Extractor
 * Cuts the homily range out of the service audio and collects its transcript text.
 * The source recording is only read; the homily is written as a new file.
 */

import { mkdir, rename, rm } from "fs/promises";
import path from "path";
import type { Cue } from "../../types/homily.js";
import { ExtractionFailedError } from "../../utils/errors.js";
import { formatTimestamp } from "../../utils/timecode.js";

/** Time-range access to an audio resource. */
export interface AudioSlicer {
  probeDuration(audioPath: string): Promise<number>;
  slice(inputPath: string, startSec: number, endSec: number, outputPath: string): Promise<void>;
}

export interface ExtractSegmentInput {
  recordingId: string;
  audioPath: string;
  cues: readonly Cue[];
  startSec: number;
  endSec: number;
  outputDir: string;
}

export interface ExtractedSegment {
  start_time: number;
  end_time: number;
  raw_text: string;
  audio_path: string;
  cue_count: number;
}

/** Container durations drift slightly from caption timing. */
const DURATION_TOLERANCE_SEC = 0.5;

/**
 * Cues overlapping [startSec, endSec): starting inside the range or running over its start.
 */
export function selectCues(cues: readonly Cue[], startSec: number, endSec: number): Cue[] {
  return cues.filter((cue) =>
    cue.start_time >= startSec ? cue.start_time < endSec : cue.end_time > startSec
  );
}

/**
 * "Mass-2024-06-01-1700.mp3" becomes "Homily-2024-06-01-1700.mp3";
 * other names get a "-homily" suffix.
 */
export function homilyFileName(audioPath: string): string {
  const ext = path.extname(audioPath) || ".mp3";
  const base = path.basename(audioPath, path.extname(audioPath));
  return base.startsWith("Mass-") ? `Homily-${base.slice("Mass-".length)}${ext}` : `${base}-homily${ext}`;
}

/** Directory of one recording's artifacts; ids are reduced to path-safe characters. */
export function recordingOutputDir(outputDir: string, recordingId: string): string {
  return path.join(outputDir, recordingId.replace(/[^A-Za-z0-9_-]/g, "_"));
}

/**
 * Extracts the homily audio and text.
 * Audio is written to a partial file and renamed once complete, so a
 * file at the final path is always whole. Each recording writes under its
 * own directory, so same-named sources never share a file.
 */
export async function extractHomilySegment(
  input: ExtractSegmentInput,
  slicer: AudioSlicer
): Promise<ExtractedSegment> {
  const { recordingId, audioPath, startSec, endSec } = input;

  let sourceDuration: number;
  try {
    sourceDuration = await slicer.probeDuration(audioPath);
  } catch (error) {
    throw new ExtractionFailedError(recordingId, `cannot read audio source ${audioPath}: ${String(error)}`, error);
  }

  if (endSec > sourceDuration + DURATION_TOLERANCE_SEC) {
    throw new ExtractionFailedError(
      recordingId,
      `audio source ends at ${formatTimestamp(sourceDuration)}, before requested end ${formatTimestamp(endSec)}`
    );
  }

  const outputDir = recordingOutputDir(input.outputDir, recordingId);
  const fileName = homilyFileName(audioPath);
  const ext = path.extname(fileName);
  const outputPath = path.join(outputDir, fileName);
  const partialPath = path.join(outputDir, `${path.basename(fileName, ext)}.partial${ext}`);

  try {
    await mkdir(outputDir, { recursive: true });
    await slicer.slice(audioPath, startSec, endSec, partialPath);
    await rename(partialPath, outputPath);
  } catch (error) {
    await rm(partialPath, { force: true }).catch((cleanupError) =>
      console.warn(`[extract] Failed to remove partial file ${partialPath}: ${cleanupError}`)
    );
    throw new ExtractionFailedError(
      recordingId,
      `failed to slice ${formatTimestamp(startSec)}-${formatTimestamp(endSec)}: ${String(error)}`,
      error
    );
  }

  const cues = selectCues(input.cues, startSec, endSec);
  const rawText = cues.map((cue) => cue.text.trim()).join(" ");

  console.log(
    `[extract] ✓ ${recordingId}: ${formatTimestamp(startSec)} → ${formatTimestamp(endSec)}, ${cues.length} cues → ${outputPath}`
  );

  return {
    start_time: startSec,
    end_time: endSec,
    raw_text: rawText,
    audio_path: outputPath,
    cue_count: cues.length,
  };
}
