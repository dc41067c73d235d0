/**
 * FFmpeg Service
 * Probes and slices service audio with fluent-ffmpeg.
 */

import ffmpeg from "fluent-ffmpeg";
import path from "path";
import type { AudioSlicer } from "../business/segmentExtractor.js";

/**
 * Get audio duration in seconds.
 * Rejects when the file cannot be probed or reports no duration.
 */
export async function getAudioDuration(audioPath: string): Promise<number> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(audioPath, (err, metadata) => {
      if (err) return reject(err);
      const dur = metadata?.format?.duration;
      if (typeof dur !== "number" || Number.isNaN(dur)) {
        return reject(new Error(`ffprobe reported no duration for ${path.basename(audioPath)}`));
      }
      resolve(dur);
    });
  });
}

/**
 * Copies [startSec, endSec) of the input into a new file without re-encoding.
 * Overwrites the output path.
 */
export async function extractAudioSegment(
  inputPath: string,
  startSec: number,
  endSec: number,
  outputPath: string
): Promise<void> {
  const duration = endSec - startSec;

  await new Promise<void>((resolve, reject) => {
    ffmpeg(inputPath)
      .setStartTime(startSec)
      .setDuration(duration)
      .audioCodec("copy")
      .noVideo()
      .outputOptions(["-y"])
      .on("start", (line) => console.log(`[ffmpeg] ${line}`))
      .on("end", () => resolve())
      .on("error", (err) => reject(err))
      .save(outputPath);
  });
}

export const ffmpegSlicer: AudioSlicer = {
  probeDuration: getAudioDuration,
  slice: extractAudioSegment,
};
