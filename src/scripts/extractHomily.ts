/**
 * Extract homilies from local recordings and compare them
 * Run with: npm run script:extract-homily -- <audio> <transcript.vtt> [<audio> <transcript.vtt> ...]
 *
 * This script:
 * 1. Runs every recording through the homily pipeline with in-memory stores
 * 2. Writes the homily audio next to HOMILY_OUTPUT_DIR (default ./homily-output)
 * 3. Prints the pairwise similarity of all recordings, treated as one weekend
 *
 * Nothing is written to Supabase or Redis.
 */

import "dotenv/config";
import { readFile } from "fs/promises";
import path from "path";
import { loadHomilyConfig } from "../config/homily.js";
import {
  InMemoryComparisonStore,
  InMemoryHomilySegmentStore,
  InMemoryRecordingStore,
} from "../repositories/memoryStores.js";
import { createComparisonTracker } from "../services/business/comparisonTracker.js";
import { createDeviationScorerFromConfig } from "../services/business/deviationScorer.js";
import { processRecording } from "../services/business/homilyPipeline.js";
import { ffmpegSlicer } from "../services/external/ffmpeg.js";
import type { Recording } from "../types/homily.js";
import { formatTimestamp } from "../utils/timecode.js";

const LOCAL_WEEKEND = "local";

function parseArgs(argv: string[]): Array<{ audioPath: string; transcriptPath: string }> {
  if (argv.length === 0 || argv.length % 2 !== 0) {
    throw new Error("Usage: extractHomily <audio> <transcript.vtt> [<audio> <transcript.vtt> ...]");
  }
  const pairs: Array<{ audioPath: string; transcriptPath: string }> = [];
  for (let i = 0; i < argv.length; i += 2) {
    pairs.push({ audioPath: path.resolve(argv[i]), transcriptPath: path.resolve(argv[i + 1]) });
  }
  return pairs;
}

async function extractHomily() {
  try {
    const inputs = parseArgs(process.argv.slice(2));
    const configPath = process.env.HOMILY_CONFIG_PATH || path.resolve("config/homily.json");
    const outputDir = process.env.HOMILY_OUTPUT_DIR || path.resolve("homily-output");
    const config = await loadHomilyConfig(configPath);

    const recordings = inputs.map((input, index): Recording => ({
      id: `recording-${index + 1}`,
      weekend_group_id: LOCAL_WEEKEND,
      service_timestamp: new Date().toISOString(),
      audio_path: input.audioPath,
      transcript_path: input.transcriptPath,
      status: "transcribed",
      error_message: null,
    }));

    const recordingStore = new InMemoryRecordingStore(recordings);
    const segmentStore = new InMemoryHomilySegmentStore();
    const comparisonStore = new InMemoryComparisonStore();
    const tracker = createComparisonTracker({
      store: comparisonStore,
      scorer: createDeviationScorerFromConfig(config),
    });

    let failures = 0;
    for (const [index, recording] of recordings.entries()) {
      console.log(`\n🎧 ${recording.id}: ${path.basename(recording.audio_path)}`);
      try {
        const transcript = await readFile(inputs[index].transcriptPath, "utf-8");
        const result = await processRecording(
          { recordingId: recording.id, transcript },
          {
            config,
            recordings: recordingStore,
            segments: segmentStore,
            tracker,
            slicer: ffmpegSlicer,
            outputDir,
          }
        );
        console.log(
          `  ✓ ${formatTimestamp(result.segment.start_time)} → ${formatTimestamp(result.segment.end_time)} (${result.segment.boundary_source})`
        );
        console.log(`  Audio: ${result.segment.audio_path}`);
        for (const warning of result.warnings) {
          console.log(`  ⚠️  ${warning}`);
        }
      } catch (error) {
        failures++;
        console.error(`  ✗ ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    const results = comparisonStore.all();
    if (results.length > 0) {
      console.log("\n📊 Comparisons:");
      for (const result of results) {
        const flag = result.deviation_flagged ? "⚠️  DEVIATION" : "✓";
        console.log(
          `  ${result.recording_id_a} ↔ ${result.recording_id_b}: ${result.metric}=${result.similarity_score.toFixed(3)} ${flag}`
        );
      }
    }

    process.exit(failures > 0 ? 1 : 0);
  } catch (error) {
    console.error("Error extracting homilies:", error);
    process.exit(1);
  }
}

extractHomily();
