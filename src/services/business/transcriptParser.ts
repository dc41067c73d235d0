/**
 * Transcript Parser
 * Turns WebVTT/SRT-style caption text into ordered cues.
 * A bad block is skipped and counted; it never aborts the parse.
 */

import type { Cue } from "../../types/homily.js";
import { parseTimestamp } from "../../utils/timecode.js";

export interface ParsedTranscript {
  cues: Cue[];
  /** Blocks that looked like cues but could not be used. */
  skipped_blocks: number;
}

const TIMING_SEPARATOR = "-->";
const METADATA_BLOCK = /^(NOTE|STYLE|REGION)(\s|$)/;
const MARKUP_TAG = /<[^>]*>/g;

function splitBlocks(text: string): string[][] {
  const blocks: string[][] = [];
  let current: string[] = [];

  for (const line of text.replace(/^\uFEFF/, "").split(/\r?\n/)) {
    if (line.trim() === "") {
      if (current.length > 0) {
        blocks.push(current);
        current = [];
      }
      continue;
    }
    current.push(line);
  }
  if (current.length > 0) {
    blocks.push(current);
  }

  return blocks;
}

/**
 * Parses one block. Returns null when the block is malformed.
 */
function parseBlock(lines: string[]): Cue | null {
  // Optional cue identifier before the timing line
  const timingIndex = lines.findIndex((line) => line.includes(TIMING_SEPARATOR));
  if (timingIndex < 0 || timingIndex > 1) {
    return null;
  }

  const textLines = lines.slice(timingIndex + 1);
  if (textLines.some((line) => line.includes(TIMING_SEPARATOR))) {
    return null;
  }

  const [startPart, endPart] = lines[timingIndex].split(TIMING_SEPARATOR);
  // Cue settings ("align:start position:10%") may follow the end time
  const endToken = endPart.trim().split(/\s+/)[0];
  const start = parseTimestamp(startPart);
  const end = parseTimestamp(endToken);
  if (start === null || end === null || end < start) {
    return null;
  }

  const text = textLines
    .map((line) => line.replace(MARKUP_TAG, "").trim())
    .filter((line) => line.length > 0)
    .join(" ");
  if (text.length === 0) {
    return null;
  }

  return { start_time: start, end_time: end, text };
}

/**
 * Parses caption text into cues ordered by start time.
 * Same input always yields the same cues.
 */
export function parseTranscript(text: string): ParsedTranscript {
  const cues: Cue[] = [];
  let skipped = 0;

  splitBlocks(text).forEach((lines, index) => {
    const head = lines[0].trim();
    if ((index === 0 && head.startsWith("WEBVTT")) || METADATA_BLOCK.test(head)) {
      return;
    }

    const cue = parseBlock(lines);
    if (cue) {
      cues.push(cue);
    } else {
      skipped++;
    }
  });

  // Array sort is stable, so cues sharing a start time keep file order
  cues.sort((a, b) => a.start_time - b.start_time);

  return { cues, skipped_blocks: skipped };
}
