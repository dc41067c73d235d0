/**
 * Transcript Quality Check
 * Spots blank and garbage speech-to-text output (a stuck recognizer repeating one word).
 */

import type { Cue } from "../../types/homily.js";

export type TranscriptIssue = "too_short" | "low_diversity" | "dominant_repetition";

const MIN_TEXT_LENGTH = 10;
const MIN_WORDS_FOR_REPETITION_CHECK = 50;
const MIN_DISTINCT_WORDS = 10;
const MAX_DOMINANT_SHARE = 0.5;

export function assessTranscript(cues: readonly Cue[]): TranscriptIssue | null {
  const text = cues.map((cue) => cue.text).join(" ").trim();
  if (text.length < MIN_TEXT_LENGTH) {
    return "too_short";
  }

  const words = text.toLowerCase().split(/\s+/);
  if (words.length <= MIN_WORDS_FOR_REPETITION_CHECK) {
    return null;
  }

  const counts = new Map<string, number>();
  for (const word of words) {
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }
  if (counts.size < MIN_DISTINCT_WORDS) {
    return "low_diversity";
  }

  const mostCommon = Math.max(...counts.values());
  if (mostCommon / words.length > MAX_DOMINANT_SHARE) {
    return "dominant_repetition";
  }

  return null;
}
