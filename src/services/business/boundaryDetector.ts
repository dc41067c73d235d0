/**
 * Boundary Detector
 * Locates the homily inside a full service transcript from liturgical markers.
 *
 * Start: first cue past the elapsed-time floor whose text matches an
 * introduction marker. End: first later cue matching a closing marker within
 * the duration ceiling, else the ceiling itself. Audio shorter than the
 * ceiling is caught by the extractor's duration check.
 */

import type { BoundaryFallback, HomilyConfig } from "../../config/homily.js";
import type { BoundarySource, Cue } from "../../types/homily.js";
import { compileMarkerSet, type MarkerSet } from "./markerMatcher.js";
import { createNormalizer, type TextNormalizer } from "./textNormalizer.js";

export interface BoundaryOptions {
  introduction: MarkerSet;
  closing: MarkerSet;
  normalize: TextNormalizer;
  minElapsedFloorSec: number;
  maxHomilyDurationSec: number;
  minPlausibleDurationSec: number;
  /** Number of trailing cues joined when looking for a closing marker. */
  closingMarkerWindow: number;
}

export type EndReason = "closing_marker" | "max_duration";

export interface HomilyBoundary {
  start_time: number;
  end_time: number;
  end_reason: EndReason;
  warnings: string[];
}

export type BoundaryFailureReason = "empty_transcript" | "no_introduction_marker" | "zero_duration";

export type BoundaryDetection =
  | { found: true; boundary: HomilyBoundary }
  | { found: false; reason: BoundaryFailureReason };

export interface ResolvedBoundary {
  start_time: number;
  end_time: number;
  source: BoundarySource;
  warnings: string[];
}

export function createNormalizerFromConfig(config: HomilyConfig): TextNormalizer {
  return createNormalizer({
    stopwords: config.stopword_list,
    collapseRepeats: config.collapse_repeated_tokens,
  });
}

export function createBoundaryOptions(config: HomilyConfig): BoundaryOptions {
  const normalize = createNormalizerFromConfig(config);
  return {
    introduction: compileMarkerSet(config.introduction_markers, normalize),
    closing: compileMarkerSet(config.closing_markers, normalize),
    normalize,
    minElapsedFloorSec: config.min_elapsed_floor_sec,
    maxHomilyDurationSec: config.max_homily_duration_sec,
    minPlausibleDurationSec: config.min_plausible_duration_sec,
    closingMarkerWindow: config.closing_marker_window,
  };
}

/**
 * Finds the homily range. Reports a failure reason instead of guessing.
 * Deterministic for a given transcript and options.
 */
export function detectBoundary(cues: readonly Cue[], options: BoundaryOptions): BoundaryDetection {
  if (cues.length === 0) {
    return { found: false, reason: "empty_transcript" };
  }

  const normalized = cues.map((cue) => options.normalize(cue.text));

  const startIndex = cues.findIndex(
    (cue, i) => cue.start_time >= options.minElapsedFloorSec && options.introduction.matches(normalized[i])
  );
  if (startIndex < 0) {
    return { found: false, reason: "no_introduction_marker" };
  }

  const start = cues[startIndex].start_time;
  const ceiling = start + options.maxHomilyDurationSec;

  let end: number | null = null;
  const window: string[] = [];
  for (let i = startIndex + 1; i < cues.length; i++) {
    const cue = cues[i];
    // Overlapping cues that begin with the start cue are part of the opening line
    if (cue.start_time <= start) continue;
    if (cue.start_time > ceiling) break;

    window.push(normalized[i]);
    if (window.length > options.closingMarkerWindow) {
      window.shift();
    }
    if (options.closing.matches(window.join(" "))) {
      end = cue.start_time;
      break;
    }
  }

  let endReason: EndReason = "closing_marker";
  if (end === null) {
    end = ceiling;
    endReason = "max_duration";
  }

  if (end <= start) {
    return { found: false, reason: "zero_duration" };
  }

  const warnings: string[] = [];
  if (end - start < options.minPlausibleDurationSec) {
    warnings.push(`suspicious_duration: ${(end - start).toFixed(1)}s`);
  }

  return {
    found: true,
    boundary: { start_time: start, end_time: end, end_reason: endReason, warnings },
  };
}

/**
 * Applies the configured fallback policy to a detection result.
 * Returns null when no range can be used.
 */
export function resolveBoundary(detection: BoundaryDetection, fallback: BoundaryFallback): ResolvedBoundary | null {
  if (detection.found) {
    const { start_time, end_time, warnings } = detection.boundary;
    return { start_time, end_time, source: "markers", warnings };
  }

  switch (fallback.policy) {
    case "none":
      return null;
    case "default_window":
      return {
        start_time: fallback.offset_sec,
        end_time: fallback.offset_sec + fallback.duration_sec,
        source: "fallback",
        warnings: [`boundary_fallback: ${detection.reason}`],
      };
  }
}
