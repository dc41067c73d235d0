/**
 * Marker Matchers
 * Config-driven liturgical phrase detection over normalized cue text.
 *
 * A marker is either a plain phrase, matched on whole words after the same
 * normalization as the cue text, or a `/regex/flags` entry tested as-is
 * against the normalized text.
 */

import type { TextNormalizer } from "./textNormalizer.js";

export interface MarkerMatcher {
  readonly pattern: string;
  matches(normalizedText: string): boolean;
}

export interface MarkerSet {
  readonly matchers: readonly MarkerMatcher[];
  /** True when any marker in the set matches. */
  matches(normalizedText: string): boolean;
}

const REGEX_MARKER = /^\/(.+)\/([a-z]*)$/;

function phraseMatcher(pattern: string, normalize: TextNormalizer): MarkerMatcher {
  const phrase = normalize(pattern);
  if (phrase.length === 0) {
    throw new Error(`Marker "${pattern}" is empty after normalization`);
  }
  const needle = ` ${phrase} `;
  return {
    pattern,
    matches: (normalizedText) => ` ${normalizedText} `.includes(needle),
  };
}

function regexMatcher(pattern: string, body: string, flags: string): MarkerMatcher {
  let regex: RegExp;
  try {
    // g and y make test() stateful across calls
    regex = new RegExp(body, flags.replace(/[gy]/g, ""));
  } catch (error) {
    throw new Error(`Invalid marker pattern ${pattern}: ${String(error)}`);
  }
  return {
    pattern,
    matches: (normalizedText) => regex.test(normalizedText),
  };
}

export function compileMarker(pattern: string, normalize: TextNormalizer): MarkerMatcher {
  const regex = REGEX_MARKER.exec(pattern.trim());
  return regex ? regexMatcher(pattern, regex[1], regex[2]) : phraseMatcher(pattern, normalize);
}

export function compileMarkerSet(patterns: readonly string[], normalize: TextNormalizer): MarkerSet {
  const matchers = patterns.map((pattern) => compileMarker(pattern, normalize));
  return {
    matchers,
    matches: (normalizedText) => matchers.some((matcher) => matcher.matches(normalizedText)),
  };
}
