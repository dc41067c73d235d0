/**
 * Text Normalizer
 * Canonical form of transcript text used for marker matching and comparison.
 * Pure and idempotent: normalizing normalized text changes nothing.
 */

export interface NormalizeOptions {
  /** Single-word fillers and transcription artifacts to drop ("um", "uh"). */
  stopwords?: Iterable<string>;
  /** Collapse immediate repeats ("the the") left by false starts. */
  collapseRepeats?: boolean;
}

export type TextNormalizer = (text: string) => string;

const APOSTROPHES = /['’‘`]/g;
const NON_WORD = /[^\p{L}\p{M}\p{N}\s]+/gu;

function tokenize(text: string): string[] {
  return text
    .normalize("NFKC")
    .toLowerCase()
    .normalize("NFKC")
    .replace(APOSTROPHES, "")
    .replace(NON_WORD, " ")
    .split(/\s+/)
    .filter((token) => token.length > 0);
}

/**
 * Builds a normalizer with a precomputed stop-word set.
 * Stop-word entries are normalized the same way as text; entries that
 * normalize to more than one word are ignored.
 */
export function createNormalizer(options: NormalizeOptions = {}): TextNormalizer {
  const stopwords = new Set<string>();
  for (const entry of options.stopwords ?? []) {
    const tokens = tokenize(entry);
    if (tokens.length === 1) {
      stopwords.add(tokens[0]);
    }
  }
  const collapseRepeats = options.collapseRepeats ?? false;

  return (text: string): string => {
    // Stop-words go first so "the um the" still collapses to "the"
    const tokens = tokenize(text).filter((token) => !stopwords.has(token));
    const kept = collapseRepeats
      ? tokens.filter((token, index) => index === 0 || token !== tokens[index - 1])
      : tokens;
    return kept.join(" ");
  };
}

export function normalizeText(text: string, options: NormalizeOptions = {}): string {
  return createNormalizer(options)(text);
}
