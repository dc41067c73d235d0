/**
 * Timecode Helpers
 * Conversions between caption timestamps and seconds.
 */

const TIMESTAMP_PATTERN = /^(?:(\d+):)?(\d{1,2}):(\d{2})(?:[.,](\d{1,3}))?$/;

/**
 * Parses `HH:MM:SS.mmm`, `MM:SS.mmm` or the SRT `HH:MM:SS,mmm` form into seconds.
 * Returns null for anything else.
 */
export function parseTimestamp(value: string): number | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, hoursStr, minutesStr, secondsStr, fractionStr] = match;
  const hours = hoursStr ? parseInt(hoursStr, 10) : 0;
  const minutes = parseInt(minutesStr, 10);
  const seconds = parseInt(secondsStr, 10);
  if (minutes > 59 || seconds > 59) {
    return null;
  }

  // "5" after the dot is 500ms, not 5ms
  const millis = fractionStr ? parseInt(fractionStr.padEnd(3, "0"), 10) : 0;
  return hours * 3600 + minutes * 60 + seconds + millis / 1000;
}

/**
 * Formats seconds as `HH:MM:SS.mmm` for logs and diagnostics.
 */
export function formatTimestamp(totalSeconds: number): string {
  const totalMillis = Math.round(totalSeconds * 1000);
  const hours = Math.floor(totalMillis / 3_600_000);
  const minutes = Math.floor((totalMillis % 3_600_000) / 60_000);
  const seconds = Math.floor((totalMillis % 60_000) / 1000);
  const millis = totalMillis % 1000;
  return `${hours.toString().padStart(2, "0")}:${minutes.toString().padStart(2, "0")}:${seconds
    .toString()
    .padStart(2, "0")}.${millis.toString().padStart(3, "0")}`;
}
