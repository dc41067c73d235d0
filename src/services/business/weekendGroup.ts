/**
 * Weekend Grouping
 * Maps a service time to the weekend its homily belongs to.
 * Saturday evening vigil Masses count toward the following Sunday.
 */

export interface WeekendGroupOptions {
  /** IANA zone the parish keeps its schedule in. */
  timeZone: string;
  /** Saturday services starting at or after this local hour are vigils. */
  vigilStartHour: number;
}

interface LocalParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  weekday: string;
}

function localParts(date: Date, timeZone: string): LocalParts {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    hourCycle: "h23",
    weekday: "short",
  }).formatToParts(date);

  const value = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((part) => part.type === type)?.value ?? "";

  return {
    year: parseInt(value("year"), 10),
    month: parseInt(value("month"), 10),
    day: parseInt(value("day"), 10),
    hour: parseInt(value("hour"), 10),
    weekday: value("weekday"),
  };
}

/**
 * Returns the group id (`YYYY-MM-DD`) for a service time.
 * Saturday at or after the vigil hour belongs to Sunday; any other day is its own date.
 */
export function deriveWeekendGroupId(serviceTime: Date | string, options: WeekendGroupOptions): string {
  const date = typeof serviceTime === "string" ? new Date(serviceTime) : serviceTime;
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid service timestamp: ${String(serviceTime)}`);
  }

  const local = localParts(date, options.timeZone);
  const shift = local.weekday === "Sat" && local.hour >= options.vigilStartHour ? 1 : 0;

  return new Date(Date.UTC(local.year, local.month - 1, local.day + shift)).toISOString().slice(0, 10);
}
