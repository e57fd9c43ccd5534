/**
 * Date utility functions for handling timezones and date formatting
 */

export interface ZonedDateParts {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function partsFormatter(timezone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      year: "numeric",
      month: "numeric",
      day: "numeric",
      hour: "numeric",
      minute: "numeric",
      second: "numeric",
      hourCycle: "h23",
    });
    formatterCache.set(timezone, formatter);
  }
  return formatter;
}

/**
 * Wall-clock fields of an instant as seen in the given timezone
 * @param date The instant
 * @param timezone IANA zone (e.g., "Asia/Kolkata")
 */
export function getZonedParts(date: Date, timezone: string): ZonedDateParts {
  const parts = partsFormatter(timezone).formatToParts(date);
  const pick = (type: Intl.DateTimeFormatPartTypes) =>
    parseInt(parts.find((part) => part.type === type)?.value ?? "0", 10);

  return {
    year: pick("year"),
    month: pick("month"),
    day: pick("day"),
    hour: pick("hour") % 24,
    minute: pick("minute"),
    second: pick("second"),
  };
}

/**
 * Offset of the timezone from UTC at the given instant, in milliseconds
 */
export function getTimezoneOffsetMs(date: Date, timezone: string): number {
  const p = getZonedParts(date, timezone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const truncated = date.getTime() - date.getUTCMilliseconds();
  return asUtc - truncated;
}

/**
 * Convert a wall-clock time in a timezone to the UTC instant it names.
 * Month and day overflow the same way Date.UTC does, so day + 1 on the last
 * of the month rolls into the next month.
 */
export function zonedTimeToUtc(
  parts: Pick<ZonedDateParts, "year" | "month" | "day" | "hour" | "minute">,
  timezone: string
): Date {
  const guess = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute);
  const firstOffset = getTimezoneOffsetMs(new Date(guess), timezone);
  const candidate = guess - firstOffset;
  // a DST change between the guess and the answer shifts the offset once
  const secondOffset = getTimezoneOffsetMs(new Date(candidate), timezone);
  return new Date(secondOffset === firstOffset ? candidate : guess - secondOffset);
}

/**
 * Format a date for display in the specified timezone
 * @returns Formatted date string with timezone indicator
 */
export function formatDateForTimezone(date: Date, timezone: string): string {
  try {
    const formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      weekday: "short",
      month: "short",
      day: "numeric",
      hour: "2-digit",
      minute: "2-digit",
      hour12: true,
      timeZoneName: "short",
    });
    return formatter.format(date);
  } catch (error) {
    console.error(`Error formatting date for timezone ${timezone}:`, error);
    return date.toISOString();
  }
}

export function isValidTimezone(timezone: string): boolean {
  try {
    Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}
