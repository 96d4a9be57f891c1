export const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Parses an ISO-8601 calendar date (`YYYY-MM-DD`) to UTC midnight epoch millis.
 * Returns null for anything else, including dates that do not exist such as
 * `2024-02-30`.
 */
export function parseCalendarDate(value: string): number | null {
  const match = CALENDAR_DATE_PATTERN.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const time = Date.UTC(year, month - 1, day);
  const date = new Date(time);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return time;
}

/** Number of calendar days from start to end, both ends included. */
export function inclusiveDayCount(start: number, end: number): number {
  return Math.round((end - start) / MS_PER_DAY) + 1;
}
