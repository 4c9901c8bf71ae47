/**
 * Calendar date arithmetic on UTC day numbers.
 */

const MS_PER_DAY = 86_400_000;
const DAYS_PER_YEAR = 365;
const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

/** Month and day used when only a year is known */
export const STANDARD_DAY = '-07-02';

/**
 * Days since 1970-01-01 for a calendar date, or null when the value is not
 * one. Accepts `YYYY-MM-DD` strings (anything after the date is ignored) and
 * Date objects, read in UTC.
 */
export function toUtcDay(value: unknown): number | null {
  if (value instanceof Date) {
    const time = value.getTime();
    if (Number.isNaN(time)) {
      return null;
    }
    return Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate()) / MS_PER_DAY;
  }

  if (typeof value !== 'string') {
    return null;
  }

  const match = ISO_DATE_PREFIX.exec(value.trim());
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  const time = Date.UTC(year, month, day);
  const check = new Date(time);
  // Date.UTC rolls 2021-02-30 over to March; reject instead
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month || check.getUTCDate() !== day) {
    return null;
  }
  return time / MS_PER_DAY;
}

/**
 * (end - start) in days / 365, or null unless both dates are present.
 */
export function yearsBetween(start: unknown, end: unknown): number | null {
  const startDay = toUtcDay(start);
  const endDay = toUtcDay(end);
  if (startDay === null || endDay === null) {
    return null;
  }
  return (endDay - startDay) / DAYS_PER_YEAR;
}

export function midYearDate(year: number): string {
  return `${String(year).padStart(4, '0')}${STANDARD_DAY}`;
}
