/**
 * UTC calendar-day helpers.
 *
 * Scheduling works on whole days; a "day" is a Date at 00:00:00.000 UTC.
 */

export const MS_PER_DAY = 86_400_000;

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;
const HAS_OFFSET = /(Z|[+-]\d{2}:?\d{2})$/i;

export function startOfUtcDay(date: Date): Date {
  return new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate())
  );
}

export function addDays(day: Date, days: number): Date {
  return new Date(day.getTime() + days * MS_PER_DAY);
}

/**
 * Whole days from `from` to `to`, both truncated to their UTC day first.
 */
export function diffInDays(from: Date, to: Date): number {
  return Math.round(
    (startOfUtcDay(to).getTime() - startOfUtcDay(from).getTime()) / MS_PER_DAY
  );
}

/**
 * Format as YYYY-MM-DD (the source's date format)
 */
export function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Parse a YYYY-MM-DD string into a UTC day, or null when it is not one.
 */
export function parseDay(value: string): Date | null {
  const match = ISO_DAY.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return formatDay(date) === value.trim() ? date : null;
}

/**
 * Parse a source timestamp. Values without an offset ("2020-01-01",
 * "2020-01-01T23:10:30.000") are read as UTC.
 */
export function parseTimestamp(value: string): Date | null {
  const trimmed = value.trim();
  if (trimmed === "") {
    return null;
  }

  const day = parseDay(trimmed);
  if (day) {
    return day;
  }

  const normalized = HAS_OFFSET.test(trimmed)
    ? trimmed
    : `${trimmed.replace(" ", "T")}Z`;
  const date = new Date(normalized);
  return Number.isNaN(date.getTime()) ? null : date;
}
