import { ConfigurationError } from '../api/errors';

export interface TimeRange {
  from: string;
  to: string;
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/** Local wall-clock time as `YYYY-MM-DDTHH:mm:ss`. */
export function formatLocalDateTime(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
    + `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** `YYYYMMDD_HHMMSS`, used in report file names. */
export function fileTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
    + `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

function daysBefore(date: Date, days: number): Date {
  const shifted = new Date(date.getTime());
  shifted.setDate(shifted.getDate() - days);
  return shifted;
}

/**
 * Splits the last `totalDays` days into windows of `span` days, newest first.
 * The oldest window is shortened when `span` does not divide `totalDays`.
 * Each window starts at 23:59:59 of the day before its first full day and
 * ends at the same time of day as `now`.
 */
export function generateTimeRanges(totalDays: number, span: number, now: Date = new Date()): TimeRange[] {
  if (!Number.isInteger(totalDays) || !Number.isInteger(span) || totalDays <= 0 || span <= 0) {
    throw new ConfigurationError(`Invalid time range: ${totalDays} days in spans of ${span}`);
  }

  const ranges: TimeRange[] = [];
  let step = Math.min(span, totalDays);

  for (let offset = 0; offset < totalDays; offset += step) {
    if (offset + step > totalDays) step = totalDays - offset;

    const start = daysBefore(now, offset + step);
    start.setSeconds(start.getSeconds() - 1);
    start.setHours(23, 59, 59, 0);

    ranges.push({
      from: formatLocalDateTime(start),
      to: formatLocalDateTime(daysBefore(now, offset)),
    });
  }

  return ranges;
}
