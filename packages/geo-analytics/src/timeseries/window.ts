import type { DateRange, LocalDateTime, TimeRange } from '../types';

const TIMESTAMP_PATTERN = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Converts a warehouse timestamp into naive `YYYY-MM-DDTHH:mm:ss`. Strings
 * keep their wall-clock fields as written (any zone suffix is ignored);
 * `Date` values and epoch milliseconds are read in UTC.
 */
export function normalizeTimestamp(value: unknown): LocalDateTime | null {
  if (value instanceof Date || typeof value === 'number') {
    const date = value instanceof Date ? value : new Date(value);
    if (Number.isNaN(date.getTime())) {
      return null;
    }
    return date.toISOString().slice(0, 19);
  }
  if (typeof value !== 'string') {
    return null;
  }
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, date, hours = '00', minutes = '00', seconds = '00'] = match;
  return `${date}T${hours}:${minutes}:${seconds}`;
}

export function datePart(timestamp: LocalDateTime): string {
  return timestamp.slice(0, 10);
}

export function timePart(timestamp: LocalDateTime): string {
  return timestamp.slice(11, 19);
}

export function isWithinDateRange(timestamp: LocalDateTime, range: DateRange): boolean {
  const date = datePart(timestamp);
  return date >= range.start && date <= range.end;
}

/** Inclusive on both ends, no wraparound past midnight. */
export function isWithinTimeRange(timestamp: LocalDateTime, range: TimeRange): boolean {
  const time = timePart(timestamp);
  return time >= range.start && time <= range.end;
}

export function isWithinWindow(timestamp: LocalDateTime, dateRange: DateRange, timeRange: TimeRange): boolean {
  return isWithinDateRange(timestamp, dateRange) && isWithinTimeRange(timestamp, timeRange);
}
