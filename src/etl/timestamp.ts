import { type Cell, utcDate } from '@domain/types';

// Source files carry naive timestamps; they are read as UTC wall-clock time.
const NAIVE_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?$/;
const ZONED_TIMESTAMP =
  /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:\d{2})$/;

function fromNaiveParts(match: RegExpExecArray): Date | null {
  const part = (index: number): number => Number(match[index] ?? 0);
  const year = part(1);
  const month = part(2);
  const day = part(3);
  const hour = part(4);
  const minute = part(5);
  const second = part(6);
  const fraction = match[7] ?? '';
  const millis = fraction ? Number(fraction.padEnd(3, '0').slice(0, 3)) : 0;

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const date = utcDate(year, month - 1, day, hour, minute, second, millis);
  // Rejects rollover such as 2023-02-30
  return date.getUTCDate() === day ? date : null;
}

/**
 * Strict parse to a Date; anything unparseable becomes null so the row
 * survives with an empty field.
 */
export function parseTimestamp(value: Cell): Date | null {
  if (value === null) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    const date = new Date(value); // epoch milliseconds
    return Number.isNaN(date.getTime()) ? null : date;
  }
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  const naive = NAIVE_TIMESTAMP.exec(trimmed);
  if (naive) return fromNaiveParts(naive);

  if (ZONED_TIMESTAMP.test(trimmed)) {
    const millis = Date.parse(trimmed.replace(' ', 'T'));
    return Number.isNaN(millis) ? null : new Date(millis);
  }
  return null;
}
