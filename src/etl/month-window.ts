import { utcDate } from '@domain/types';

/**
 * Month-starts (UTC, first day of month) overlapping the half-open window
 * [start, end). The result is lazy and can be iterated more than once.
 */
export function monthStarts(start: Date, end: Date): Iterable<Date> {
  const startMs = start.getTime();
  const endMs = end.getTime();
  const firstYear = start.getUTCFullYear();
  const firstMonth = start.getUTCMonth();

  return {
    *[Symbol.iterator](): Iterator<Date> {
      if (startMs >= endMs) return;

      let year = firstYear;
      let month = firstMonth;
      for (;;) {
        const current = utcDate(year, month, 1);
        if (current.getTime() >= endMs) return;
        yield current;
        month += 1;
        if (month > 11) {
          month = 0;
          year += 1;
        }
      }
    },
  };
}
