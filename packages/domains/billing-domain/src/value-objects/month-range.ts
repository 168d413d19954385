import { ValidationError } from '@billmirror/domain-kernel';

export interface DateRange {
  /** Inclusive. */
  start: Date;
  /** Exclusive. */
  end: Date;
}

/**
 * Calendar month as a half-open UTC range. `getRange(2013, 12)` is
 * 2013-12-01T00:00Z up to 2014-01-01T00:00Z.
 */
export function getRange(year: number, month: number): DateRange {
  if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
    throw new ValidationError(`Invalid month ${year}-${month}`, { year, month });
  }
  const start = new Date(Date.UTC(year, month - 1, 1));
  const end = month === 12 ? new Date(Date.UTC(year + 1, 0, 1)) : new Date(Date.UTC(year, month, 1));
  return { start, end };
}

export function inRange(date: Date | null | undefined, range: DateRange): boolean {
  if (!date) return false;
  const t = date.getTime();
  return t >= range.start.getTime() && t < range.end.getTime();
}
