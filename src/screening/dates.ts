const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const RECENT_EVENT_DAYS = 365;

const MONTHS = ['JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN', 'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC'];

// 2024-Mar-05 (sanctions list exports)
const NAMED_MONTH_DATE = /^(\d{4})-([A-Za-z]{3})-(\d{2})$/;
// 2024-03-05, optionally followed by a time part (provider APIs)
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;

export interface DateWindow {
  start: string;
  end: string;
}

function utcDay(year: number, monthIndex: number, day: number): number | undefined {
  const time = Date.UTC(year, monthIndex, day);
  const check = new Date(time);
  // rejects 2024-02-31 and friends instead of rolling them over
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== monthIndex || check.getUTCDate() !== day) {
    return undefined;
  }
  return time / MS_PER_DAY;
}

/**
 * Parses a calendar date into a UTC day number. Time-of-day and offsets are
 * dropped: recency is counted in whole calendar days.
 */
export function parseCalendarDay(value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined;
  const text = value.trim();
  if (!text) return undefined;

  const named = NAMED_MONTH_DATE.exec(text);
  if (named) {
    const monthIndex = MONTHS.indexOf(named[2].toUpperCase());
    if (monthIndex < 0) return undefined;
    return utcDay(Number(named[1]), monthIndex, Number(named[3]));
  }

  const iso = ISO_DATE.exec(text);
  if (iso) {
    return utcDay(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3]));
  }

  return undefined;
}

export function calendarDayOf(date: Date): number {
  return utcDay(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()) ?? Math.floor(date.getTime() / MS_PER_DAY);
}

/**
 * True when `day` lies no more than `days` whole days before `reference`.
 * The boundary is inclusive: exactly 365 days ago is still recent, 366 is
 * not. Days after the reference count as recent.
 */
export function isWithinDays(day: number, reference: Date, days = RECENT_EVENT_DAYS): boolean {
  return calendarDayOf(reference) - day <= days;
}

export function formatCalendarDay(day: number): string {
  return new Date(day * MS_PER_DAY).toISOString().slice(0, 10);
}

/** The window used when a request carries no dates: the year ending at `evaluatedAt`. */
export function defaultWindow(evaluatedAt: Date, days = RECENT_EVENT_DAYS): DateWindow {
  const end = calendarDayOf(evaluatedAt);
  return { start: formatCalendarDay(end - days), end: formatCalendarDay(end) };
}
