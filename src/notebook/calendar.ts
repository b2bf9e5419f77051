import { formatIsoDate, isValidCalendarDate } from '../tasklist/dueDate';

export type CalendarPeriod = 'day' | 'month' | 'year';

export interface DateRange {
  period: CalendarPeriod;
  start: string;
  end: string;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Date range of a calendar-style document name such as "Journal/2024/03/01",
 * "Journal/2024/03", "Journal/2024" or "Journal/2024-03-01". Returns null for
 * any other name.
 */
export function dateRangeFromName(name: string): DateRange | null {
  const parts = name.split('/').filter(Boolean);
  const last = parts[parts.length - 1] ?? '';

  const dashed = /^(\d{4})-(\d{2})-(\d{2})$/.exec(last);
  if (dashed) {
    return dayRange(Number(dashed[1]), Number(dashed[2]), Number(dashed[3]));
  }

  const n = parts.length;
  const num = (i: number) => Number(parts[i]);
  const isYear = (i: number) => i >= 0 && /^\d{4}$/.test(parts[i]);
  const isTwoDigits = (i: number) => i >= 0 && /^\d{2}$/.test(parts[i]);

  if (n >= 3 && isYear(n - 3) && isTwoDigits(n - 2) && isTwoDigits(n - 1)) {
    return dayRange(num(n - 3), num(n - 2), num(n - 1));
  }
  if (n >= 2 && isYear(n - 2) && isTwoDigits(n - 1)) {
    const year = num(n - 2);
    const month = num(n - 1);
    if (month < 1 || month > 12) return null;
    return {
      period: 'month',
      start: formatIsoDate(year, month, 1),
      end: formatIsoDate(year, month, daysInMonth(year, month)),
    };
  }
  // A bare year only counts below a parent, e.g. "Journal/2024"
  if (n >= 2 && isYear(n - 1)) {
    const year = num(n - 1);
    return { period: 'year', start: formatIsoDate(year, 1, 1), end: formatIsoDate(year, 12, 31) };
  }
  return null;
}

function dayRange(year: number, month: number, day: number): DateRange | null {
  if (!isValidCalendarDate(year, month, day)) return null;
  const date = formatIsoDate(year, month, day);
  return { period: 'day', start: date, end: date };
}

/** The deadline a calendar document gives its tasks: the last day of its period. */
export function deadlineFromName(name: string): string | null {
  return dateRangeFromName(name)?.end ?? null;
}
