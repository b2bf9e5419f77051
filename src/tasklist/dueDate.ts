import * as chrono from 'chrono-node';

const DATE_DIRECTIVE = /\s*\[d:([^\]]+)\]/g;

// Strict English parsing with day-first numeric dates, "01/03/2024" is March 1
const dayFirst = new chrono.Chrono(chrono.en.configuration.createConfiguration(true, true));

export interface DueDateExtraction {
  date: string | null;
  text: string;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export function formatIsoDate(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Parses the value of a date directive into an ISO date. Only calendar dates
 * are accepted ("2024-03-01", "March 1 2024", ...), relative phrases are not,
 * and the date must make up the whole value.
 */
export function parseCalendarDate(value: string, referenceDate?: Date): string | null {
  const trimmed = value.trim();
  const results = dayFirst.parse(trimmed, referenceDate);
  if (results.length === 0) return null;

  const [best] = results;
  if (best.index !== 0 || best.text.length !== trimmed.length) return null;

  const year = best.start.get('year');
  const month = best.start.get('month');
  const day = best.start.get('day');
  if (year === null || month === null || day === null) return null;
  if (!isValidCalendarDate(year, month, day)) return null;

  return formatIsoDate(year, month, day);
}

/**
 * Takes the first parseable `[d:...]` directive out of the text. Directives
 * that do not parse, and any after the first parsed one, stay in the text.
 */
export function extractDueDate(text: string, referenceDate?: Date): DueDateExtraction {
  for (const match of text.matchAll(DATE_DIRECTIVE)) {
    const date = parseCalendarDate(match[1], referenceDate);
    if (date !== null && match.index !== undefined) {
      return {
        date,
        text: text.slice(0, match.index) + text.slice(match.index + match[0].length),
      };
    }
  }
  return { date: null, text };
}
